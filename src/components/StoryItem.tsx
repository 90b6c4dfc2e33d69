import { Box, Text } from "ink";
import type { StoryRow } from "../snapshot.js";
import { COLORS } from "../theme.js";
import { pluralize, truncateText } from "../utils.js";
import { Spinner } from "./Spinner.js";

const MAX_TITLE_LENGTH = 80;

function metaLine(row: StoryRow): string {
  const parts = [pluralize(row.score, "point")];
  if (row.author) parts.push(`by ${row.author}`);
  if (row.timeAgo) parts.push(row.timeAgo);
  parts.push(pluralize(row.commentCount, "comment"));
  if (row.domain) parts.push(row.domain);
  return parts.join(" · ");
}

export function StoryItem({ row, dimmed }: { row: StoryRow; dimmed: boolean }) {
  const rank = `${row.rank}.`.padEnd(4);

  return (
    <Box flexDirection="row">
      <Box width={2} flexShrink={0}>
        <Text color={row.selected ? COLORS.accent : COLORS.textTertiary}>{row.selected ? "›" : " "}</Text>
      </Box>
      <Box width={rank.length + 1} flexShrink={0}>
        <Text color={COLORS.textTertiary}>{rank}</Text>
      </Box>
      <Box flexDirection="column" flexGrow={1} paddingRight={2}>
        {row.status === "ready" ? (
          <>
            <Text color={row.selected ? COLORS.accent : COLORS.textPrimary} dimColor={dimmed} wrap="truncate-end">
              {truncateText(row.title ?? "", MAX_TITLE_LENGTH)}
            </Text>
            <Text color={COLORS.textSecondary} dimColor={dimmed} wrap="truncate-end">
              {metaLine(row)}
            </Text>
          </>
        ) : row.status === "failed" ? (
          <>
            <Text color={COLORS.error}>{row.error ?? "Failed to load"}</Text>
            <Text color={COLORS.textTertiary}>press r to retry</Text>
          </>
        ) : (
          <>
            <Box gap={1}>
              <Spinner />
              <Text color={COLORS.textSecondary}>Loading story {row.id}…</Text>
            </Box>
            <Text> </Text>
          </>
        )}
      </Box>
    </Box>
  );
}
