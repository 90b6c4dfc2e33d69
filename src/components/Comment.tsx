import { Box, Text } from "ink";
import type { CommentRow } from "../snapshot.js";
import { COLORS, getCommentBorderColor } from "../theme.js";
import { pluralize, truncateText } from "../utils.js";
import { Spinner } from "./Spinner.js";

// Unselected comments show a preview; the selected one is shown in full
const PREVIEW_LENGTH = 240;

function marker(row: CommentRow): string {
  if (row.replyCount === 0) return "·";
  switch (row.phase) {
    case "expanded":
      return "▾";
    case "load_failed":
      return "✗";
    default:
      return "▸";
  }
}

function body(row: CommentRow): { text: string; color: string } {
  if (row.deleted) return { text: "[deleted]", color: COLORS.textTertiary };
  if (row.dead) return { text: "[dead]", color: COLORS.textTertiary };
  const text = row.text ?? "";
  return { text: row.selected ? text : truncateText(text, PREVIEW_LENGTH), color: COLORS.textPrimary };
}

function replies(row: CommentRow): string | null {
  if (row.replyCount === 0) return null;
  if (row.phase === "load_failed") return `${pluralize(row.replyCount, "reply", "replies")} failed to load`;
  const label = pluralize(row.replyCount, "reply", "replies");
  if (row.threadCollapsed) return `${label}, thread collapsed`;
  if (row.failedReplies > 0) return `${label}, ${row.failedReplies} failed`;
  return label;
}

export function Comment({ row, dimmed = false }: { row: CommentRow; dimmed?: boolean }) {
  const borderColor = row.selected ? COLORS.accent : getCommentBorderColor(row.depth);

  return (
    <Box flexDirection="row" marginTop={1}>
      {row.indent > 0 ? <Box width={row.indent * 2} flexShrink={0} /> : null}
      <Box
        flexDirection="column"
        flexGrow={1}
        flexShrink={1}
        paddingLeft={1}
        paddingRight={1}
        borderStyle="single"
        borderTop={false}
        borderRight={false}
        borderBottom={false}
        borderColor={borderColor}
      >
        {row.status === "loading" ? (
          <Box gap={1}>
            <Spinner />
            <Text color={COLORS.textSecondary}>Loading comment…</Text>
          </Box>
        ) : row.status === "failed" ? (
          <Text color={COLORS.error}>
            {row.error ?? "Failed to load"} <Text color={COLORS.textTertiary}>(enter to retry)</Text>
          </Text>
        ) : (
          <>
            <Box gap={1}>
              <Text color={row.phase === "load_failed" ? COLORS.error : COLORS.textSecondary}>{marker(row)}</Text>
              <Text color={row.depth === 0 ? COLORS.accent : COLORS.textSecondary}>
                {row.author ?? "[deleted]"}
              </Text>
              {row.timeAgo ? <Text color={COLORS.textTertiary}>{row.timeAgo}</Text> : null}
              {row.phase === "loading" ? <Spinner /> : null}
            </Box>
            <Text color={body(row).color} dimColor={dimmed}>
              {body(row).text}
            </Text>
            {replies(row) ? <Text color={COLORS.textTertiary}>{replies(row)}</Text> : null}
          </>
        )}
      </Box>
    </Box>
  );
}
