import { Box, Text } from "ink";
import type { ScreenSnapshot } from "../snapshot.js";
import { COLORS } from "../theme.js";
import { storyTypeLabel } from "../types.js";
import { currentVersion } from "../version.js";
import { Spinner } from "./Spinner.js";

function location(screen: ScreenSnapshot["screen"]): string {
  if (screen.kind === "comments") {
    return "Comments";
  }
  const page = screen.lastPage === null ? `${screen.pageIndex + 1}` : `${screen.pageIndex + 1}/${screen.lastPage + 1}`;
  return `${storyTypeLabel(screen.storyType)} · page ${page}`;
}

export function Header({ screen }: { screen: ScreenSnapshot["screen"] }) {
  return (
    <Box
      width="100%"
      justifyContent="space-between"
      paddingLeft={1}
      paddingRight={2}
      borderStyle="single"
      borderTop={false}
      borderLeft={false}
      borderRight={false}
      borderColor={COLORS.border}
    >
      <Box gap={1}>
        <Text color={COLORS.accent}>■ Hacker News</Text>
        <Text color={COLORS.textSecondary}>{location(screen)}</Text>
      </Box>
      <Box gap={2}>
        {screen.loading ? <Spinner /> : null}
        <Text color={COLORS.textSecondary}>v{currentVersion}</Text>
      </Box>
    </Box>
  );
}
