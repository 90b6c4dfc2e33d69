import { Box } from "ink";
import type { StoriesScreen } from "../snapshot.js";
import { storyTypeLabel } from "../types.js";
import { visibleWindow } from "../utils.js";
import { EmptyState } from "./EmptyState.js";
import { StoryItem } from "./StoryItem.js";

// Each story takes a title line and a meta line
const LINES_PER_STORY = 2;

export function StoryList({ screen, height }: { screen: StoriesScreen; height: number }) {
  if (screen.rows.length === 0) {
    return screen.loading ? (
      <EmptyState message={`Loading ${storyTypeLabel(screen.storyType)} stories…`} loading />
    ) : (
      <EmptyState message="No stories here" />
    );
  }

  const size = Math.max(1, Math.floor(height / LINES_PER_STORY));
  const { start, end } = visibleWindow(screen.rows.length, screen.selectedIndex, size);

  return (
    <Box flexDirection="column" paddingLeft={1}>
      {screen.rows.slice(start, end).map((row) => (
        <StoryItem key={row.id} row={row} dimmed={screen.dimmed} />
      ))}
    </Box>
  );
}
