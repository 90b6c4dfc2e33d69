import { Box, Text } from "ink";
import type { CommentsScreen } from "../snapshot.js";
import { COLORS } from "../theme.js";
import { pluralize, visibleWindow } from "../utils.js";
import { Comment } from "./Comment.js";
import { EmptyState } from "./EmptyState.js";

// Rough height of a comment preview, margin included
const LINES_PER_COMMENT = 5;

function StoryHeader({ screen }: { screen: CommentsScreen }) {
  const { story } = screen;
  if (!story) {
    return (
      <Box paddingLeft={2} paddingBottom={1}>
        <Text color={screen.storyStatus === "failed" ? COLORS.error : COLORS.textSecondary}>
          {screen.storyStatus === "failed" ? `Story ${screen.storyId} failed to load` : `Loading story ${screen.storyId}…`}
        </Text>
      </Box>
    );
  }

  const meta = [pluralize(story.score, "point")];
  if (story.author) meta.push(`by ${story.author}`);
  meta.push(story.timeAgo, pluralize(story.commentCount, "comment"));

  return (
    <Box
      flexDirection="column"
      paddingLeft={2}
      paddingRight={2}
      borderStyle="single"
      borderTop={false}
      borderLeft={false}
      borderRight={false}
      borderColor={COLORS.border}
    >
      <Text color={COLORS.textPrimary} bold>
        {story.title}
      </Text>
      {story.domain ? <Text color={COLORS.link}>{story.domain}</Text> : null}
      <Text color={COLORS.textSecondary}>{meta.join(" · ")}</Text>
      {story.text ? <Text color={COLORS.textPrimary}>{story.text}</Text> : null}
    </Box>
  );
}

export function CommentTree({ screen, height }: { screen: CommentsScreen; height: number }) {
  const size = Math.max(1, Math.floor(height / LINES_PER_COMMENT));
  const { start, end } = visibleWindow(screen.rows.length, Math.max(0, screen.selectedIndex), size);

  return (
    <Box flexDirection="column">
      <StoryHeader screen={screen} />
      {screen.rows.length === 0 ? (
        screen.story ? <EmptyState message="No comments yet" /> : null
      ) : (
        <Box flexDirection="column" paddingLeft={1}>
          {screen.rows.slice(start, end).map((row) => (
            <Comment key={row.id} row={row} dimmed={screen.dimmed} />
          ))}
        </Box>
      )}
    </Box>
  );
}
