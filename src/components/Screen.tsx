import { useSyncExternalStore } from "react";
import { Box, Text, useInput, useStdout } from "ink";
import type { ReaderApp } from "../app.js";
import { toKeyEvent } from "../handlers/index.js";
import type { ScreenSnapshot } from "../snapshot.js";
import { COLORS } from "../theme.js";
import { CommentTree } from "./CommentTree.js";
import { Header } from "./Header.js";
import { HelpOverlay } from "./HelpOverlay.js";
import { COMMENT_SHORTCUTS, ShortcutsBar, STORY_LIST_SHORTCUTS } from "./ShortcutsBar.js";
import { StoryList } from "./StoryList.js";

// Header, notice and shortcuts bar
const CHROME_LINES = 6;
const DEFAULT_ROWS = 24;

export function ScreenView({ snapshot, rows = DEFAULT_ROWS }: { snapshot: ScreenSnapshot; rows?: number }) {
  const { screen } = snapshot;
  const bodyHeight = Math.max(2, rows - CHROME_LINES);

  return (
    <Box flexDirection="column" width="100%">
      <Header screen={screen} />
      {snapshot.notice ? (
        <Box paddingLeft={2}>
          <Text color={COLORS.error}>
            {snapshot.notice} <Text color={COLORS.textTertiary}>(r to retry)</Text>
          </Text>
        </Box>
      ) : null}
      {snapshot.showHelp ? (
        <HelpOverlay />
      ) : screen.kind === "stories" ? (
        <StoryList screen={screen} height={bodyHeight} />
      ) : (
        <CommentTree screen={screen} height={bodyHeight} />
      )}
      <ShortcutsBar shortcuts={screen.kind === "stories" ? STORY_LIST_SHORTCUTS : COMMENT_SHORTCUTS} />
    </Box>
  );
}

/** Binds the app's snapshot and keyboard to the terminal. */
export function Screen({ app }: { app: ReaderApp }) {
  const snapshot = useSyncExternalStore(app.subscribe, app.getSnapshot);
  const { stdout } = useStdout();

  useInput((input, key) => {
    app.handleKey(toKeyEvent(input, key));
  });

  return <ScreenView snapshot={snapshot} rows={stdout.rows || DEFAULT_ROWS} />;
}
