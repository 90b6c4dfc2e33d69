import { Box, Text } from "ink";
import { COLORS } from "../theme.js";

export interface ShortcutItem {
  key: string;
  desc: string;
  rightAlign?: boolean;
}

// Check if a key can be shown inline (single letter that starts the description)
function canShowInline(key: string, desc: string): boolean {
  return key.length === 1 && desc.length > 0 && desc.toLowerCase().startsWith(key.toLowerCase());
}

function Shortcut({ item }: { item: ShortcutItem }) {
  const { key, desc } = item;
  if (canShowInline(key, desc)) {
    // Show inline: first letter bright + underlined, rest normal
    return (
      <Text color={COLORS.textSecondary}>
        <Text color={COLORS.textPrimary} underline>
          {desc[0] ?? ""}
        </Text>
        {desc.slice(1)}
      </Text>
    );
  }
  return (
    <Box gap={1}>
      <Text color={COLORS.textPrimary}>{key}</Text>
      <Text color={COLORS.textSecondary}>{desc}</Text>
    </Box>
  );
}

export function ShortcutsBar({ shortcuts }: { shortcuts: readonly ShortcutItem[] }) {
  const left = shortcuts.filter((s) => !s.rightAlign);
  const right = shortcuts.filter((s) => s.rightAlign);

  return (
    <Box
      width="100%"
      flexShrink={0}
      paddingLeft={2}
      paddingRight={2}
      gap={2}
      borderStyle="single"
      borderBottom={false}
      borderLeft={false}
      borderRight={false}
      borderColor={COLORS.border}
    >
      {left.map((item) => (
        <Shortcut key={item.key} item={item} />
      ))}
      {right.length > 0 ? <Box flexGrow={1} /> : null}
      {right.map((item) => (
        <Shortcut key={item.key} item={item} />
      ))}
    </Box>
  );
}

export const STORY_LIST_SHORTCUTS: readonly ShortcutItem[] = [
  { key: "j/k", desc: "navigate" },
  { key: "n/p", desc: "page" },
  { key: "1/2/3", desc: "top/new/best" },
  { key: "c", desc: "comments" },
  { key: "o", desc: "open" },
  { key: "r", desc: "refresh" },
  { key: "?", desc: "help", rightAlign: true },
  { key: "q", desc: "quit", rightAlign: true },
];

export const COMMENT_SHORTCUTS: readonly ShortcutItem[] = [
  { key: "j/k", desc: "navigate" },
  { key: "↵", desc: "expand" },
  { key: "c", desc: "collapse thread" },
  { key: "o", desc: "open" },
  { key: "r", desc: "refresh" },
  { key: "?", desc: "help", rightAlign: true },
  { key: "esc", desc: "back", rightAlign: true },
];
