import { Box, Text } from "ink";
import { COLORS } from "../theme.js";

const SECTIONS: readonly { title: string; keys: readonly [string, string][] }[] = [
  {
    title: "Stories",
    keys: [
      ["j / ↓", "next story"],
      ["k / ↑", "previous story"],
      ["n / →", "next page"],
      ["p / ←", "previous page"],
      ["1 2 3", "top, new, best"],
      ["g / G", "first / last story"],
      ["c", "open comments"],
      ["o / ↵", "open link in browser"],
      ["r", "refresh"],
      ["q / esc", "quit"],
    ],
  },
  {
    title: "Comments",
    keys: [
      ["j / ↓", "next comment"],
      ["k / ↑", "previous comment"],
      ["] / [", "next / previous sibling"],
      ["u", "parent comment"],
      ["g / G", "first / last comment"],
      ["↵ / l / →", "expand or collapse replies"],
      ["c", "collapse thread"],
      ["o", "open story link"],
      ["r", "refresh story and failed comments"],
      ["q / esc / h / ←", "back to stories"],
    ],
  },
];

export function HelpOverlay() {
  return (
    <Box flexDirection="column" paddingLeft={2} paddingTop={1} gap={1}>
      {SECTIONS.map((section) => (
        <Box key={section.title} flexDirection="column">
          <Text color={COLORS.accent}>{section.title}</Text>
          {section.keys.map(([key, desc]) => (
            <Box key={key}>
              <Box width={18} flexShrink={0}>
                <Text color={COLORS.textPrimary}>{key}</Text>
              </Box>
              <Text color={COLORS.textSecondary}>{desc}</Text>
            </Box>
          ))}
        </Box>
      ))}
      <Text color={COLORS.textTertiary}>? or esc to close · ctrl+c to quit</Text>
    </Box>
  );
}
