import { Box, Text } from "ink";
import { COLORS } from "../theme.js";
import { Spinner } from "./Spinner.js";

export function EmptyState({ message, loading = false }: { message: string; loading?: boolean }) {
  return (
    <Box paddingLeft={2} paddingTop={1} gap={1}>
      {loading ? <Spinner color={COLORS.accent} /> : null}
      <Text color={COLORS.textSecondary}>{message}</Text>
    </Box>
  );
}
