import { useEffect, useState } from "react";
import { Text } from "ink";
import { COLORS } from "../theme.js";
import { LOADING_CHARS } from "../utils.js";

const FRAME_MS = 80;

export function Spinner({ color = COLORS.textSecondary }: { color?: string }) {
  const [frame, setFrame] = useState(0);

  useEffect(() => {
    const interval = setInterval(() => {
      setFrame((current) => (current + 1) % LOADING_CHARS.length);
    }, FRAME_MS);
    return () => clearInterval(interval);
  }, []);

  return <Text color={color}>{LOADING_CHARS[frame]}</Text>;
}
