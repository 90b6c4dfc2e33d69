export interface Theme {
  bgSelected: string;
  border: string;
  textPrimary: string;
  textSecondary: string;
  textTertiary: string;
  accent: string;
  link: string;
  success: string;
  error: string;
  hint: string;
  commentL1: string;
  commentL2: string;
  commentL3: string;
}

const DARK_THEME: Theme = {
  bgSelected: "#2a2a2a",
  border: "#3a3a3a",
  textPrimary: "#e0e0e0",
  textSecondary: "#888888",
  textTertiary: "#666666",
  accent: "#ff6600",
  link: "#6699ff",
  success: "#4ade80",
  error: "#ef4444",
  hint: "#a855f7",
  commentL1: "#555555",
  commentL2: "#444444",
  commentL3: "#333333",
};

const LIGHT_THEME: Theme = {
  bgSelected: "#e8e8e8",
  border: "#cccccc",
  textPrimary: "#1a1a1a",
  textSecondary: "#666666",
  textTertiary: "#888888",
  accent: "#ff6600",
  link: "#0066cc",
  success: "#22c55e",
  error: "#dc2626",
  hint: "#9333ea",
  commentL1: "#cccccc",
  commentL2: "#dddddd",
  commentL3: "#eeeeee",
};

// Current theme colors - mutated in place by detectTheme()
export const COLORS: Theme = { ...DARK_THEME };

/**
 * COLORFGBG is "fg;bg" (sometimes "fg;default;bg") with ANSI color indexes;
 * 7 and 9-15 are light backgrounds.
 */
export function isLightBackground(colorFgBg: string | undefined): boolean {
  if (!colorFgBg) return false;
  const bg = Number(colorFgBg.split(";").pop());
  if (!Number.isInteger(bg)) return false;
  return bg === 7 || (bg >= 9 && bg <= 15);
}

export function detectTheme(env: NodeJS.ProcessEnv = process.env): void {
  Object.assign(COLORS, isLightBackground(env.COLORFGBG) ? LIGHT_THEME : DARK_THEME);
}

export function getCommentBorderColor(level: number): string {
  const borderColors: Record<number, string> = {
    0: COLORS.accent, // Root comments always orange
    1: COLORS.commentL1,
    2: COLORS.commentL2,
    3: COLORS.commentL3,
  };
  return borderColors[level] ?? COLORS.commentL3;
}
