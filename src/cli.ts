import { MAX_PAGE_SIZE, MIN_PAGE_SIZE } from "./pages.js";
import { isStoryType, STORY_TYPES, type StoryType } from "./types.js";

export interface CliOptions {
  pageSize?: number;
  storyType?: StoryType;
}

export type CliCommand =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export const USAGE = `Usage: hnterm [options]

Browse Hacker News stories and comment threads in the terminal.

Options:
  --length <n>           Stories per page, ${MIN_PAGE_SIZE}-${MAX_PAGE_SIZE} (default: 10)
  --story-type <type>    Initial category: ${STORY_TYPES.join(", ")} (default: best)
  -h, --help             Show this help and exit
  -V, --version          Show the version and exit
`;

function parseLength(value: string): number | string {
  const parsed = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (isNaN(parsed) || parsed < MIN_PAGE_SIZE || parsed > MAX_PAGE_SIZE) {
    return `--length must be an integer between ${MIN_PAGE_SIZE} and ${MAX_PAGE_SIZE}, got "${value}"`;
  }
  return parsed;
}

/**
 * Accepts `--flag value` and `--flag=value`. Help and version win over
 * anything else on the line.
 */
export function parseArgs(args: readonly string[]): CliCommand {
  if (args.includes("-h") || args.includes("--help")) return { kind: "help" };
  if (args.includes("-V") || args.includes("--version")) return { kind: "version" };

  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;

    if (flag !== "--length" && flag !== "--story-type") {
      return { kind: "error", message: `Unknown option "${arg}"` };
    }

    let value: string | undefined;
    if (eq > 0 && arg.startsWith("--")) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++; // Skip the value
    }
    if (value === undefined || value === "") {
      return { kind: "error", message: `${flag} requires a value` };
    }

    if (flag === "--length") {
      const length = parseLength(value);
      if (typeof length === "string") return { kind: "error", message: length };
      options.pageSize = length;
    } else {
      if (!isStoryType(value)) {
        return { kind: "error", message: `--story-type must be one of ${STORY_TYPES.join(", ")}, got "${value}"` };
      }
      options.storyType = value;
    }
  }

  return { kind: "run", options };
}
