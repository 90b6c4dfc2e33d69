import { homedir } from "os";
import { join } from "path";
import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { logError } from "./logger.js";

const CONFIG_DIR = join(homedir(), ".config", "hnterm");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

const configSchema = z.object({
  apiUrl: z.string().url().optional(),
  storyType: z.enum(["top", "new", "best"]).optional(),
  settings: z.record(z.string(), z.number()).optional(),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Read the user's config file. It is never written: a missing, unreadable or
 * invalid file yields an empty config.
 */
export function loadConfig(file: string = CONFIG_FILE): Config {
  try {
    if (existsSync(file)) {
      const content = readFileSync(file, "utf-8");
      const parsed = configSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      logError("config", parsed.error);
    }
  } catch (error) {
    // If config is corrupted, return empty
    logError("config", error);
  }
  return {};
}
