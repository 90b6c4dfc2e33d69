import { readFileSync } from "fs";
import { fileURLToPath } from "url";

// Same relative path from src/ and from dist/
const PACKAGE_JSON = fileURLToPath(new URL("../package.json", import.meta.url));

function readVersion(): string {
  try {
    const data: unknown = JSON.parse(readFileSync(PACKAGE_JSON, "utf-8"));
    if (typeof data === "object" && data !== null && "version" in data && typeof data.version === "string") {
      return data.version;
    }
  } catch {
    // Fall through to the placeholder below
  }
  return "0.0.0";
}

export const currentVersion = readVersion();
