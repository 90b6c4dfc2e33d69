import { appendFileSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

// Ink owns the terminal, so diagnostics go to a file, and only when asked for
const DEBUG_ENABLED = Boolean(process.env.HNTERM_DEBUG);
const LOG_FILE = process.env.HNTERM_DEBUG_LOG ?? join(tmpdir(), "hnterm-debug.log");

let initialized = false;

function ensureInitialized() {
  if (!initialized) {
    initialized = true;
    try {
      writeFileSync(LOG_FILE, `--- hnterm debug log started: ${new Date().toISOString()} ---\n`);
    } catch {
      // Logging is best-effort; a read-only tmpdir must not break the UI
    }
  }
}

function formatArg(arg: unknown): string {
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function log(...args: unknown[]) {
  if (!DEBUG_ENABLED) return;
  ensureInitialized();
  const timestamp = new Date().toISOString();
  const message = args.map(formatArg).join(" ");

  try {
    appendFileSync(LOG_FILE, `[${timestamp}] ${message}\n`);
  } catch {
    // Logging is best-effort
  }
}

export function logError(context: string, error: unknown) {
  if (!DEBUG_ENABLED) return;
  ensureInitialized();
  const timestamp = new Date().toISOString();

  let errorInfo = `[${timestamp}] ERROR [${context}]\n`;

  if (error instanceof Error) {
    errorInfo += `  Type: ${error.constructor.name}\n`;
    errorInfo += `  Message: ${error.message}\n`;
    if (error.stack) {
      errorInfo += `  Stack: ${error.stack}\n`;
    }
    if (error.cause !== undefined) {
      errorInfo += `  Cause: ${formatArg(error.cause)}\n`;
    }
  } else {
    errorInfo += `  Value: ${formatArg(error)}\n`;
  }

  try {
    appendFileSync(LOG_FILE, errorInfo);
  } catch {
    // Logging is best-effort
  }
}

export function isLoggingEnabled(): boolean {
  return DEBUG_ENABLED;
}

export function getLogFilePath(): string {
  return LOG_FILE;
}
