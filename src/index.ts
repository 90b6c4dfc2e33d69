#!/usr/bin/env node
import { spawn } from "child_process";
import { platform } from "os";
import { createElement } from "react";
import { render } from "ink";
import { createHttpGateway } from "./api.js";
import { ReaderApp } from "./app.js";
import { parseArgs, USAGE } from "./cli.js";
import { getLogFilePath, isLoggingEnabled, log, logError } from "./logger.js";
import { loadSettings, validateSetting } from "./settings.js";
import { detectTheme } from "./theme.js";
import { currentVersion } from "./version.js";
import { Screen } from "./components/Screen.js";

function openUrl(url: string): void {
  const os = platform();
  const [command, args]: [string, string[]] =
    os === "darwin" ? ["open", [url]] : os === "win32" ? ["cmd", ["/c", "start", "", url]] : ["xdg-open", [url]];

  const child = spawn(command, args, { stdio: "ignore", detached: true });
  child.on("error", (error) => logError("openUrl", error));
  child.unref();
}

function main(): number | undefined {
  const command = parseArgs(process.argv.slice(2));

  switch (command.kind) {
    case "help":
      process.stdout.write(USAGE);
      return 0;
    case "version":
      process.stdout.write(`hnterm ${currentVersion}\n`);
      return 0;
    case "error":
      process.stderr.write(`hnterm: ${command.message}\n\n${USAGE}`);
      return 2;
    case "run":
      break;
  }

  const loaded = loadSettings();
  const settings = { ...loaded.settings };
  if (command.options.pageSize !== undefined) {
    settings.pageSize = validateSetting("pageSize", command.options.pageSize);
  }
  const storyType = command.options.storyType ?? loaded.storyType ?? "best";

  if (isLoggingEnabled()) {
    process.stderr.write(`hnterm: debug log at ${getLogFilePath()}\n`);
  }
  log("[main] starting", { version: currentVersion, storyType, settings, apiUrl: loaded.apiUrl });

  detectTheme();

  const gateway = createHttpGateway({
    baseUrl: loaded.apiUrl,
    timeoutMs: settings.requestTimeoutSeconds * 1000,
  });

  const app = new ReaderApp(
    gateway,
    { settings, storyType },
    {
      onOpenUrl: openUrl,
      onExit: () => instance.unmount(),
      onError: (error) => {
        instance.unmount();
        process.stderr.write(`hnterm: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exitCode = 1;
      },
    },
  );

  const instance = render(createElement(Screen, { app }), { exitOnCtrlC: false });
  app.start();

  void instance.waitUntilExit().then(
    () => {
      app.stop();
      log("[main] exited");
      // Fetches still in flight would otherwise hold the process open
      process.exit();
    },
    (error: unknown) => {
      app.stop();
      logError("render", error);
      process.exit(1);
    },
  );
  return undefined;
}

try {
  const code = main();
  if (code !== undefined) {
    process.exitCode = code;
  }
} catch (error) {
  // The terminal could not be set up
  logError("startup", error);
  process.stderr.write(`hnterm: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
}
