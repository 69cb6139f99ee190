#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createLogger } from "./logging/logger.js";
import { ShellCommandRunner } from "./services/commandRunner.js";
import { ScoopService } from "./services/scoopService.js";
import { ScoopTuiApp } from "./tui/app.js";

async function main(): Promise<void> {
  normalizeTerminalEnv();
  const config = loadConfig({ argv: process.argv.slice(2) });
  const logger = createLogger({ level: config.logLevel, file: config.logFile });
  logger.info({ tool: config.tool, shell: config.shell, timeoutMs: config.timeoutMs }, "starting scoopui");

  const runner = new ShellCommandRunner({ logger });
  const service = new ScoopService(runner, {
    invocation: { tool: config.tool, shell: config.shell, powershell: config.powershell },
    timeoutMs: config.timeoutMs,
    searchCacheSize: config.searchCacheSize,
    logger
  });
  const app = new ScoopTuiApp(service, { tool: config.tool, debug: config.debug });
  await app.start();
}

function normalizeTerminalEnv(): void {
  const term = process.env.TERM ?? "";
  const termProgram = process.env.TERM_PROGRAM ?? "";
  const isGhostty = term.toLowerCase().includes("ghostty") || termProgram.toLowerCase().includes("ghostty");

  // blessed has known incompatibilities with some extended terminfo entries from ghostty.
  if (isGhostty) {
    process.env.TERM = "xterm-256color";
  }
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(`scoopui failed: ${describeError(error)}`);
  process.exit(1);
});
