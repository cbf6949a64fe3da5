#!/usr/bin/env node
import { LogLevel, parseLogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { errorMessage } from "../errors.js";
import { startGateway } from "../gateway.js";
import { VERSION } from "../version.js";
import { CliUsageError, HELP_TEXT, parseArgs } from "./cli-args.js";

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let command: ReturnType<typeof parseArgs>;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}\nRun with --help for usage.`);
      process.exit(1);
    }
    throw err;
  }

  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (command.kind === "version") {
    console.log(VERSION);
    return;
  }

  const { config } = command;
  const logger = new StructuredLogger({
    component: "streamgate",
    level: config.verbose
      ? LogLevel.DEBUG
      : (parseLogLevel(process.env.STREAMGATE_LOG_LEVEL) ?? LogLevel.INFO),
  });

  let gateway: Awaited<ReturnType<typeof startGateway>>;
  try {
    gateway = await startGateway({ config: config.gateway, backends: config.backends, logger });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EADDRINUSE") {
      console.error(`Error: Port ${config.gateway.port} is already in use.`);
      console.error(`Try a different port: streamgate --port ${config.gateway.port + 1}`);
      process.exit(1);
    }
    throw err;
  }

  console.log(`
  streamgate v${VERSION}

  Control: ${gateway.url}/control/register
  Data:    ${gateway.url}/data/connect
  Health:  ${gateway.url}/health

  Press Ctrl+C to stop
`);

  // Graceful shutdown; a second signal forces exit.
  let shuttingDown = false;
  let forceExitTimer: ReturnType<typeof setTimeout> | null = null;

  const shutdown = () => {
    if (shuttingDown) {
      console.log("\n  Force exiting...");
      if (forceExitTimer) clearTimeout(forceExitTimer);
      process.exit(1);
    }
    shuttingDown = true;
    console.log("\n  Shutting down...");

    forceExitTimer = setTimeout(() => {
      console.error("  Shutdown timed out, force exiting.");
      process.exit(1);
    }, 10_000);

    gateway
      .stop()
      .then(() => {
        if (forceExitTimer) clearTimeout(forceExitTimer);
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error("Shutdown failed", { error: err });
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", errorMessage(err));
  process.exit(1);
});
