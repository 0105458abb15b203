#!/usr/bin/env node
import { USAGE, loadConfig, parseCommand } from "./lib/config.js";
import { errorFields } from "./lib/errors.js";
import { configureLogger, logger } from "./lib/logger.js";
import { initTelemetry } from "./lib/telemetry.js";
import { runServer } from "./server.js";

async function main(argv: readonly string[]): Promise<number> {
  const command = parseCommand(argv);
  if (command.command === "help") {
    process.stdout.write(USAGE + "\n");
    return 0;
  }

  const config = loadConfig();
  configureLogger({ level: config.logLevel, version: config.serviceVersion });
  initTelemetry({ exporter: config.tracesExporter });

  await runServer(command, config);
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exit(code);
  },
  (err: unknown) => {
    logger.critical("Server failed", errorFields(err));
    process.exit(1);
  },
);
