#!/usr/bin/env node

import process from "process";
import { hideBin } from "yargs/helpers";
import { parseConfig } from "./config";
import { ControlConsole } from "./console";
import { errorMessage } from "./errors";
import { FileLogger } from "./logger";
import { startRelay } from "./relay";
import { ShutdownCoordinator } from "./shutdown";

(async function () {
  // parse args
  const config = await parseConfig(hideBin(process.argv)).catch((err) => {
    console.log("invalid arguments:", errorMessage(err));
    return process.exit(1);
  });

  const logger = await FileLogger.open(config.logDir, config.logName);
  const shutdown = new ShutdownCoordinator();

  // handle signal
  process.on("SIGINT", () => {
    if (shutdown.request("interrupt")) {
      console.log("\nShutting down...");
      logger.log("Stopped by Ctrl+C");
    }
  });

  const relay = await startRelay(config, logger, shutdown).catch(
    async (err) => {
      logger.log(
        `Cannot listen on ${config.listenHost}:${config.listenPort}: ${errorMessage(err)}`
      );
      await logger.close();
      return process.exit(1);
    }
  );

  const controlConsole = new ControlConsole({
    registry: relay.registry,
    shutdown,
    logger,
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY === true,
  });
  await Promise.all([relay.listener.closed(), controlConsole.run()]);

  // in-flight connections are abandoned, not drained
  const active = relay.listener.active;
  logger.log(
    active > 0
      ? `Server stopped. ${active} forwarded connection(s) abandoned`
      : "Server stopped."
  );
  await logger.close();
  process.exit(0);
})().catch((err) => {
  console.log("catch error:", err);
  process.exit(1);
});
