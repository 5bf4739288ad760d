#!/usr/bin/env node
import pino from "pino";
import { parseConfig } from "./config.js";
import { DbusNextBus } from "./portal/dbus-next-bus.js";
import { createServer, startServer } from "./server.js";
import { loadBridgeEnv } from "./services/env-loader.js";
import { ensureBridgeLogFile } from "./services/log-file.js";
import { buildLoggerOptions } from "./services/logger-options.js";

/**
 * Bridge entry point
 * Loads .env files, validates configuration, connects to the session bus
 * and starts the server
 */
async function main() {
  loadBridgeEnv();
  const config = parseConfig(process.argv.slice(2));

  const logFile =
    process.env.NODE_ENV === "production"
      ? await ensureBridgeLogFile(config.dataDir)
      : null;
  const loggerOptions = buildLoggerOptions(config, logFile ? logFile.path : null);
  const logger = pino(loggerOptions).child({ component: "bridge" });
  if (logFile?.rotatedTo) {
    logger.info(
      { rotatedTo: logFile.rotatedTo, pruned: logFile.pruned },
      "[LogFile] Rotated bridge log"
    );
  }

  const bus = await DbusNextBus.connect({
    busAddress: config.busAddress,
    logger,
  });

  const server = await createServer(config, { bus, logger: loggerOptions });
  try {
    await startServer(server, config, () => {
      bus.disconnect();
    });
  } catch (error) {
    await server.close();
    bus.disconnect();
    throw error;
  }
}

main().catch((error) => {
  console.error("Failed to start bridge:", error);
  process.exit(1);
});
