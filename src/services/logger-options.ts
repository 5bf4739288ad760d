import type { BridgeConfigT } from "../config.js";

type LoggerTransportT = {
  target: string;
  options: Record<string, unknown>;
};

export type BridgeLoggerOptionsT = {
  level: string;
  transport?: LoggerTransportT;
};

/**
 * Fastify logger options for the bridge.
 *
 * With a log file, pino writes JSON lines to it through pino/file.
 * Without one, development output goes through pino-pretty and
 * production output is plain JSON on stdout.
 */
export function buildLoggerOptions(
  config: Pick<BridgeConfigT, "logLevel">,
  logFilePath: string | null,
  nodeEnv: string | undefined = process.env.NODE_ENV
): BridgeLoggerOptionsT {
  if (logFilePath) {
    return {
      level: config.logLevel,
      transport: {
        target: "pino/file",
        options: { destination: logFilePath, mkdir: true },
      },
    };
  }

  if (nodeEnv === "production") {
    return { level: config.logLevel };
  }

  return {
    level: config.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        translateTime: "HH:MM:ss Z",
        ignore: "pid,hostname",
      },
    },
  };
}
