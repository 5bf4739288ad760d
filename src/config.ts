import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_FINISH_MAX_PAGES } from "./portal/portal-constants.js";

/**
 * Bridge configuration schema
 */
const ConfigSchema = z.object({
  host: z.string().ip({ version: "v4", message: "Invalid IPv4 address" }),
  port: z.number().int().min(1).max(65535),
  mode: z.enum(["lan", "local"]),
  dataDir: z.string().min(1),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]),
  finishMaxPages: z.number().int().min(1),
  monitor: z.boolean(),
  busAddress: z.string().min(1).optional(),
});

export type BridgeConfigT = z.infer<typeof ConfigSchema>;

type EnvT = Record<string, string | undefined>;

const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 8787;

function defaultDataDir(env: EnvT): string {
  const stateHome = env.XDG_STATE_HOME || path.join(os.homedir(), ".local", "state");
  return path.join(stateHome, "usb-portal-bridge");
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  // NaN and fractions are left for zod to reject
  return Number(value);
}

/**
 * Parse CLI arguments and environment, return validated configuration.
 * CLI flags win over environment variables.
 */
export function parseConfig(
  args: string[],
  env: EnvT = process.env
): BridgeConfigT {
  let host = env.PORTAL_BRIDGE_HOST || DEFAULT_HOST;
  let port = parseInteger(env.PORTAL_BRIDGE_PORT) ?? DEFAULT_PORT;
  let dataDir = env.PORTAL_BRIDGE_DATA_DIR || defaultDataDir(env);
  let logLevel =
    env.PORTAL_BRIDGE_LOG_LEVEL ||
    (env.NODE_ENV === "production" ? "info" : "debug");
  let finishMaxPages =
    parseInteger(env.PORTAL_FINISH_MAX_PAGES) ?? DEFAULT_FINISH_MAX_PAGES;
  let monitor = true;
  const busAddress = env.DBUS_SESSION_BUS_ADDRESS || undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    if (arg === "--no-monitor") {
      monitor = false;
      continue;
    }
    if (nextArg === undefined) {
      continue;
    }

    if (arg === "--host") {
      host = nextArg;
      i++;
    } else if (arg === "--port") {
      port = parseInteger(nextArg) ?? port;
      i++;
    } else if (arg === "--data-dir") {
      dataDir = nextArg;
      i++;
    } else if (arg === "--log-level") {
      logLevel = nextArg;
      i++;
    } else if (arg === "--finish-max-pages") {
      finishMaxPages = parseInteger(nextArg) ?? finishMaxPages;
      i++;
    }
  }

  // Loopback stays local, anything else is reachable from the LAN
  const mode = host === "127.0.0.1" ? "local" : "lan";

  return ConfigSchema.parse({
    host,
    port,
    mode,
    dataDir,
    logLevel,
    finishMaxPages,
    monitor,
    busAddress,
  });
}
