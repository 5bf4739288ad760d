import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { BridgeConfigT } from "../config.js";
import type { SessionRegistry } from "../portal/session-registry.js";
import type { AcquiredDeviceStore } from "../services/acquired-device-store.js";
import type { DeviceMonitor } from "../services/device-monitor.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const serverStartTime = Date.now();

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Get version from package.json
 */
function getVersion(): string {
  try {
    const packagePath = join(__dirname, "../../package.json");
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(packagePath, "utf-8"))
    );
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function getUptime(): number {
  return Math.floor((Date.now() - serverStartTime) / 1000);
}

export type StatusRouteOptionsT = FastifyPluginOptions & {
  config: BridgeConfigT;
  busName: string;
  registry: SessionRegistry;
  store: AcquiredDeviceStore;
  monitor: DeviceMonitor;
};

/**
 * Register status route
 */
export async function registerStatusRoute(
  fastify: FastifyInstance,
  options: StatusRouteOptionsT
): Promise<void> {
  const { config, busName, registry, store, monitor } = options;

  fastify.get("/status", async () => {
    return {
      running: true,
      version: getVersion(),
      uptime: getUptime(),
      mode: config.mode,
      port: config.port,
      host: config.host,
      busName,
      monitor: {
        enabled: config.monitor,
        state: monitor.getState(),
        sessionPath: monitor.getSessionPath(),
      },
      sessions: registry.size,
      acquiredDevices: store.size,
    };
  });
}
