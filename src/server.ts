import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { registerStatusRoute } from "./routes/status.js";
import { registerDevicesRoute } from "./routes/devices.js";
import { registerWebSocketRoute } from "./routes/websocket.js";
import type { BridgeConfigT } from "./config.js";
import { UsbPortal, type PortalBus } from "./portal/index.js";
import { AcquiredDeviceStore } from "./services/acquired-device-store.js";
import { DeviceMonitor } from "./services/device-monitor.js";
import type { BridgeLoggerOptionsT } from "./services/logger-options.js";
import { WebSocketManager } from "./services/websocket-manager.js";

export type CreateServerDepsT = {
  bus: PortalBus;
  /**
   * false disables logging, e.g. in tests
   */
  logger: BridgeLoggerOptionsT | false;
  closeFd?: (fd: number) => void;
};

/**
 * Create and configure Fastify server instance
 */
export async function createServer(
  config: BridgeConfigT,
  deps: CreateServerDepsT
) {
  const server = Fastify({
    logger: deps.logger,
  });

  await server.register(cors, {
    origin: config.mode === "local",
  });
  server.log.info("[Server] CORS plugin registered");

  await server.register(websocket);
  server.log.info("[Server] WebSocket plugin registered");

  const portal = new UsbPortal({
    bus: deps.bus,
    logger: server.log.child({ component: "portal" }),
    finishMaxPages: config.finishMaxPages,
  });
  const store = new AcquiredDeviceStore({
    logger: server.log.child({ component: "device-store" }),
    closeFd: deps.closeFd,
  });
  const websocketManager = new WebSocketManager();
  const monitor = new DeviceMonitor({
    portal,
    websocketManager,
    logger: server.log.child({ component: "device-monitor" }),
  });

  await server.register(registerStatusRoute, {
    config,
    busName: deps.bus.uniqueName,
    registry: portal.getRegistry(),
    store,
    monitor,
  });
  await server.register(registerDevicesRoute, { portal, store });
  await server.register(registerWebSocketRoute, { websocketManager, monitor });
  server.log.info("[Server] All routes registered");

  if (config.monitor) {
    server.addHook("onReady", async () => {
      await monitor.start();
    });
  }

  server.addHook("onClose", async () => {
    await monitor.stop();

    const held = store.getIds();
    if (held.length > 0) {
      try {
        await portal.releaseDevices(held);
      } catch (error) {
        server.log.warn(
          { err: error, deviceIds: held },
          "[Server] Releasing held devices on shutdown failed"
        );
      }
      store.removeAll();
    }
  });

  return server;
}

type BridgeServerT = Awaited<ReturnType<typeof createServer>>;

const getErrorCode = (error: unknown): string | undefined =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string"
    ? error.code
    : undefined;

/**
 * Start the server and handle graceful shutdown
 */
export async function startServer(
  server: BridgeServerT,
  config: BridgeConfigT,
  onClosed: () => void = () => undefined
): Promise<void> {
  try {
    await server.listen({ host: config.host, port: config.port });
    server.log.info(
      `Bridge server listening on http://${config.host}:${config.port}`
    );
  } catch (err: unknown) {
    if (getErrorCode(err) === "EADDRINUSE") {
      server.log.error(
        `Port ${config.port} is already in use. Please choose a different port.`
      );
    } else {
      server.log.error({ err }, "[Server] Failed to listen");
    }
    throw err;
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    server.log.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.close();
      server.log.info("Server closed");
      onClosed();
      process.exit(0);
    } catch (err) {
      server.log.error({ err }, "[Server] Shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
}
