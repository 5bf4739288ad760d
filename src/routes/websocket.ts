import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import type { DeviceMonitor } from "../services/device-monitor.js";
import {
  parseClientMessage,
  type WebSocketManager,
} from "../services/websocket-manager.js";
import { getAuthFailure } from "./route-guards.js";

export type WebSocketRouteOptionsT = FastifyPluginOptions & {
  websocketManager: WebSocketManager;
  monitor: DeviceMonitor;
};

/**
 * Register WebSocket route
 *
 * Topic-based subscription; the only topic is "devices".
 *
 * Protocol:
 * - Client → Server: { type: "subscribe", topics: ["devices"] }
 * - Server → Client: { type: "devices.session", state, sessionPath }
 * - Server → Client: { type: "devices.event", sessionPath, events }
 */
export async function registerWebSocketRoute(
  fastify: FastifyInstance,
  options: WebSocketRouteOptionsT
): Promise<void> {
  const { websocketManager, monitor } = options;

  fastify.get("/ws", { websocket: true }, (socket, request) => {
    const authFailure = getAuthFailure(request);
    if (authFailure) {
      fastify.log.warn(
        { reason: authFailure.message, ip: request.ip },
        "[WebSocket] Rejected client connection"
      );
      socket.close(1008, "Forbidden");
      return;
    }
    fastify.log.info("[WebSocket] Client connected");

    websocketManager.registerClient(socket);

    socket.on("message", (message) => {
      const data = parseClientMessage(message.toString());
      if (!data) {
        fastify.log.warn("[WebSocket] Ignoring malformed client message");
        return;
      }
      if (data.topics.length === 0) {
        return;
      }

      if (data.type === "subscribe") {
        websocketManager.subscribe(socket, data.topics);
        fastify.log.info(
          `[WebSocket] Client subscribed to topics: ${data.topics.join(", ")}`
        );
        websocketManager.sendSnapshot(socket, () => monitor.getSnapshot());
      } else {
        websocketManager.unsubscribe(socket, data.topics);
        fastify.log.info(
          `[WebSocket] Client unsubscribed from topics: ${data.topics.join(", ")}`
        );
      }
    });

    socket.on("close", () => {
      fastify.log.info("[WebSocket] Client disconnected");
      websocketManager.unregisterClient(socket);
    });

    socket.on("error", (error: Error) => {
      fastify.log.error({ err: error }, "[WebSocket] Error");
      websocketManager.unregisterClient(socket);
    });
  });
}
