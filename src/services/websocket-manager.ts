import { z } from "zod";
import type { JsonValueT } from "../utils/json-value.js";

/**
 * WebSocket client connection handler
 */
export type WebSocketClientT = {
  send: (data: string) => void;
};

export const TOPICS = ["devices"] as const;

/**
 * WebSocket topic subscription
 */
export type TopicT = (typeof TOPICS)[number];

export type MonitorStateT = "idle" | "starting" | "active" | "closed" | "error";

/**
 * Server → client messages
 */
export type WebSocketMessageT =
  | {
      type: "devices.event";
      sessionPath: string;
      events: { [key: string]: JsonValueT }[];
    }
  | {
      type: "devices.session";
      state: MonitorStateT;
      sessionPath: string | null;
      error?: string;
    };

const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("subscribe"), topics: z.array(z.string()) }),
  z.object({ type: z.literal("unsubscribe"), topics: z.array(z.string()) }),
]);

export type ClientMessageT = {
  type: "subscribe" | "unsubscribe";
  topics: TopicT[];
};

const isTopic = (topic: string): topic is TopicT =>
  TOPICS.some((known) => known === topic);

/**
 * Parse a client frame; unknown topics are dropped.
 *
 * @returns null when the frame is not a valid client message
 */
export function parseClientMessage(raw: string): ClientMessageT | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ClientMessageSchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }
  return {
    type: parsed.data.type,
    topics: parsed.data.topics.filter(isTopic),
  };
}

/**
 * WebSocket manager
 *
 * Manages WebSocket clients with topic-based subscription.
 * Clients only receive events for topics they subscribed to.
 */
export class WebSocketManager {
  private clients: Map<WebSocketClientT, Set<TopicT>> = new Map();

  registerClient(client: WebSocketClientT): void {
    this.clients.set(client, new Set());
  }

  unregisterClient(client: WebSocketClientT): void {
    this.clients.delete(client);
  }

  subscribe(client: WebSocketClientT, topics: TopicT[]): void {
    const clientTopics = this.clients.get(client);
    if (clientTopics) {
      topics.forEach((topic) => clientTopics.add(topic));
    }
  }

  unsubscribe(client: WebSocketClientT, topics: TopicT[]): void {
    const clientTopics = this.clients.get(client);
    if (clientTopics) {
      topics.forEach((topic) => clientTopics.delete(topic));
    }
  }

  getClientTopics(client: WebSocketClientT): Set<TopicT> {
    return this.clients.get(client) || new Set();
  }

  /**
   * Broadcast message to all clients subscribed to the topic
   */
  broadcast(topic: TopicT, message: WebSocketMessageT): void {
    const messageJson = JSON.stringify(message);

    this.clients.forEach((topics, client) => {
      if (topics.has(topic)) {
        this.sendRaw(client, messageJson);
      }
    });
  }

  sendToClient(client: WebSocketClientT, message: WebSocketMessageT): void {
    this.sendRaw(client, JSON.stringify(message));
  }

  /**
   * Send snapshot to client for all subscribed topics
   */
  sendSnapshot(
    client: WebSocketClientT,
    getSnapshot: (topic: TopicT) => WebSocketMessageT | null
  ): void {
    const topics = this.getClientTopics(client);

    topics.forEach((topic) => {
      const snapshot = getSnapshot(topic);
      if (snapshot) {
        this.sendToClient(client, snapshot);
      }
    });
  }

  getClientCount(): number {
    return this.clients.size;
  }

  getTopicSubscriberCount(topic: TopicT): number {
    let count = 0;
    this.clients.forEach((topics) => {
      if (topics.has(topic)) {
        count++;
      }
    });
    return count;
  }

  private sendRaw(client: WebSocketClientT, data: string): void {
    try {
      client.send(data);
    } catch {
      // Client disconnected, remove it
      this.clients.delete(client);
    }
  }
}
