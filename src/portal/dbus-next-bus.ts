import { createRequire } from "node:module";
import dbus from "dbus-next";
import type { Message, MessageBus } from "dbus-next";
import type {
  BusCallT,
  PortalBus,
  SignalHandlerT,
  SignalMatchT,
} from "./portal-bus.js";
import type { PortalLoggerT } from "./portal-logger.js";
import { PORTAL_BUS_NAME } from "./portal-constants.js";

const DBUS_NAME = "org.freedesktop.DBus";
const DBUS_PATH = "/org/freedesktop/DBus";

/**
 * dbus-next reads negotiateUnixFd at runtime but its typings leave it out
 */
type SessionBusOptionsT = NonNullable<Parameters<typeof dbus.sessionBus>[0]> & {
  negotiateUnixFd?: boolean;
};

export type DbusNextBusOptionsT = {
  logger: PortalLoggerT;
  /**
   * Session bus address, defaults to DBUS_SESSION_BUS_ADDRESS
   */
  busAddress?: string;
  destination?: string;
  /**
   * Whether fds can be received on this connection, see hasUnixFdSupport
   */
  unixFdSupport?: () => boolean;
};

type SubscriptionT = {
  match: SignalMatchT;
  handler: SignalHandlerT;
  rule: string;
};

/**
 * Build a match rule for signals from the portal
 */
export function buildMatchRule(destination: string, match: SignalMatchT): string {
  const parts = [
    "type='signal'",
    `sender='${destination}'`,
    `interface='${match.interface}'`,
    `member='${match.member}'`,
  ];
  if (match.path) {
    parts.push(`path='${match.path}'`);
  }
  return parts.join(",");
}

/**
 * dbus-next only passes fds over unix sockets when its optional
 * usocket dependency is installed. Without it, messages carrying
 * fds fail to parse.
 */
export function hasUnixFdSupport(): boolean {
  const require = createRequire(import.meta.url);
  try {
    createRequire(require.resolve("dbus-next")).resolve("usocket");
    return true;
  } catch {
    return false;
  }
}

function readUniqueName(bus: MessageBus): string | null {
  return "name" in bus && typeof bus.name === "string" && bus.name !== ""
    ? bus.name
    : null;
}

function waitForUniqueName(bus: MessageBus): Promise<string> {
  const assigned = readUniqueName(bus);
  if (assigned) {
    return Promise.resolve(assigned);
  }
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      bus.off("connect", onConnect);
      reject(error);
    };
    const onConnect = () => {
      bus.off("error", onError);
      const uniqueName = readUniqueName(bus);
      if (uniqueName) {
        resolve(uniqueName);
      } else {
        reject(new Error("Session bus did not assign a unique name"));
      }
    };
    bus.once("connect", onConnect);
    bus.once("error", onError);
  });
}

/**
 * PortalBus over a dbus-next session bus connection.
 *
 * The bus daemon filters signals by the match rules this class adds,
 * sender included; dispatch only routes them to handlers. A connection
 * error fails every pending call and every later one.
 */
export class DbusNextBus implements PortalBus {
  readonly uniqueName: string;
  private readonly bus: MessageBus;
  private readonly logger: PortalLoggerT;
  private readonly destination: string;
  private nextSubscriptionId = 1;
  private subscriptions = new Map<number, SubscriptionT>();
  private pending = new Set<(error: Error) => void>();
  private failure: Error | null = null;
  private readonly onMessage = (message: Message) => {
    this.dispatch(message);
  };
  private readonly onError = (error: Error) => {
    this.fail(error);
  };

  private constructor(
    bus: MessageBus,
    uniqueName: string,
    options: DbusNextBusOptionsT
  ) {
    this.bus = bus;
    this.uniqueName = uniqueName;
    this.logger = options.logger;
    this.destination = options.destination ?? PORTAL_BUS_NAME;
    this.bus.on("message", this.onMessage);
    this.bus.on("error", this.onError);
  }

  /**
   * Connect to the session bus and wait for the Hello reply
   */
  static async connect(options: DbusNextBusOptionsT): Promise<DbusNextBus> {
    const busOptions: SessionBusOptionsT = {
      busAddress: options.busAddress,
      negotiateUnixFd: true,
    };
    const bus = dbus.sessionBus(busOptions);

    let uniqueName: string;
    try {
      uniqueName = await waitForUniqueName(bus);
    } catch (error) {
      bus.disconnect();
      throw error;
    }

    options.logger.info(
      `[DbusNextBus] Connected to session bus as ${uniqueName}`
    );
    const unixFdSupport = options.unixFdSupport ?? hasUnixFdSupport;
    if (!unixFdSupport()) {
      options.logger.warn(
        "[DbusNextBus] usocket is not installed, device fds granted by the portal cannot be received"
      );
    }
    return new DbusNextBus(bus, uniqueName, options);
  }

  async call(call: BusCallT): Promise<unknown[]> {
    const reply = await this.send(
      new dbus.Message({
        destination: this.destination,
        path: call.path,
        interface: call.interface,
        member: call.member,
        signature: call.signature ?? "",
        body: call.body ?? [],
      })
    );
    return reply ? reply.body : [];
  }

  subscribeSignal(match: SignalMatchT, handler: SignalHandlerT): number {
    const id = this.nextSubscriptionId++;
    const rule = buildMatchRule(this.destination, match);
    this.subscriptions.set(id, { match, handler, rule });
    this.updateMatch("AddMatch", rule);
    return id;
  }

  unsubscribeSignal(id: number): void {
    const subscription = this.subscriptions.get(id);
    if (!subscription) {
      return;
    }
    this.subscriptions.delete(id);
    this.updateMatch("RemoveMatch", subscription.rule);
  }

  disconnect(): void {
    this.bus.off("message", this.onMessage);
    this.subscriptions.clear();
    this.rejectPending(new Error("Session bus disconnected"));
    this.bus.disconnect();
    this.logger.info("[DbusNextBus] Disconnected from session bus");
  }

  private send(message: Message): Promise<Message | null> {
    const failure = this.failure;
    if (failure) {
      return Promise.reject(failure);
    }
    return new Promise<Message | null>((resolve, reject) => {
      this.pending.add(reject);
      void this.bus
        .call(message)
        .then(resolve, reject)
        .finally(() => {
          this.pending.delete(reject);
        });
    });
  }

  private fail(error: Error): void {
    this.logger.error({ err: error }, "[DbusNextBus] Session bus connection failed");
    this.rejectPending(
      new Error(`Session bus connection failed: ${error.message}`)
    );
  }

  private rejectPending(failure: Error): void {
    if (!this.failure) {
      this.failure = failure;
    }
    const pending = [...this.pending];
    this.pending.clear();
    for (const reject of pending) {
      reject(failure);
    }
  }

  private updateMatch(member: "AddMatch" | "RemoveMatch", rule: string): void {
    if (this.failure) {
      return;
    }
    this.bus
      .call(
        new dbus.Message({
          destination: DBUS_NAME,
          path: DBUS_PATH,
          interface: DBUS_NAME,
          member,
          signature: "s",
          body: [rule],
        })
      )
      .catch((error: unknown) => {
        this.logger.warn({ err: error, rule }, `[DbusNextBus] ${member} failed`);
      });
  }

  private dispatch(message: Message): void {
    if (message.type !== dbus.MessageType.SIGNAL) {
      return;
    }

    for (const { match, handler } of [...this.subscriptions.values()]) {
      if (
        match.interface !== message.interface ||
        match.member !== message.member ||
        (match.path !== undefined && match.path !== message.path)
      ) {
        continue;
      }
      try {
        handler({
          sender: message.sender,
          path: message.path,
          interface: message.interface,
          member: message.member,
          body: message.body,
        });
      } catch (error) {
        this.logger.error(
          { err: error, member: message.member, path: message.path },
          "[DbusNextBus] Signal handler threw"
        );
      }
    }
  }
}
