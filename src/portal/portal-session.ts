import { EventEmitter } from "node:events";
import type { PortalBus } from "./portal-bus.js";
import type { PortalLoggerT } from "./portal-logger.js";
import type { SessionRegistry } from "./session-registry.js";
import { SESSION_INTERFACE } from "./portal-constants.js";
import { createTransportError } from "./portal-errors.js";

export type PortalSessionStateT = "active" | "closed";

export type PortalSessionOptionsT = {
  bus: PortalBus;
  logger: PortalLoggerT;
  registry: SessionRegistry;
  path: string;
};

/**
 * Broker-tracked session, identified by its object path.
 *
 * Registers itself in the registry on construction and follows the
 * portal's Session.Closed signal for its path.
 */
export class PortalSession extends EventEmitter {
  readonly path: string;
  private readonly bus: PortalBus;
  private readonly logger: PortalLoggerT;
  private readonly registry: SessionRegistry;
  private state: PortalSessionStateT = "active";
  private destroyed = false;
  private closedSignalId = 0;

  constructor(options: PortalSessionOptionsT) {
    super();
    this.bus = options.bus;
    this.logger = options.logger;
    this.registry = options.registry;
    this.path = options.path;

    this.registry.register(this);
    this.closedSignalId = this.bus.subscribeSignal(
      { interface: SESSION_INTERFACE, member: "Closed", path: this.path },
      () => {
        this.logger.info(
          { sessionPath: this.path },
          "[PortalSession] Session closed by portal"
        );
        this.markClosed();
      }
    );
  }

  getState(): PortalSessionStateT {
    return this.state;
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Whether a USB session is attached. Does not keep it alive.
   */
  hasUsbSession(): boolean {
    return this.registry.getUsbSession(this.path) !== null;
  }

  /**
   * Subscribe to session close
   * @returns Unsubscribe function
   */
  onClosed(callback: () => void): () => void {
    this.on("closed", callback);
    return () => {
      this.off("closed", callback);
    };
  }

  /**
   * Close the session on the portal.
   *
   * The session counts as closed locally even if the call fails.
   */
  async close(): Promise<void> {
    if (this.state === "closed") {
      return;
    }
    this.markClosed();

    try {
      await this.bus.call({
        path: this.path,
        interface: SESSION_INTERFACE,
        member: "Close",
      });
    } catch (error) {
      throw createTransportError("Session.Close", error, {
        sessionPath: this.path,
      });
    }
  }

  /**
   * Release the local session object.
   *
   * A USB session must be closed first; if one is still attached the
   * misuse is logged and its backlink dropped.
   */
  destroy(): void {
    if (this.destroyed) {
      return;
    }

    const usbSession = this.registry.getUsbSession(this.path);
    if (usbSession) {
      this.logger.error(
        { sessionPath: this.path, lifecycleViolation: true },
        "[PortalSession] Session destroyed while its USB session is still attached; close the USB session first"
      );
      this.registry.detachUsbSession(this.path, usbSession);
    }

    this.unsubscribeClosed();
    this.registry.unregister(this.path);
    this.state = "closed";
    this.destroyed = true;
    this.removeAllListeners();
  }

  private markClosed(): void {
    if (this.state === "closed") {
      return;
    }
    this.state = "closed";
    this.unsubscribeClosed();
    this.emit("closed");
  }

  private unsubscribeClosed(): void {
    if (this.closedSignalId !== 0) {
      this.bus.unsubscribeSignal(this.closedSignalId);
      this.closedSignalId = 0;
    }
  }
}
