import { EventEmitter } from "node:events";
import type { BusSignalT, PortalBus } from "./portal-bus.js";
import type { PortalLoggerT } from "./portal-logger.js";
import type { PortalSession } from "./portal-session.js";
import type { SessionRegistry } from "./session-registry.js";
import type { UsbDeviceEventT } from "./usb-device.js";
import { USB_INTERFACE } from "./portal-constants.js";
import { decodeDeviceEvents, type DeviceEventsSignalT } from "./wire-codec.js";

export type UsbSessionStateT = "active" | "closed";

export type UsbSessionOptionsT = {
  bus: PortalBus;
  logger: PortalLoggerT;
  registry: SessionRegistry;
  session: PortalSession;
};

/**
 * USB monitoring session built over a PortalSession.
 *
 * Owns its PortalSession and the DeviceEvents subscription. Teardown
 * happens once, through close(), dispose() or the portal closing the
 * session. It clears the registry backlink first, then destroys the
 * PortalSession; after that getSession() returns null.
 */
export class UsbSession extends EventEmitter {
  readonly sessionPath: string;
  private readonly bus: PortalBus;
  private readonly logger: PortalLoggerT;
  private readonly registry: SessionRegistry;
  private session: PortalSession | null;
  private state: UsbSessionStateT = "active";
  private deviceEventsSignalId = 0;
  private detachSessionClosed: (() => void) | null = null;

  constructor(options: UsbSessionOptionsT) {
    super();
    this.bus = options.bus;
    this.logger = options.logger;
    this.registry = options.registry;
    this.session = options.session;
    this.sessionPath = options.session.path;

    this.registry.attachUsbSession(this.sessionPath, this);
    this.detachSessionClosed = options.session.onClosed(() => {
      this.handleSessionClosed();
    });
    // DeviceEvents is not path scoped; events for other sessions are dropped.
    this.deviceEventsSignalId = this.bus.subscribeSignal(
      { interface: USB_INTERFACE, member: "DeviceEvents" },
      (signal) => {
        this.handleDeviceEvents(signal);
      }
    );
  }

  getState(): UsbSessionStateT {
    return this.state;
  }

  /**
   * Underlying portal session, null once closed
   */
  getSession(): PortalSession | null {
    return this.session;
  }

  /**
   * Subscribe to device events
   * @returns Unsubscribe function
   */
  onDeviceEvent(callback: (events: UsbDeviceEventT[]) => void): () => void {
    this.on("device-event", callback);
    return () => {
      this.off("device-event", callback);
    };
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
   * Tear down locally, then close and release the portal session
   */
  async close(): Promise<void> {
    if (this.state === "closed") {
      return;
    }
    const session = this.teardown();
    if (session) {
      const closing = session.close();
      session.destroy();
      await closing;
    }
  }

  /**
   * Same effect as close() without waiting for the portal
   */
  dispose(): void {
    if (this.state === "closed") {
      return;
    }
    const session = this.teardown();
    if (session) {
      session.close().catch((error: unknown) => {
        this.logger.warn(
          { err: error, sessionPath: this.sessionPath },
          "[UsbSession] Session.Close failed during dispose"
        );
      });
      session.destroy();
    }
  }

  private handleSessionClosed(): void {
    if (this.state === "closed") {
      return;
    }
    this.logger.info(
      { sessionPath: this.sessionPath },
      "[UsbSession] Portal session closed"
    );
    this.teardown()?.destroy();
  }

  private handleDeviceEvents(signal: BusSignalT): void {
    if (this.state === "closed") {
      return;
    }

    let decoded: DeviceEventsSignalT;
    try {
      decoded = decodeDeviceEvents(signal.body);
    } catch (error) {
      this.logger.warn(
        { err: error, sessionPath: this.sessionPath },
        "[UsbSession] Dropping malformed DeviceEvents signal"
      );
      return;
    }

    if (decoded.sessionPath !== this.sessionPath) {
      this.logger.debug(
        { sessionPath: this.sessionPath, eventSessionPath: decoded.sessionPath },
        "[UsbSession] Ignoring device events for another session"
      );
      return;
    }

    this.emit("device-event", decoded.events);
  }

  /**
   * @returns The portal session if it is still alive, for the caller to release
   */
  private teardown(): PortalSession | null {
    this.state = "closed";

    if (this.deviceEventsSignalId !== 0) {
      this.bus.unsubscribeSignal(this.deviceEventsSignalId);
      this.deviceEventsSignalId = 0;
    }

    if (this.detachSessionClosed) {
      this.detachSessionClosed();
      this.detachSessionClosed = null;
    }

    const session = this.session;
    this.session = null;
    this.registry.detachUsbSession(this.sessionPath, this);
    this.emit("closed");

    if (!session || session.isDestroyed()) {
      this.logger.error(
        { sessionPath: this.sessionPath, lifecycleViolation: true },
        "[UsbSession] Portal session destroyed before its USB session; session references were lost"
      );
      return null;
    }
    return session;
  }
}
