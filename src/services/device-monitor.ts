import { EventEmitter } from "node:events";
import type { PortalLoggerT } from "../portal/portal-logger.js";
import { isPortalError, PortalErrorCode } from "../portal/portal-errors.js";
import type { UsbDeviceEventT } from "../portal/usb-device.js";
import type { UsbPortal } from "../portal/usb-portal.js";
import type { UsbSession } from "../portal/usb-session.js";
import { toJsonObject } from "../utils/json-value.js";
import type {
  MonitorStateT,
  WebSocketManager,
  WebSocketMessageT,
} from "./websocket-manager.js";

export type DeviceMonitorOptionsT = {
  portal: Pick<UsbPortal, "createSession">;
  websocketManager: WebSocketManager;
  logger: PortalLoggerT;
};

/**
 * Keeps one USB session open and forwards its device events to
 * WebSocket subscribers of the "devices" topic.
 */
export class DeviceMonitor extends EventEmitter {
  private readonly portal: Pick<UsbPortal, "createSession">;
  private readonly websocketManager: WebSocketManager;
  private readonly logger: PortalLoggerT;
  private state: MonitorStateT = "idle";
  private lastError: string | null = null;
  private session: UsbSession | null = null;
  private abortController: AbortController | null = null;

  constructor(options: DeviceMonitorOptionsT) {
    super();
    this.portal = options.portal;
    this.websocketManager = options.websocketManager;
    this.logger = options.logger;
  }

  getState(): MonitorStateT {
    return this.state;
  }

  getSessionPath(): string | null {
    return this.session ? this.session.sessionPath : null;
  }

  /**
   * Message describing the current session state
   */
  getSnapshot(): WebSocketMessageT {
    return {
      type: "devices.session",
      state: this.state,
      sessionPath: this.getSessionPath(),
      ...(this.lastError !== null && { error: this.lastError }),
    };
  }

  /**
   * Subscribe to state changes
   * @returns Unsubscribe function
   */
  onStateChange(callback: (state: MonitorStateT) => void): () => void {
    this.on("state", callback);
    return () => {
      this.off("state", callback);
    };
  }

  /**
   * Open the USB session. Failures are recorded in the state, not thrown.
   */
  async start(): Promise<void> {
    if (this.state === "starting" || this.state === "active") {
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.lastError = null;
    this.setState("starting");

    let session: UsbSession;
    try {
      session = await this.portal.createSession({ signal: controller.signal });
    } catch (error) {
      this.abortController = null;
      if (isPortalError(error, PortalErrorCode.CANCELLED)) {
        this.setState("closed");
        return;
      }
      this.lastError = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: error }, "[DeviceMonitor] Failed to create USB session");
      this.setState("error");
      return;
    }

    this.abortController = null;
    this.session = session;
    session.onDeviceEvent((events) => {
      this.forwardEvents(session.sessionPath, events);
    });
    session.onClosed(() => {
      if (this.session === session) {
        this.session = null;
        this.setState("closed");
      }
    });
    this.logger.info(
      { sessionPath: session.sessionPath },
      "[DeviceMonitor] Monitoring USB devices"
    );
    this.setState("active");
  }

  /**
   * Cancel a pending start or close the open session
   */
  async stop(): Promise<void> {
    if (this.abortController) {
      this.abortController.abort();
      this.abortController = null;
    }

    const session = this.session;
    if (!session) {
      return;
    }

    try {
      await session.close();
    } catch (error) {
      this.logger.warn(
        { err: error, sessionPath: session.sessionPath },
        "[DeviceMonitor] Session close failed"
      );
    }
    // close() emits "closed" synchronously, which already reset the state
    if (this.session === session) {
      this.session = null;
      this.setState("closed");
    }
  }

  private forwardEvents(sessionPath: string, events: UsbDeviceEventT[]): void {
    this.logger.debug(
      { sessionPath, count: events.length },
      "[DeviceMonitor] Device events"
    );
    this.websocketManager.broadcast("devices", {
      type: "devices.event",
      sessionPath,
      events: events.map((event) => toJsonObject(event)),
    });
  }

  private setState(state: MonitorStateT): void {
    if (this.state === state) {
      return;
    }
    this.state = state;
    this.emit("state", state);
    this.websocketManager.broadcast("devices", this.getSnapshot());
  }
}
