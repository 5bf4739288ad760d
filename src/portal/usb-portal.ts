import type { PortalBus } from "./portal-bus.js";
import type { PortalLoggerT } from "./portal-logger.js";
import type { ParentWindow } from "./parent-window.js";
import { AcquireDevicesCall } from "./acquire-devices-call.js";
import { CallContext } from "./call-context.js";
import {
  DEFAULT_FINISH_MAX_PAGES,
  PORTAL_OBJECT_PATH,
  SESSION_INTERFACE,
  USB_INTERFACE,
} from "./portal-constants.js";
import {
  createFinishLimitError,
  createFinishPageError,
  createTransportError,
  isPortalError,
  PortalError,
  toError,
} from "./portal-errors.js";
import { PortalSession } from "./portal-session.js";
import { RequestTokenSource } from "./request-token.js";
import { SessionRegistry } from "./session-registry.js";
import type {
  AcquireDevicesRequestT,
  AcquiredDeviceT,
  DeviceAcquireRequest,
  UsbDeviceInfoT,
} from "./usb-device.js";
import { UsbSession } from "./usb-session.js";
import {
  decodeEnumerateReply,
  decodeFinishPage,
  decodeObjectPathReply,
  stringVariant,
  type FinishPageT,
} from "./wire-codec.js";

export type UsbPortalOptionsT = {
  bus: PortalBus;
  logger: PortalLoggerT;
  registry?: SessionRegistry;
  tokens?: RequestTokenSource;
  /**
   * Upper bound on AcquireDevicesFinish round trips per request
   */
  finishMaxPages?: number;
};

export type CallOptionsT = {
  signal?: AbortSignal;
};

/**
 * Client for the portal's USB interface.
 *
 * One instance per bus connection. Every call gets its own CallContext;
 * the instance only shares the bus, the token source and the session
 * registry between them.
 */
export class UsbPortal {
  private readonly bus: PortalBus;
  private readonly logger: PortalLoggerT;
  private readonly registry: SessionRegistry;
  private readonly tokens: RequestTokenSource;
  private readonly finishMaxPages: number;

  constructor(options: UsbPortalOptionsT) {
    this.bus = options.bus;
    this.logger = options.logger;
    this.registry = options.registry ?? new SessionRegistry();
    this.tokens = options.tokens ?? new RequestTokenSource();
    this.finishMaxPages = options.finishMaxPages ?? DEFAULT_FINISH_MAX_PAGES;
    if (!Number.isInteger(this.finishMaxPages) || this.finishMaxPages < 1) {
      throw new Error(
        `finishMaxPages must be a positive integer, got ${this.finishMaxPages}`
      );
    }
  }

  getRegistry(): SessionRegistry {
    return this.registry;
  }

  /**
   * Create a session that receives USB device events
   */
  createSession(options: CallOptionsT = {}): Promise<UsbSession> {
    const context = new CallContext<UsbSession>({
      bus: this.bus,
      logger: this.logger,
      operation: "CreateSession",
      signal: options.signal,
    });

    context.attachCancellation();
    if (!context.isSettled) {
      this.sendCreateSession(context).catch((error: unknown) => {
        context.reject(toError(error));
      });
    }
    return context.promise;
  }

  /**
   * List devices the portal is willing to expose
   */
  async enumerateDevices(): Promise<UsbDeviceInfoT[]> {
    let reply: unknown[];
    try {
      reply = await this.bus.call({
        path: PORTAL_OBJECT_PATH,
        interface: USB_INTERFACE,
        member: "EnumerateDevices",
        signature: "a{sv}",
        body: [{}],
      });
    } catch (error) {
      throw createTransportError("EnumerateDevices", error);
    }

    const devices = decodeEnumerateReply(reply);
    this.logger.debug(`[UsbPortal] Enumerated ${devices.length} devices`);
    return devices;
  }

  /**
   * Ask the portal for access to a batch of devices.
   *
   * Resolves once the portal answers the request. The returned handle
   * goes to finishAcquireDevices() to collect the file descriptors.
   */
  acquireDevices(
    parent: ParentWindow | null,
    devices: readonly DeviceAcquireRequest[],
    options: CallOptionsT = {}
  ): Promise<AcquireDevicesRequestT> {
    const call = new AcquireDevicesCall({
      bus: this.bus,
      logger: this.logger,
      tokens: this.tokens,
      parent,
      devices,
      signal: options.signal,
    });
    return call.start();
  }

  /**
   * Drain AcquireDevicesFinish for a request, one page per round trip.
   *
   * Stops when the portal reports `finished`; a failed page aborts
   * without retrying. The devices collected so far travel on the error
   * (see getCollectedDevices) so the caller can close and release them.
   */
  async finishAcquireDevices(
    request: AcquireDevicesRequestT | string
  ): Promise<AcquiredDeviceT[]> {
    const requestPath =
      typeof request === "string" ? request : request.requestPath;
    const devices: AcquiredDeviceT[] = [];

    for (let page = 1; page <= this.finishMaxPages; page++) {
      let reply: unknown[];
      try {
        reply = await this.bus.call({
          path: PORTAL_OBJECT_PATH,
          interface: USB_INTERFACE,
          member: "AcquireDevicesFinish",
          signature: "oa{sv}",
          body: [requestPath, {}],
        });
      } catch (error) {
        throw createFinishPageError(requestPath, page, error, devices);
      }

      let decoded: FinishPageT;
      try {
        decoded = decodeFinishPage(reply);
      } catch (error) {
        if (isPortalError(error) && devices.length > 0) {
          throw new PortalError(error.code, error.message, {
            ...error.details,
            devices,
          });
        }
        throw error;
      }
      const { devices: pageDevices, finished } = decoded;
      devices.push(...pageDevices);

      if (finished) {
        this.logger.debug(
          { requestPath, pages: page, devices: devices.length },
          "[UsbPortal] AcquireDevicesFinish completed"
        );
        return devices;
      }
    }

    throw createFinishLimitError(requestPath, this.finishMaxPages, devices);
  }

  /**
   * Tell the portal the devices are no longer used
   */
  async releaseDevices(deviceIds: readonly string[]): Promise<void> {
    try {
      await this.bus.call({
        path: PORTAL_OBJECT_PATH,
        interface: USB_INTERFACE,
        member: "ReleaseDevices",
        signature: "as",
        body: [[...deviceIds]],
      });
    } catch (error) {
      throw createTransportError("ReleaseDevices", error, {
        deviceIds: [...deviceIds],
      });
    }
    this.logger.debug(`[UsbPortal] Released ${deviceIds.length} devices`);
  }

  private async sendCreateSession(
    context: CallContext<UsbSession>
  ): Promise<void> {
    const token = this.tokens.next();

    let reply: unknown[];
    try {
      reply = await this.bus.call({
        path: PORTAL_OBJECT_PATH,
        interface: USB_INTERFACE,
        member: "CreateSession",
        signature: "a{sv}",
        body: [{ session_handle_token: stringVariant(token) }],
      });
    } catch (error) {
      context.reject(createTransportError("CreateSession", error));
      return;
    }

    const sessionPath = decodeObjectPathReply("CreateSession", reply);
    if (context.isSettled) {
      this.logger.info(
        { sessionPath },
        "[UsbPortal] Session created after cancellation, closing it"
      );
      this.closeOrphanedSession(sessionPath);
      return;
    }

    const session = new PortalSession({
      bus: this.bus,
      logger: this.logger,
      registry: this.registry,
      path: sessionPath,
    });
    let usbSession: UsbSession;
    try {
      usbSession = new UsbSession({
        bus: this.bus,
        logger: this.logger,
        registry: this.registry,
        session,
      });
    } catch (error) {
      session.destroy();
      throw error;
    }

    this.logger.info({ sessionPath }, "[UsbPortal] USB session created");
    context.resolve(usbSession);
  }

  private closeOrphanedSession(sessionPath: string): void {
    this.bus
      .call({ path: sessionPath, interface: SESSION_INTERFACE, member: "Close" })
      .catch((error: unknown) => {
        this.logger.debug(
          { err: error, sessionPath },
          "[UsbPortal] Closing orphaned session failed"
        );
      });
  }
}
