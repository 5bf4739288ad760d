import type { BusSignalT, PortalBus } from "./portal-bus.js";
import type { PortalLoggerT } from "./portal-logger.js";
import type { ParentWindow } from "./parent-window.js";
import type { RequestTokenSource } from "./request-token.js";
import { CallContext } from "./call-context.js";
import {
  PORTAL_OBJECT_PATH,
  RESPONSE_CANCELLED,
  RESPONSE_SUCCESS,
  USB_INTERFACE,
} from "./portal-constants.js";
import {
  createCancelledError,
  createParentExportError,
  createRequestFailedError,
  createTransportError,
  toError,
} from "./portal-errors.js";
import { requestPathFor } from "./request-token.js";
import type { AcquireDevicesRequestT, DeviceAcquireRequest } from "./usb-device.js";
import {
  decodeAcquireResults,
  decodeObjectPathReply,
  decodeResponseSignal,
  encodeAcquireRequests,
  stringVariant,
} from "./wire-codec.js";

const OPERATION = "AcquireDevices";

export type AcquireStateT =
  | "need-parent-handle"
  | "request-sent"
  | "awaiting-response"
  | "resolved";

export type AcquireDevicesCallOptionsT = {
  bus: PortalBus;
  logger: PortalLoggerT;
  tokens: RequestTokenSource;
  parent: ParentWindow | null;
  devices: readonly DeviceAcquireRequest[];
  signal?: AbortSignal;
};

/**
 * AcquireDevices workflow: parent export, request, Response.
 *
 * The request is only sent once a parent handle is known, and the
 * Response subscription always exists before the request leaves.
 */
export class AcquireDevicesCall {
  private state: AcquireStateT | null = null;
  private readonly bus: PortalBus;
  private readonly logger: PortalLoggerT;
  private readonly tokens: RequestTokenSource;
  private readonly parent: ParentWindow | null;
  private readonly devices: DeviceAcquireRequest[];
  private readonly context: CallContext<AcquireDevicesRequestT>;

  constructor(options: AcquireDevicesCallOptionsT) {
    this.bus = options.bus;
    this.logger = options.logger;
    this.tokens = options.tokens;
    this.parent = options.parent;
    this.devices = options.devices.map((device) => device.copy());
    this.context = new CallContext<AcquireDevicesRequestT>({
      bus: options.bus,
      logger: options.logger,
      operation: OPERATION,
      signal: options.signal,
    });
    this.context.onTeardown(() => {
      this.state = "resolved";
    });
  }

  /**
   * Current workflow state, null before start()
   */
  getState(): AcquireStateT | null {
    return this.state;
  }

  start(): Promise<AcquireDevicesRequestT> {
    this.context.attachCancellation();
    if (!this.context.isSettled) {
      this.run().catch((error: unknown) => {
        this.context.reject(toError(error));
      });
    }
    return this.context.promise;
  }

  private async run(): Promise<void> {
    let handle: string | null = "";
    if (this.parent) {
      handle =
        this.parent.exportedHandle !== undefined
          ? this.parent.exportedHandle
          : await this.exportParent(this.parent);
    }
    if (handle === null || this.context.isSettled) {
      return;
    }
    await this.submit(handle);
  }

  private async exportParent(parent: ParentWindow): Promise<string | null> {
    this.state = "need-parent-handle";
    this.logger.debug("[AcquireDevices] Exporting parent window");

    let handle: string;
    try {
      handle = await parent.export();
    } catch (error) {
      this.context.reject(createParentExportError(error));
      return null;
    }

    const unexport = parent.unexport;
    if (unexport) {
      // Runs immediately when the caller already cancelled.
      this.context.onTeardown(() => unexport.call(parent));
    }
    return handle;
  }

  private async submit(parentHandle: string): Promise<void> {
    const token = this.tokens.next();
    const expectedPath = requestPathFor(this.bus.uniqueName, token);
    const onResponse = (signal: BusSignalT) => {
      this.handleResponse(signal);
    };

    this.context.subscribeResponse(expectedPath, onResponse);
    this.state = "request-sent";
    this.logger.debug(
      { requestPath: expectedPath, devices: this.devices.length },
      "[AcquireDevices] Sending request"
    );

    let reply: unknown[];
    try {
      reply = await this.bus.call({
        path: PORTAL_OBJECT_PATH,
        interface: USB_INTERFACE,
        member: OPERATION,
        signature: "sa(sa{sv})a{sv}",
        body: [
          parentHandle,
          encodeAcquireRequests(this.devices),
          { handle_token: stringVariant(token) },
        ],
      });
    } catch (error) {
      this.context.reject(createTransportError(OPERATION, error));
      return;
    }

    if (this.context.isSettled) {
      if (this.context.wasCancelled) {
        this.closeReturnedRequest(expectedPath, reply);
      }
      return;
    }

    const requestPath = decodeObjectPathReply(OPERATION, reply);
    if (requestPath !== expectedPath) {
      this.logger.debug(
        { expectedPath, requestPath },
        "[AcquireDevices] Portal returned a different request path"
      );
      this.context.subscribeResponse(requestPath, onResponse);
    }
    this.state = "awaiting-response";
  }

  /**
   * The caller cancelled while AcquireDevices was in flight, so Close went
   * to the expected path. Close the path the portal actually returned too.
   */
  private closeReturnedRequest(expectedPath: string, reply: unknown[]): void {
    let requestPath: string;
    try {
      requestPath = decodeObjectPathReply(OPERATION, reply);
    } catch (error) {
      this.logger.debug(
        { err: error, expectedPath },
        "[AcquireDevices] Undecodable reply after cancel"
      );
      return;
    }
    if (requestPath !== expectedPath) {
      this.context.closeRequest(requestPath);
    }
  }

  private handleResponse(signal: BusSignalT): void {
    try {
      const { status, results } = decodeResponseSignal(signal.body);

      if (status === RESPONSE_SUCCESS) {
        const requested = this.devices.map((device) => device.id);
        const { devices, unexpected } = decodeAcquireResults(requested, results);
        if (unexpected.length > 0) {
          this.logger.debug(
            { requestPath: signal.path, unexpected },
            "[AcquireDevices] Ignoring results for devices that were not requested"
          );
        }
        this.context.resolve({ requestPath: signal.path, requested, devices });
      } else if (status === RESPONSE_CANCELLED) {
        this.context.reject(createCancelledError("Acquire USB devices", false));
      } else {
        this.context.reject(createRequestFailedError("Acquire USB devices", status));
      }
    } catch (error) {
      this.context.reject(toError(error));
    }
  }
}
