import type { BusSignalT, PortalBus } from "./portal-bus.js";
import type { PortalLoggerT } from "./portal-logger.js";
import { REQUEST_INTERFACE } from "./portal-constants.js";
import { createCancelledError } from "./portal-errors.js";

export type CallContextOptionsT = {
  bus: PortalBus;
  logger: PortalLoggerT;
  /**
   * Operation name used in errors and logs, e.g. "AcquireDevices"
   */
  operation: string;
  signal?: AbortSignal;
};

/**
 * One in-flight portal operation.
 *
 * Owns the Response subscription on its request path and the abort hook,
 * and settles its promise exactly once. Settling tears everything down, so
 * no handler runs afterwards.
 */
export class CallContext<T> {
  readonly operation: string;
  readonly promise: Promise<T>;

  private readonly bus: PortalBus;
  private readonly logger: PortalLoggerT;
  private readonly signal: AbortSignal | undefined;
  private readonly resolvePromise: (value: T) => void;
  private readonly rejectPromise: (error: Error) => void;
  private settled = false;
  private cancelled = false;
  private responseSubscriptionId = 0;
  private requestPath: string | null = null;
  private detachCancelHook: (() => void) | null = null;
  private teardownHooks: Array<() => void> = [];

  constructor(options: CallContextOptionsT) {
    this.bus = options.bus;
    this.logger = options.logger;
    this.operation = options.operation;
    this.signal = options.signal;

    let resolvePromise: (value: T) => void = () => undefined;
    let rejectPromise: (error: Error) => void = () => undefined;
    this.promise = new Promise<T>((resolve, reject) => {
      resolvePromise = resolve;
      rejectPromise = reject;
    });
    this.resolvePromise = resolvePromise;
    this.rejectPromise = rejectPromise;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  /**
   * True when the context settled through cancel()
   */
  get wasCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Request path currently subscribed for Response, if any
   */
  get correlationPath(): string | null {
    return this.responseSubscriptionId !== 0 ? this.requestPath : null;
  }

  /**
   * Hook the caller's abort signal. An already aborted signal cancels
   * right away, so check `isSettled` before sending anything.
   */
  attachCancellation(): void {
    const signal = this.signal;
    if (!signal || this.settled || this.detachCancelHook) {
      return;
    }
    if (signal.aborted) {
      this.cancel();
      return;
    }

    const onAbort = () => {
      this.cancel();
    };
    signal.addEventListener("abort", onAbort, { once: true });
    this.detachCancelHook = () => {
      signal.removeEventListener("abort", onAbort);
    };
  }

  /**
   * Subscribe to Response on a request path.
   *
   * Must run before the request is sent. Calling it again moves the
   * subscription to the new path.
   */
  subscribeResponse(
    requestPath: string,
    handler: (signal: BusSignalT) => void
  ): void {
    if (this.settled) {
      return;
    }
    this.unsubscribeResponse();
    this.requestPath = requestPath;
    this.responseSubscriptionId = this.bus.subscribeSignal(
      { interface: REQUEST_INTERFACE, member: "Response", path: requestPath },
      (signal) => {
        if (this.settled) {
          return;
        }
        handler(signal);
      }
    );
  }

  /**
   * Run a hook once when the context tears down
   */
  onTeardown(hook: () => void): void {
    if (this.settled) {
      hook();
      return;
    }
    this.teardownHooks.push(hook);
  }

  resolve(value: T): boolean {
    if (!this.settle()) {
      return false;
    }
    this.resolvePromise(value);
    return true;
  }

  reject(error: Error): boolean {
    if (!this.settle()) {
      return false;
    }
    this.rejectPromise(error);
    return true;
  }

  /**
   * Cancel on behalf of the caller.
   *
   * Sends a best-effort Request.Close on the subscribed path; the broker's
   * answer is not awaited. No effect once settled.
   */
  cancel(): boolean {
    if (this.settled) {
      return false;
    }
    const requestPath = this.correlationPath;
    if (requestPath) {
      this.closeRequest(requestPath);
    }
    this.cancelled = true;
    return this.reject(createCancelledError(this.operation, true));
  }

  /**
   * Best-effort Request.Close; failures are only logged
   */
  closeRequest(requestPath: string): void {
    this.logger.debug(
      { requestPath, operation: this.operation },
      "[CallContext] Closing request"
    );
    this.bus
      .call({ path: requestPath, interface: REQUEST_INTERFACE, member: "Close" })
      .catch((error: unknown) => {
        this.logger.debug(
          { err: error, requestPath },
          "[CallContext] Request.Close failed"
        );
      });
  }

  private unsubscribeResponse(): void {
    if (this.responseSubscriptionId !== 0) {
      this.bus.unsubscribeSignal(this.responseSubscriptionId);
      this.responseSubscriptionId = 0;
    }
  }

  private settle(): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = true;

    this.unsubscribeResponse();
    if (this.detachCancelHook) {
      this.detachCancelHook();
      this.detachCancelHook = null;
    }

    const hooks = this.teardownHooks;
    this.teardownHooks = [];
    for (const hook of hooks) {
      try {
        hook();
      } catch (error) {
        this.logger.warn(
          { err: error, operation: this.operation },
          "[CallContext] Teardown hook failed"
        );
      }
    }
    return true;
  }
}
