import type { AcquiredDeviceT } from "./usb-device.js";

/**
 * Portal error codes
 */
export enum PortalErrorCode {
  // The bus call itself failed
  TRANSPORT_FAILED = "TRANSPORT_FAILED",
  PARENT_EXPORT_FAILED = "PARENT_EXPORT_FAILED",

  // Broker replied, but denied or failed the request
  REQUEST_FAILED = "REQUEST_FAILED",
  CANCELLED = "CANCELLED",

  // Protocol errors
  INVALID_RESPONSE = "INVALID_RESPONSE",
  FINISH_LIMIT_EXCEEDED = "FINISH_LIMIT_EXCEEDED",
}

/**
 * Portal error class with structured error information
 */
export class PortalError extends Error {
  public readonly code: PortalErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: PortalErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PortalError";
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON-serializable object
   */
  toJSON(): {
    code: PortalErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Narrow an unknown value to a PortalError, optionally of a given code.
 */
export function isPortalError(
  error: unknown,
  code?: PortalErrorCode
): error is PortalError {
  return (
    error instanceof PortalError && (code === undefined || error.code === code)
  );
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create transport failure error
 */
export function createTransportError(
  member: string,
  cause: unknown,
  details?: Record<string, unknown>
): PortalError {
  return new PortalError(
    PortalErrorCode.TRANSPORT_FAILED,
    `${member} call failed: ${describeCause(cause)}`,
    { member, ...details, cause: describeCause(cause) }
  );
}

/**
 * Create finish page failure error
 */
export function createFinishPageError(
  requestPath: string,
  page: number,
  cause: unknown,
  collected: AcquiredDeviceT[] = []
): PortalError {
  return new PortalError(
    PortalErrorCode.TRANSPORT_FAILED,
    `AcquireDevicesFinish page ${page} for ${requestPath} failed: ${describeCause(cause)}`,
    {
      member: "AcquireDevicesFinish",
      requestPath,
      page,
      cause: describeCause(cause),
      devices: collected,
    }
  );
}

/**
 * Create parent window export error
 */
export function createParentExportError(cause: unknown): PortalError {
  return new PortalError(
    PortalErrorCode.PARENT_EXPORT_FAILED,
    `Failed to export parent window: ${describeCause(cause)}`,
    { cause: describeCause(cause) }
  );
}

/**
 * Create cancellation error
 */
export function createCancelledError(
  operation: string,
  byCaller: boolean
): PortalError {
  return new PortalError(
    PortalErrorCode.CANCELLED,
    byCaller
      ? `${operation} call canceled by caller`
      : `${operation} canceled`,
    { operation, byCaller }
  );
}

/**
 * Create request failed error (broker denied or failed)
 */
export function createRequestFailedError(
  operation: string,
  status: number
): PortalError {
  return new PortalError(
    PortalErrorCode.REQUEST_FAILED,
    `${operation} failed`,
    { operation, status }
  );
}

/**
 * Create invalid response error
 */
export function createInvalidResponseError(
  member: string,
  reason: string
): PortalError {
  return new PortalError(
    PortalErrorCode.INVALID_RESPONSE,
    `Invalid ${member} payload: ${reason}`,
    { member }
  );
}

/**
 * Create finish limit error
 */
export function createFinishLimitError(
  requestPath: string,
  maxPages: number,
  collected: AcquiredDeviceT[] = []
): PortalError {
  return new PortalError(
    PortalErrorCode.FINISH_LIMIT_EXCEEDED,
    `AcquireDevicesFinish for ${requestPath} did not finish within ${maxPages} pages`,
    { requestPath, maxPages, devices: collected }
  );
}

function isAcquiredDevice(value: unknown): value is AcquiredDeviceT {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "success" in value &&
    typeof value.success === "boolean" &&
    "fd" in value &&
    typeof value.fd === "number"
  );
}

/**
 * Devices a failed AcquireDevicesFinish loop collected before it stopped.
 * Their fds are open and the portal considers them acquired.
 */
export function getCollectedDevices(error: unknown): AcquiredDeviceT[] {
  if (!isPortalError(error)) {
    return [];
  }
  const devices = error.details?.devices;
  return Array.isArray(devices) ? devices.filter(isAcquiredDevice) : [];
}
