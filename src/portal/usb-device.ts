/**
 * USB device value types exchanged with the portal
 */

/**
 * One item of a batch acquisition request.
 */
export class DeviceAcquireRequest {
  readonly id: string;
  readonly writable: boolean;

  constructor(id: string, writable: boolean) {
    this.id = id;
    this.writable = writable;
  }

  copy(): DeviceAcquireRequest {
    return new DeviceAcquireRequest(this.id, this.writable);
  }

  equals(other: DeviceAcquireRequest): boolean {
    return this.id === other.id && this.writable === other.writable;
  }
}

/**
 * Outcome of acquiring one device.
 *
 * `fd` is -1 unless `success` is true.
 */
export type AcquiredDeviceT = {
  id: string;
  success: boolean;
  fd: number;
  error?: string;
};

/**
 * Device reported by EnumerateDevices.
 */
export type UsbDeviceInfoT = {
  id: string;
  properties: Record<string, unknown>;
};

/**
 * Device hotplug event delivered to a USB session.
 */
export type UsbDeviceEventT = {
  action: string;
  id: string;
  properties: Record<string, unknown>;
};

/**
 * Handle returned by AcquireDevices, passed to finishAcquireDevices.
 */
export type AcquireDevicesRequestT = {
  requestPath: string;
  requested: string[];
  /**
   * Per-device outcomes carried by the Response signal, in request order
   */
  devices: AcquiredDeviceT[];
};

export const NO_FD = -1;

export function grantedDevice(id: string, fd: number): AcquiredDeviceT {
  return { id, success: true, fd };
}

export function failedDevice(id: string, error?: string): AcquiredDeviceT {
  return error === undefined
    ? { id, success: false, fd: NO_FD }
    : { id, success: false, fd: NO_FD, error };
}
