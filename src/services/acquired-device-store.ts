import { closeSync } from "node:fs";
import type { PortalLoggerT } from "../portal/portal-logger.js";
import type { AcquiredDeviceT } from "../portal/usb-device.js";

export type StoredDeviceT = {
  id: string;
  fd: number;
  acquiredAt: number;
};

export type AcquiredDeviceStoreOptionsT = {
  logger: PortalLoggerT;
  closeFd?: (fd: number) => void;
  now?: () => number;
};

/**
 * File descriptors granted by the portal, keyed by device id.
 *
 * The store owns every fd it holds and closes it on removal.
 */
export class AcquiredDeviceStore {
  private devices = new Map<string, StoredDeviceT>();
  private readonly logger: PortalLoggerT;
  private readonly closeFd: (fd: number) => void;
  private readonly now: () => number;

  constructor(options: AcquiredDeviceStoreOptionsT) {
    this.logger = options.logger;
    this.closeFd = options.closeFd ?? closeSync;
    this.now = options.now ?? Date.now;
  }

  /**
   * Keep the granted devices of a batch, failed entries are skipped.
   * A device acquired twice keeps the newer fd.
   */
  add(devices: readonly AcquiredDeviceT[]): StoredDeviceT[] {
    const stored: StoredDeviceT[] = [];
    for (const device of devices) {
      if (!device.success || device.fd < 0) {
        continue;
      }
      const previous = this.devices.get(device.id);
      if (previous && previous.fd !== device.fd) {
        this.close(previous);
      }
      const entry = { id: device.id, fd: device.fd, acquiredAt: this.now() };
      this.devices.set(device.id, entry);
      stored.push(entry);
    }
    return stored;
  }

  /**
   * Close the fds of granted devices that will not be kept, e.g. from an
   * acquire that failed halfway. Held entries are left alone.
   * @returns Ids the portal should be told to release
   */
  discard(devices: readonly AcquiredDeviceT[]): string[] {
    const unheld: string[] = [];
    for (const device of devices) {
      if (!device.success || device.fd < 0) {
        continue;
      }
      const held = this.devices.get(device.id);
      if (held && held.fd === device.fd) {
        continue;
      }
      this.close({ id: device.id, fd: device.fd, acquiredAt: this.now() });
      if (!held) {
        unheld.push(device.id);
      }
    }
    return unheld;
  }

  get(id: string): StoredDeviceT | null {
    return this.devices.get(id) ?? null;
  }

  list(): StoredDeviceT[] {
    return [...this.devices.values()];
  }

  getIds(): string[] {
    return [...this.devices.keys()];
  }

  /**
   * Close and forget the given devices
   * @returns Ids that were stored
   */
  remove(ids: readonly string[]): string[] {
    const removed: string[] = [];
    for (const id of ids) {
      const entry = this.devices.get(id);
      if (!entry) {
        continue;
      }
      this.devices.delete(id);
      this.close(entry);
      removed.push(id);
    }
    return removed;
  }

  removeAll(): string[] {
    return this.remove(this.getIds());
  }

  get size(): number {
    return this.devices.size;
  }

  private close(entry: StoredDeviceT): void {
    try {
      this.closeFd(entry.fd);
    } catch (error) {
      this.logger.warn(
        { err: error, deviceId: entry.id, fd: entry.fd },
        "[AcquiredDeviceStore] Failed to close device fd"
      );
    }
  }
}
