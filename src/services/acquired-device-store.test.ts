import { describe, expect, it, vi } from "vitest";
import { createTestLogger } from "../../test/test-helpers.js";
import { AcquiredDeviceStore } from "./acquired-device-store.js";

function setup() {
  const closeFd = vi.fn();
  const logger = createTestLogger();
  const store = new AcquiredDeviceStore({ logger, closeFd, now: () => 1000 });
  return { closeFd, logger, store };
}

describe("AcquiredDeviceStore", () => {
  it("keeps granted devices only", () => {
    const { store } = setup();

    const stored = store.add([
      { id: "usb:001", success: true, fd: 21 },
      { id: "usb:002", success: false, fd: -1, error: "denied" },
    ]);

    expect(stored).toEqual([{ id: "usb:001", fd: 21, acquiredAt: 1000 }]);
    expect(store.list()).toEqual(stored);
    expect(store.get("usb:002")).toBeNull();
    expect(store.size).toBe(1);
  });

  it("closes the previous fd when a device is acquired again", () => {
    const { closeFd, store } = setup();

    store.add([{ id: "usb:001", success: true, fd: 21 }]);
    store.add([{ id: "usb:001", success: true, fd: 22 }]);

    expect(closeFd).toHaveBeenCalledWith(21);
    expect(store.get("usb:001")).toEqual({ id: "usb:001", fd: 22, acquiredAt: 1000 });
  });

  it("closes fds of removed devices", () => {
    const { closeFd, store } = setup();
    store.add([
      { id: "usb:001", success: true, fd: 21 },
      { id: "usb:002", success: true, fd: 22 },
    ]);

    expect(store.remove(["usb:002", "usb:404"])).toEqual(["usb:002"]);
    expect(closeFd).toHaveBeenCalledTimes(1);
    expect(closeFd).toHaveBeenCalledWith(22);
    expect(store.getIds()).toEqual(["usb:001"]);

    expect(store.removeAll()).toEqual(["usb:001"]);
    expect(store.size).toBe(0);
  });

  it("closes discarded fds without keeping them", () => {
    const { closeFd, store } = setup();
    store.add([{ id: "usb:001", success: true, fd: 21 }]);

    const unheld = store.discard([
      { id: "usb:001", success: true, fd: 25 },
      { id: "usb:002", success: true, fd: 22 },
      { id: "usb:003", success: false, fd: -1, error: "denied" },
    ]);

    expect(unheld).toEqual(["usb:002"]);
    expect(closeFd.mock.calls).toEqual([[25], [22]]);
    expect(store.list()).toEqual([{ id: "usb:001", fd: 21, acquiredAt: 1000 }]);
  });

  it("logs fds that fail to close", () => {
    const { closeFd, logger, store } = setup();
    closeFd.mockImplementation(() => {
      throw new Error("EBADF");
    });
    store.add([{ id: "usb:001", success: true, fd: 21 }]);

    expect(store.remove(["usb:001"])).toEqual(["usb:001"]);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ deviceId: "usb:001", fd: 21 }),
      "[AcquiredDeviceStore] Failed to close device fd"
    );
  });
});
