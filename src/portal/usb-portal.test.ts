import dbus from "dbus-next";
import { describe, expect, it } from "vitest";
import { FakePortalBus } from "../../test/fake-portal-bus.js";
import {
  createTestLogger,
  deferred,
  flushPromises,
} from "../../test/test-helpers.js";
import {
  PORTAL_OBJECT_PATH,
  REQUEST_INTERFACE,
  SESSION_INTERFACE,
  USB_INTERFACE,
} from "./portal-constants.js";
import { getCollectedDevices, PortalErrorCode } from "./portal-errors.js";
import { RequestTokenSource, sessionPathFor } from "./request-token.js";
import { DeviceAcquireRequest } from "./usb-device.js";
import { UsbPortal } from "./usb-portal.js";

const REQUEST_PATH = "/org/freedesktop/portal/desktop/request/1_42/t_1_x";
const SESSION_PATH = sessionPathFor(":1.42", "t_1_x");

function setup(finishMaxPages?: number) {
  const bus = new FakePortalBus();
  const logger = createTestLogger();
  const portal = new UsbPortal({
    bus,
    logger,
    tokens: new RequestTokenSource("t", () => "x"),
    finishMaxPages,
  });
  return { bus, logger, portal };
}

describe("UsbPortal.enumerateDevices", () => {
  it("returns an empty list for an empty broker", async () => {
    const { bus, portal } = setup();
    bus.reply("EnumerateDevices", [[]]);

    await expect(portal.enumerateDevices()).resolves.toEqual([]);
    expect(bus.callsTo("EnumerateDevices")).toEqual([
      {
        path: PORTAL_OBJECT_PATH,
        interface: USB_INTERFACE,
        member: "EnumerateDevices",
        signature: "a{sv}",
        body: [{}],
      },
    ]);
  });

  it("returns the broker's devices", async () => {
    const { bus, portal } = setup();
    bus.reply("EnumerateDevices", [
      [["usb:001", { product: new dbus.Variant("s", "Keyboard") }]],
    ]);

    await expect(portal.enumerateDevices()).resolves.toEqual([
      { id: "usb:001", properties: { product: "Keyboard" } },
    ]);
  });

  it("wraps transport failures", async () => {
    const { bus, portal } = setup();
    bus.reply("EnumerateDevices", new Error("no portal"));

    await expect(portal.enumerateDevices()).rejects.toMatchObject({
      code: PortalErrorCode.TRANSPORT_FAILED,
      message: "EnumerateDevices call failed: no portal",
    });
  });
});

describe("UsbPortal.finishAcquireDevices", () => {
  it("collects one record per device across pages", async () => {
    const { bus, portal } = setup();
    bus
      .reply("AcquireDevicesFinish", ["usb:001", { success: true, fd: 3 }, false])
      .reply("AcquireDevicesFinish", ["usb:002", { success: true, fd: 4 }, false])
      .reply("AcquireDevicesFinish", [
        "usb:003",
        { success: false, error: "busy" },
        true,
      ]);

    const devices = await portal.finishAcquireDevices(REQUEST_PATH);

    expect(devices).toEqual([
      { id: "usb:001", success: true, fd: 3 },
      { id: "usb:002", success: true, fd: 4 },
      { id: "usb:003", success: false, fd: -1, error: "busy" },
    ]);
    const calls = bus.callsTo("AcquireDevicesFinish");
    expect(calls).toHaveLength(3);
    expect(calls[0]).toEqual({
      path: PORTAL_OBJECT_PATH,
      interface: USB_INTERFACE,
      member: "AcquireDevicesFinish",
      signature: "oa{sv}",
      body: [REQUEST_PATH, {}],
    });
  });

  it("accepts the request handle", async () => {
    const { bus, portal } = setup();
    bus.reply("AcquireDevicesFinish", [[["usb:001", { success: true, fd: 9 }]], true]);

    const devices = await portal.finishAcquireDevices({
      requestPath: REQUEST_PATH,
      requested: ["usb:001"],
      devices: [],
    });

    expect(devices).toEqual([{ id: "usb:001", success: true, fd: 9 }]);
    expect(bus.callsTo("AcquireDevicesFinish")[0].body).toEqual([REQUEST_PATH, {}]);
  });

  it("stops at the page bound", async () => {
    const { bus, portal } = setup(2);
    bus.replyAlways("AcquireDevicesFinish", ["", {}, false]);

    await expect(portal.finishAcquireDevices(REQUEST_PATH)).rejects.toMatchObject({
      code: PortalErrorCode.FINISH_LIMIT_EXCEEDED,
      details: { requestPath: REQUEST_PATH, maxPages: 2 },
    });
    expect(bus.callsTo("AcquireDevicesFinish")).toHaveLength(2);
  });

  it("aborts on a failed page without retrying", async () => {
    const { bus, portal } = setup();
    bus
      .reply("AcquireDevicesFinish", ["usb:001", { success: true, fd: 3 }, false])
      .reply("AcquireDevicesFinish", new Error("broken"));

    await expect(portal.finishAcquireDevices(REQUEST_PATH)).rejects.toMatchObject({
      code: PortalErrorCode.TRANSPORT_FAILED,
      message: `AcquireDevicesFinish page 2 for ${REQUEST_PATH} failed: broken`,
      details: { page: 2 },
    });
    expect(bus.callsTo("AcquireDevicesFinish")).toHaveLength(2);
  });

  it("hands the devices collected before a failed page to the caller", async () => {
    const { bus, portal } = setup();
    bus
      .reply("AcquireDevicesFinish", ["usb:001", { success: true, fd: 3 }, false])
      .reply("AcquireDevicesFinish", new Error("broken"));

    const error = await portal.finishAcquireDevices(REQUEST_PATH).catch(
      (caught: unknown) => caught
    );

    expect(getCollectedDevices(error)).toEqual([
      { id: "usb:001", success: true, fd: 3 },
    ]);
  });

  it("keeps collected devices when a later page does not decode", async () => {
    const { bus, portal } = setup();
    bus
      .reply("AcquireDevicesFinish", ["usb:001", { success: true, fd: 3 }, false])
      .reply("AcquireDevicesFinish", [42]);

    const error = await portal.finishAcquireDevices(REQUEST_PATH).catch(
      (caught: unknown) => caught
    );

    expect(error).toMatchObject({ code: PortalErrorCode.INVALID_RESPONSE });
    expect(getCollectedDevices(error)).toEqual([
      { id: "usb:001", success: true, fd: 3 },
    ]);
  });

  it("reports collected devices when the page bound is hit", async () => {
    const { bus, portal } = setup(1);
    bus.reply("AcquireDevicesFinish", ["usb:001", { success: true, fd: 3 }, false]);

    const error = await portal.finishAcquireDevices(REQUEST_PATH).catch(
      (caught: unknown) => caught
    );

    expect(error).toMatchObject({ code: PortalErrorCode.FINISH_LIMIT_EXCEEDED });
    expect(getCollectedDevices(error)).toEqual([
      { id: "usb:001", success: true, fd: 3 },
    ]);
  });

  it("refuses a page bound below one", () => {
    expect(() => setup(0)).toThrow("finishMaxPages must be a positive integer, got 0");
  });
});

describe("UsbPortal.acquireDevices", () => {
  it("runs the acquisition workflow", async () => {
    const { bus, portal } = setup();
    bus.reply("AcquireDevices", [REQUEST_PATH]);

    const promise = portal.acquireDevices(null, [
      new DeviceAcquireRequest("usb:001", false),
    ]);
    bus.emitSignal({
      path: REQUEST_PATH,
      interface: REQUEST_INTERFACE,
      member: "Response",
      body: [0, { "usb:001": { success: true, fd: 12 } }],
    });

    await expect(promise).resolves.toEqual({
      requestPath: REQUEST_PATH,
      requested: ["usb:001"],
      devices: [{ id: "usb:001", success: true, fd: 12 }],
    });
  });
});

describe("UsbPortal.releaseDevices", () => {
  it("sends the device ids", async () => {
    const { bus, portal } = setup();

    await portal.releaseDevices(["usb:001", "usb:002"]);

    expect(bus.callsTo("ReleaseDevices")).toEqual([
      {
        path: PORTAL_OBJECT_PATH,
        interface: USB_INTERFACE,
        member: "ReleaseDevices",
        signature: "as",
        body: [["usb:001", "usb:002"]],
      },
    ]);
  });

  it("wraps transport failures", async () => {
    const { bus, portal } = setup();
    bus.reply("ReleaseDevices", new Error("denied"));

    await expect(portal.releaseDevices(["usb:001"])).rejects.toMatchObject({
      code: PortalErrorCode.TRANSPORT_FAILED,
      details: { member: "ReleaseDevices", deviceIds: ["usb:001"] },
    });
  });
});

describe("UsbPortal.createSession", () => {
  it("builds a USB session over the returned path", async () => {
    const { bus, portal } = setup();
    bus.reply("CreateSession", [SESSION_PATH]);

    const usbSession = await portal.createSession();

    expect(bus.callsTo("CreateSession")).toEqual([
      {
        path: PORTAL_OBJECT_PATH,
        interface: USB_INTERFACE,
        member: "CreateSession",
        signature: "a{sv}",
        body: [{ session_handle_token: new dbus.Variant("s", "t_1_x") }],
      },
    ]);
    expect(usbSession.sessionPath).toBe(SESSION_PATH);
    expect(usbSession.getState()).toBe("active");
    expect(portal.getRegistry().getUsbSession(SESSION_PATH)).toBe(usbSession);
    expect(usbSession.getSession()?.hasUsbSession()).toBe(true);
  });

  it("rejects and registers nothing when the call fails", async () => {
    const { bus, portal } = setup();
    bus.reply("CreateSession", new Error("no portal"));

    await expect(portal.createSession()).rejects.toMatchObject({
      code: PortalErrorCode.TRANSPORT_FAILED,
    });
    expect(portal.getRegistry().size).toBe(0);
  });

  it("closes a session created after the caller gave up", async () => {
    const { bus, portal } = setup();
    const reply = deferred<unknown[]>();
    bus.reply("CreateSession", () => reply.promise);
    const controller = new AbortController();

    const promise = portal.createSession({ signal: controller.signal });
    controller.abort();
    await expect(promise).rejects.toMatchObject({
      code: PortalErrorCode.CANCELLED,
      message: "CreateSession call canceled by caller",
    });

    reply.resolve([SESSION_PATH]);
    await flushPromises();

    expect(bus.callsTo("Close")).toEqual([
      { path: SESSION_PATH, interface: SESSION_INTERFACE, member: "Close" },
    ]);
    expect(portal.getRegistry().size).toBe(0);
  });

  it("sends nothing for an already aborted signal", async () => {
    const { bus, portal } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      portal.createSession({ signal: controller.signal })
    ).rejects.toMatchObject({ code: PortalErrorCode.CANCELLED });
    expect(bus.calls).toEqual([]);
  });
});
