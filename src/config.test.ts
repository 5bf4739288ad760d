import { describe, expect, it } from "vitest";
import { parseConfig } from "./config.js";

const ENV = { XDG_STATE_HOME: "/tmp/state" };

describe("parseConfig", () => {
  it("uses local defaults", () => {
    expect(parseConfig([], ENV)).toEqual({
      host: "127.0.0.1",
      port: 8787,
      mode: "local",
      dataDir: "/tmp/state/usb-portal-bridge",
      logLevel: "debug",
      finishMaxPages: 1024,
      monitor: true,
      busAddress: undefined,
    });
  });

  it("reads the environment", () => {
    const config = parseConfig([], {
      PORTAL_BRIDGE_HOST: "0.0.0.0",
      PORTAL_BRIDGE_PORT: "9000",
      PORTAL_BRIDGE_DATA_DIR: "/var/lib/bridge",
      PORTAL_BRIDGE_LOG_LEVEL: "warn",
      PORTAL_FINISH_MAX_PAGES: "16",
      DBUS_SESSION_BUS_ADDRESS: "unix:path=/run/user/1000/bus",
    });

    expect(config).toMatchObject({
      host: "0.0.0.0",
      port: 9000,
      mode: "lan",
      dataDir: "/var/lib/bridge",
      logLevel: "warn",
      finishMaxPages: 16,
      busAddress: "unix:path=/run/user/1000/bus",
    });
  });

  it("lets CLI flags win over the environment", () => {
    const config = parseConfig(
      [
        "--host",
        "192.168.1.20",
        "--port",
        "8800",
        "--log-level",
        "error",
        "--finish-max-pages",
        "4",
        "--data-dir",
        "/srv/bridge",
        "--no-monitor",
      ],
      { ...ENV, PORTAL_BRIDGE_PORT: "9000", NODE_ENV: "production" }
    );

    expect(config).toMatchObject({
      host: "192.168.1.20",
      port: 8800,
      mode: "lan",
      logLevel: "error",
      finishMaxPages: 4,
      dataDir: "/srv/bridge",
      monitor: false,
    });
  });

  it("defaults to info in production", () => {
    expect(parseConfig([], { ...ENV, NODE_ENV: "production" }).logLevel).toBe("info");
  });

  it("rejects invalid values", () => {
    expect(() => parseConfig(["--host", "localhost"], ENV)).toThrow();
    expect(() => parseConfig(["--port", "70000"], ENV)).toThrow();
    expect(() => parseConfig(["--port", "http"], ENV)).toThrow();
    expect(() => parseConfig(["--finish-max-pages", "0"], ENV)).toThrow();
    expect(() => parseConfig(["--log-level", "loud"], ENV)).toThrow();
  });
});
