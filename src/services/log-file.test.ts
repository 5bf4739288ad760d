import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ensureBridgeLogFile } from "./log-file.js";

describe("ensureBridgeLogFile", () => {
  let dataDir: string;
  let logDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "usb-portal-bridge-"));
    logDir = path.join(dataDir, "logs");
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("creates the log directory", async () => {
    const logFile = await ensureBridgeLogFile(dataDir);

    expect(logFile).toEqual({
      path: path.join(logDir, "bridge.log"),
      rotatedTo: null,
      pruned: [],
    });
    expect(await readdir(logDir)).toEqual([]);
  });

  it("rotates a log file past the size limit", async () => {
    await ensureBridgeLogFile(dataDir);
    await writeFile(path.join(logDir, "bridge.log"), "x".repeat(20));

    const logFile = await ensureBridgeLogFile(dataDir, {
      maxBytes: 10,
      now: () => 1234,
    });

    expect(logFile.rotatedTo).toBe(path.join(logDir, "bridge-1234.log"));
    expect(await readdir(logDir)).toEqual(["bridge-1234.log"]);
  });

  it("keeps a small log file", async () => {
    await ensureBridgeLogFile(dataDir);
    await writeFile(path.join(logDir, "bridge.log"), "x".repeat(5));

    const logFile = await ensureBridgeLogFile(dataDir, {
      maxBytes: 10,
      now: () => 1234,
    });

    expect(logFile.rotatedTo).toBeNull();
    expect(await readdir(logDir)).toEqual(["bridge.log"]);
  });

  it("drops the oldest rotated files", async () => {
    await ensureBridgeLogFile(dataDir);
    for (const stamp of [100, 300, 200]) {
      await writeFile(path.join(logDir, `bridge-${stamp}.log`), "old");
    }
    await writeFile(path.join(logDir, "notes.log"), "kept");

    const logFile = await ensureBridgeLogFile(dataDir, { keepRotated: 1 });

    expect(logFile.pruned.sort()).toEqual(["bridge-100.log", "bridge-200.log"]);
    expect((await readdir(logDir)).sort()).toEqual(["bridge-300.log", "notes.log"]);
  });
});
