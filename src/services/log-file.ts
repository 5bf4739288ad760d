import { mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import path from "node:path";

export const MAX_LOG_BYTES = 5 * 1024 * 1024;
export const MAX_ROTATED_LOGS = 5;

const LOG_FILE_NAME = "bridge.log";
const ROTATED_LOG_PATTERN = /^bridge-(\d+)\.log$/;

export type LogFileOptionsT = {
  maxBytes?: number;
  /**
   * Rotated files kept next to the live log, newest first
   */
  keepRotated?: number;
  now?: () => number;
};

export type LogFileT = {
  path: string;
  rotatedTo: string | null;
  pruned: string[];
};

const isErrnoCode = (error: unknown, code: string): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === code;

async function fileSize(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).size;
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

async function pruneRotatedLogs(logDir: string, keep: number): Promise<string[]> {
  const rotated: Array<{ name: string; stamp: number }> = [];
  for (const name of await readdir(logDir)) {
    const match = ROTATED_LOG_PATTERN.exec(name);
    if (match) {
      rotated.push({ name, stamp: Number(match[1]) });
    }
  }
  rotated.sort((a, b) => b.stamp - a.stamp);

  const stale = rotated.slice(keep).map((entry) => entry.name);
  await Promise.all(
    stale.map((name) => rm(path.join(logDir, name), { force: true }))
  );
  return stale;
}

/**
 * Prepare `<dataDir>/logs/bridge.log` for the pino file target.
 * A live log past maxBytes is renamed to `bridge-<timestamp>.log`,
 * and only the newest keepRotated of those survive.
 */
export async function ensureBridgeLogFile(
  dataDir: string,
  options: LogFileOptionsT = {}
): Promise<LogFileT> {
  const maxBytes = options.maxBytes ?? MAX_LOG_BYTES;
  const keepRotated = options.keepRotated ?? MAX_ROTATED_LOGS;
  const now = options.now ?? Date.now;

  const logDir = path.join(dataDir, "logs");
  await mkdir(logDir, { recursive: true });
  const logPath = path.join(logDir, LOG_FILE_NAME);

  let rotatedTo: string | null = null;
  const size = await fileSize(logPath);
  if (size !== null && size > maxBytes) {
    rotatedTo = path.join(logDir, `bridge-${now()}.log`);
    await rename(logPath, rotatedTo);
  }

  const pruned = await pruneRotatedLogs(logDir, keepRotated);
  return { path: logPath, rotatedTo, pruned };
}
