import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

let envLoaded = false;

const loadEnvFile = (envPath: string): boolean => {
  if (!envPath || !fs.existsSync(envPath)) {
    return false;
  }
  const result = dotenv.config({ path: envPath, override: false });
  return !result.error;
};

/**
 * Candidate .env files, in load order.
 *
 * With override: false, earlier files win and later files fill in missing
 * vars. The process environment always wins over every file.
 */
export const getEnvCandidates = (
  cwd: string,
  dataDir: string | undefined
): string[] => {
  const candidates = [path.join(cwd, ".env")];
  if (dataDir) {
    const dataEnv = path.join(dataDir, ".env");
    if (!candidates.includes(dataEnv)) {
      candidates.push(dataEnv);
    }
  }
  return candidates;
};

/**
 * Load environment variables from the working directory and the data dir.
 * Runs once per process.
 *
 * @returns Files that were loaded
 */
export const loadBridgeEnv = (
  cwd: string = process.cwd(),
  dataDir: string | undefined = process.env.PORTAL_BRIDGE_DATA_DIR
): string[] => {
  if (envLoaded) {
    return [];
  }
  envLoaded = true;

  return getEnvCandidates(cwd, dataDir).filter((candidate) =>
    loadEnvFile(candidate)
  );
};
