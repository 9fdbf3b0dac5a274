import { randomBytes } from "node:crypto";
import {
  chmodSync,
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { ConfigError } from "./errors.js";

const DIR_MODE = 0o700;
const FILE_MODE = 0o600;

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true, mode: DIR_MODE });
  return dirPath;
}

/**
 * Path for a scratch file next to `filePath`. Same directory keeps the final
 * rename on one filesystem; the suffix never collides with the target name.
 */
export function siblingTempPath(filePath: string): string {
  const suffix = randomBytes(6).toString("hex");
  return join(dirname(filePath), `${basename(filePath)}.${suffix}.tmp`);
}

/**
 * Replace `filePath` with `data` so that readers see either the old content or
 * the new content, never a mix. The result is readable by the owner only.
 */
export function writeFileAtomic(filePath: string, data: string): void {
  ensureDir(dirname(filePath));
  const tempPath = siblingTempPath(filePath);

  try {
    const fd = openSync(tempPath, "wx", FILE_MODE);
    try {
      writeSync(fd, data, null, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);
  } catch (err) {
    rmSync(tempPath, { force: true });
    throw err;
  }

  chmodSync(filePath, FILE_MODE);
}

export function writeJsonAtomic(filePath: string, value: unknown): void {
  writeFileAtomic(filePath, JSON.stringify(value, null, 2) + "\n");
}

/**
 * Read and parse a JSON file. ENOENT propagates as-is so callers can map it to
 * their own not-found error; invalid JSON is a ConfigError naming the path.
 */
export function readJsonFile(filePath: string): unknown {
  const raw = readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    throw new ConfigError(
      `Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }
}

export function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
