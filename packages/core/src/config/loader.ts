import { readFileSync } from "node:fs";
import JSON5 from "json5";
import { isNotFound, writeJsonAtomic } from "../infra/atomic-file.js";
import { ConfigError } from "../infra/errors.js";
import { CONFIG_VERSION, ConfigFileSchema } from "./schema.js";
import type { ConfigFile } from "./types.js";

/**
 * Load config.json. A missing file is an empty registry; the file is parsed
 * as JSON5 so hand edits with comments or trailing commas still load.
 */
export function loadConfig(filePath: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return { version: CONFIG_VERSION, models: {} };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${filePath}`, err);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(
      `Invalid config format in ${filePath} (expected object)`,
    );
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Config validation failed for ${filePath}:\n${formatIssues(result.error.issues)}`,
    );
  }

  if (result.data.version > CONFIG_VERSION) {
    throw new ConfigError(
      `Config version ${result.data.version} in ${filePath} is newer than ` +
        `the latest supported version (${CONFIG_VERSION}). Please upgrade mq.`,
    );
  }

  return result.data;
}

/**
 * Save config atomically with owner-only permissions.
 */
export function saveConfig(filePath: string, config: ConfigFile): void {
  writeJsonAtomic(filePath, { ...config, version: CONFIG_VERSION });
}

export function formatIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
): string {
  return issues
    .map((i) => `  - ${i.path.length > 0 ? `${i.path.join(".")}: ` : ""}${i.message}`)
    .join("\n");
}
