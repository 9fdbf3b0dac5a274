import { ConfigError } from "../infra/errors.js";

/**
 * API keys are read from environment variables only. Config files and
 * provider definitions carry the variable NAME, never the value.
 */

const ENV_VAR_NAME_RE = /^[A-Z][A-Z0-9_]{0,127}$/;

export function resolveSecret(envVarName: string): string | undefined {
  if (!ENV_VAR_NAME_RE.test(envVarName)) {
    throw new ConfigError(
      `Invalid env var name: "${envVarName}". ` +
        "Must be uppercase alphanumeric with underscores.",
    );
  }
  const value = process.env[envVarName];
  return value === "" ? undefined : value;
}

export function requireSecret(envVarName: string, purpose?: string): string {
  const value = resolveSecret(envVarName);
  if (value === undefined) {
    const suffix = purpose ? ` (${purpose})` : "";
    throw new ConfigError(
      `Required environment variable "${envVarName}" is not set or empty${suffix}.`,
    );
  }
  return value;
}
