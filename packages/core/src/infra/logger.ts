import { formatWithOptions } from "node:util";
import { Logger } from "tslog";

/**
 * Patterns that indicate a value should be redacted in logs.
 */
const SENSITIVE_KEY_PATTERNS = [
  /token/i,
  /password/i,
  /secret/i,
  /api[_-]?key/i,
  /auth/i,
  /credential/i,
  /private[_-]?key/i,
  /access[_-]?key/i,
];

/**
 * Recursively redact sensitive values from objects before logging.
 */
export function redactSensitive(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map(redactSensitive);
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key) && typeof value === "string") {
      result[key] = "[REDACTED]";
    } else if (typeof value === "object" && value !== null) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

export const LOG_LEVELS = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Default level for new loggers: MQ_LOG_LEVEL when it names a level, else warn.
 * stdout carries command output, so chatter stays off by default.
 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const raw = env.MQ_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "warn";
}

const loggers = new Set<Logger<unknown>>();
let currentLevel: LogLevel | undefined;

/**
 * Change the level of every logger created so far and of those created later.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const logger of loggers) {
    logger.settings.minLevel = LOG_LEVEL_MAP[level];
  }
}

function writeToStderr(
  logMetaMarkup: string,
  logArgs: unknown[],
  logErrors: string[],
): void {
  const body = formatWithOptions({ colors: false }, ...logArgs);
  const errors = logErrors.length > 0 ? `\n${logErrors.join("\n")}` : "";
  process.stderr.write(`${logMetaMarkup}${body}${errors}\n`);
}

export function createLogger(
  name: string,
  options?: { level?: LogLevel; redact?: boolean },
): Logger<unknown> {
  const level = options?.level ?? currentLevel ?? resolveLogLevel();
  const shouldRedact = options?.redact !== false;

  const logger = new Logger<unknown>({
    name,
    minLevel: LOG_LEVEL_MAP[level],
    type: "pretty",
    stylePrettyLogs: process.stderr.isTTY === true,
    overwrite: { transportFormatted: writeToStderr },
    ...(shouldRedact && {
      maskValuesOfKeys: [
        "token",
        "password",
        "secret",
        "apiKey",
        "api_key",
        "accessKey",
        "privateKey",
        "credential",
        "authorization",
      ],
      maskPlaceholder: "[REDACTED]",
    }),
  });

  loggers.add(logger);
  return logger;
}
