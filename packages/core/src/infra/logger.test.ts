import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createLogger,
  isLogLevel,
  redactSensitive,
  resolveLogLevel,
  setLogLevel,
} from "./logger.js";

describe("redactSensitive", () => {
  it("redacts token fields", () => {
    expect(redactSensitive({ token: "my-secret" })).toEqual({
      token: "[REDACTED]",
    });
  });

  it("redacts apiKey and api_key fields", () => {
    expect(redactSensitive({ apiKey: "test-key", api_key: "test-key" })).toEqual(
      { apiKey: "[REDACTED]", api_key: "[REDACTED]" },
    );
  });

  it("redacts nested sensitive fields", () => {
    const result = redactSensitive({
      error_info: {
        provider: "openai",
        headers: { authorization: "Bearer test-secret" },
      },
    });
    expect(result).toEqual({
      error_info: {
        provider: "openai",
        headers: { authorization: "[REDACTED]" },
      },
    });
  });

  it("handles arrays", () => {
    expect(
      redactSensitive([
        { token: "secret", name: "test" },
        { password: "pass", id: 1 },
      ]),
    ).toEqual([
      { token: "[REDACTED]", name: "test" },
      { password: "[REDACTED]", id: 1 },
    ]);
  });

  it("handles null, undefined and primitives", () => {
    expect(redactSensitive(null)).toBeNull();
    expect(redactSensitive(undefined)).toBeUndefined();
    expect(redactSensitive("string")).toBe("string");
    expect(redactSensitive(42)).toBe(42);
  });

  it("only redacts string values in sensitive keys", () => {
    expect(redactSensitive({ token: 12345, password: null })).toEqual({
      token: 12345,
      password: null,
    });
  });
});

describe("resolveLogLevel", () => {
  it("defaults to warn", () => {
    expect(resolveLogLevel({})).toBe("warn");
  });

  it("reads MQ_LOG_LEVEL case-insensitively", () => {
    expect(resolveLogLevel({ MQ_LOG_LEVEL: "DEBUG" })).toBe("debug");
  });

  it("ignores unknown levels", () => {
    expect(resolveLogLevel({ MQ_LOG_LEVEL: "loud" })).toBe("warn");
  });
});

describe("isLogLevel", () => {
  it("accepts known level names only", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel("warn");
  });

  it("creates a logger instance", () => {
    const logger = createLogger("test");
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.error).toBe("function");
  });

  it("writes to stderr, not stdout", () => {
    const stderr = vi
      .spyOn(process.stderr, "write")
      .mockImplementation(() => true);
    const stdout = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);

    const logger = createLogger("test", { level: "info" });
    logger.info("hello from the logger");

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain(
      "hello from the logger",
    );
  });

  it("setLogLevel applies to existing loggers", () => {
    const stderr = vi
      .spyOn(process.stderr, "write")
      .mockImplementation(() => true);

    const logger = createLogger("test", { level: "warn" });
    logger.debug("hidden");
    expect(stderr).not.toHaveBeenCalled();

    setLogLevel("debug");
    logger.debug("shown");
    expect(stderr).toHaveBeenCalledTimes(1);
  });
});
