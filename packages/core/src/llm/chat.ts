import { AppError, LlmError } from "../infra/errors.js";
import type { LlmErrorInfo } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { getProvider } from "./providers.js";
import { parseErrorBody, truncate } from "./response.js";
import { ProviderHttpError, RetryableProviderError } from "./retry.js";
import type { ChatRequest, ChatResult } from "./types.js";

const log = createLogger("llm");

export const DEFAULT_TIMEOUT_MS = 600_000;
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Send one chat request to the provider named in the request.
 *
 * Every backend failure surfaces as an LlmError whose errorInfo carries the
 * provider, model and whatever detail the failure had. Aborts by the caller's
 * signal propagate unchanged.
 */
export async function chat(request: ChatRequest): Promise<ChatResult> {
  const provider = getProvider(request.provider);
  const timeoutMs = request.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxRetries = request.maxRetries ?? DEFAULT_MAX_RETRIES;

  log.debug(
    `chat ${request.provider}/${request.model}: ${request.messages.length} message(s), ` +
      `timeout ${timeoutMs}ms, ${maxRetries} retries`,
  );

  try {
    return await provider.complete({ ...request, timeoutMs, maxRetries });
  } catch (err) {
    if (request.signal?.aborted) throw err;
    throw toLlmError(err, request.provider, request.model, timeoutMs);
  }
}

/**
 * Map a request failure to the error the CLI and batch rows report.
 * AppErrors other than LlmError (missing API key, unknown provider) pass
 * through untouched.
 */
export function toLlmError(
  err: unknown,
  provider: string,
  model: string,
  timeoutMs: number,
): AppError {
  const base: LlmErrorInfo = { provider, model };

  if (err instanceof LlmError) {
    return new LlmError(err.message, { ...err.errorInfo, ...base }, err.cause);
  }
  if (err instanceof AppError) return err;

  if (err instanceof RetryableProviderError || err instanceof ProviderHttpError) {
    const detail = parseErrorBody(err.responseBody);
    return new LlmError(
      `Error (HTTP ${err.statusCode}): ${detail.message}`,
      {
        ...base,
        type: detail.type ?? "http_error",
        status_code: err.statusCode,
        ...(err.responseBody !== "" && {
          raw_response_snippet: truncate(err.responseBody),
        }),
      },
      err,
    );
  }

  if (err instanceof Error && err.name === "TimeoutError") {
    return new LlmError(
      `Error (timeout): no response within ${Math.round(timeoutMs / 1000)}s`,
      { ...base, type: "timeout" },
      err,
    );
  }

  const message = err instanceof Error ? err.message : String(err);
  const code = networkCode(err);
  return new LlmError(
    `Error (network): ${message}`,
    { ...base, type: "network", ...(code !== undefined && { code }) },
    err,
  );
}

function networkCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 3; depth++) {
    if (typeof current !== "object" || current === null) return undefined;
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}
