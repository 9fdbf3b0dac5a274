import type { SamplingOptions } from "../config/types.js";
import { AppError, LlmError, MergeConflictError } from "../infra/errors.js";
import { createLogger, redactSensitive } from "../infra/logger.js";
import type { ChatFn, ChatMessage } from "../llm/types.js";
import { TAG_PREFIX } from "./input.js";
import type { BatchRow } from "./row.js";
import { extractTagValues } from "./tags.js";
import type { RowProcessor } from "./types.js";

const log = createLogger("batch");

export interface RowProcessorOptions {
  chat: ChatFn;
  provider: string;
  model: string;
  sysprompt?: string;
  prefix?: string;
  suffix?: string;
  extractTags: boolean;
  timeoutMs?: number;
  maxRetries?: number;
  sampling?: SamplingOptions;
}

/**
 * Add `key` to an output row. Overwriting an existing key would lose data,
 * so it is a merge conflict.
 */
export function mergeKey(row: BatchRow, key: string, value: unknown): void {
  if (row.has(key)) {
    throw new MergeConflictError(
      `merge conflict: output row already has key '${key}'`,
    );
  }
  row.set(key, value);
}

function errorInfoOf(err: unknown): Record<string, unknown> | undefined {
  if (err instanceof LlmError) {
    return Object.keys(err.errorInfo).length > 0 ? err.errorInfo : undefined;
  }
  if (err instanceof AppError) return { type: err.code };
  return undefined;
}

export function createRowProcessor(options: RowProcessorOptions): RowProcessor {
  const prefix = options.prefix ?? "";
  const suffix = options.suffix ?? "";
  const sysprompt = options.sysprompt?.trim() ? options.sysprompt : undefined;

  return async (input, signal) => {
    const finalPrompt = `${prefix}${input.prompt}${suffix}`;
    const out = input.row.clone();
    out.set("prompt", finalPrompt);
    mergeKey(out, "mq_input_prompt", input.prompt);

    const messages: ChatMessage[] = [
      ...(sysprompt !== undefined
        ? [{ role: "system" as const, content: sysprompt }]
        : []),
      { role: "user", content: finalPrompt },
    ];

    try {
      const result = await options.chat({
        provider: options.provider,
        model: options.model,
        messages,
        signal,
        ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
        ...(options.maxRetries !== undefined && { maxRetries: options.maxRetries }),
        ...options.sampling,
      });

      mergeKey(out, "response", result.content);
      if (result.reasoning?.trim()) {
        mergeKey(out, "reasoning", result.reasoning);
      }
      if (options.extractTags) {
        for (const [name, value] of extractTagValues(result.content)) {
          mergeKey(out, `${TAG_PREFIX}${name}`, value);
        }
      }
    } catch (err) {
      if (err instanceof MergeConflictError || signal.aborted) throw err;

      const message = err instanceof Error ? err.message : String(err);
      const info = errorInfoOf(err);
      log.debug(`Row on line ${input.lineNumber} failed: ${message}`, redactSensitive(info));
      mergeKey(out, "error", message);
      if (info !== undefined) mergeKey(out, "error_info", info);
    }

    if (sysprompt !== undefined) mergeKey(out, "sysprompt", sysprompt);
    return out;
  };
}
