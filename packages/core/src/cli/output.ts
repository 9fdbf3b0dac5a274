import type { TextWriter } from "../batch/sink.js";
import type { LlmError } from "../infra/errors.js";
import type { ChatMessage } from "../llm/types.js";

export interface ResultView {
  response: string;
  reasoning?: string;
  prompt: string;
  sysprompt?: string | null;
  /** Session written by this command; omitted when none was. */
  session?: string;
}

function nonBlank(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim() !== "";
}

/**
 * Print a model result. JSON mode writes one compact object; text mode
 * writes the reasoning trace (if any) under its own header, then the
 * response.
 */
export function emitResult(out: TextWriter, result: ResultView, json: boolean): void {
  if (json) {
    const payload: Record<string, string> = {
      response: result.response,
      prompt: result.prompt,
    };
    if (result.session !== undefined) payload.session = result.session;
    if (nonBlank(result.sysprompt)) payload.sysprompt = result.sysprompt;
    if (nonBlank(result.reasoning)) payload.reasoning = result.reasoning;
    out.write(`${JSON.stringify(payload)}\n`);
    return;
  }

  if (nonBlank(result.reasoning)) {
    out.write(`reasoning:\n${result.reasoning}\n\nresponse:\n`);
  }
  out.write(`${result.response}\n`);
}

export function sessionHeader(sessionId: string | undefined): string {
  return `session: ${sessionId ?? "(none)"}\n`;
}

function infoText(info: Record<string, unknown>, key: string): string | undefined {
  const value = info[key];
  if (typeof value === "number") return String(value);
  return typeof value === "string" && value ? value : undefined;
}

/**
 * Two-line diagnostic for a failed model request:
 *
 *   LLM error (provider=openai, model=gpt-4o, type=api_error, status=401): ...
 *   raw: {"error": ...}
 */
export function formatLlmError(error: LlmError): string {
  const info = error.errorInfo;
  const parts = [
    ["provider", infoText(info, "provider")],
    ["model", infoText(info, "model")],
    ["type", infoText(info, "type")],
    ["status", infoText(info, "status_code")],
  ]
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([label, value]) => `${label}=${value}`);

  const prefix = parts.length > 0 ? `LLM error (${parts.join(", ")})` : "LLM error";
  let text = `${prefix}: ${error.message}\n`;

  const snippet =
    infoText(info, "raw_response_snippet") ??
    infoText(info, "raw_provider_response_snippet");
  if (snippet !== undefined) text += `raw: ${snippet}\n`;
  return text;
}

export function firstUserPrompt(messages: readonly ChatMessage[]): string {
  return messages.find((m) => m.role === "user")?.content ?? "";
}

const PREVIEW_ELLIPSIS = " ... ";

/**
 * Single-line preview of a prompt. Long prompts keep their head and tail.
 */
export function formatPromptPreview(prompt: string, maxLength = 160): string {
  const line = prompt.replace(/\r?\n/g, " ").trim();
  if (line.length <= maxLength) return line;

  const headLength = Math.floor((maxLength - PREVIEW_ELLIPSIS.length) / 2);
  const tailLength = maxLength - PREVIEW_ELLIPSIS.length - headLength;
  const head = line.slice(0, headLength).trimEnd();
  const tail = line.slice(-tailLength).trimStart();
  return `${head}${PREVIEW_ELLIPSIS}${tail}`;
}
