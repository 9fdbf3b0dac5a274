/**
 * Normalisation of provider response bodies: content coercion, reasoning
 * traces and error-body parsing.
 */

const REASONING_KEYS = ["reasoning", "reasoning_content", "thinking", "thoughts"];
const CHOICE_REASONING_KEYS = ["reasoning", "thinking", "thoughts"];

export const SNIPPET_LIMIT = 800;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function truncate(text: string, limit = SNIPPET_LIMIT): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}…`;
}

export function jsonSnippet(value: unknown, limit = SNIPPET_LIMIT): string {
  if (value === undefined || value === null) return "";
  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  return truncate(text, limit);
}

function nonBlankString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function firstKey(
  record: Record<string, unknown>,
  keys: readonly string[],
): string | undefined {
  for (const key of keys) {
    const value = nonBlankString(record[key]);
    if (value !== undefined) return value;
  }
  return undefined;
}

function partText(part: Record<string, unknown>): unknown {
  return part.text || part.content;
}

/**
 * Message content as a string. Accepts a plain string or a list of text
 * parts (`text` / `output_text`). A list with no visible text counts as
 * missing.
 */
export function coerceContent(raw: unknown): string | undefined {
  if (typeof raw === "string") return raw;
  if (!Array.isArray(raw)) return undefined;

  const parts: string[] = [];
  for (const item of raw) {
    if (typeof item === "string") {
      parts.push(item);
    } else if (
      isRecord(item) &&
      (item.type === "text" || item.type === "output_text")
    ) {
      const text = partText(item);
      if (typeof text === "string") parts.push(text);
    }
  }
  const joined = parts.join("");
  return joined.trim() ? joined : undefined;
}

/**
 * Find a reasoning trace in an OpenAI-style response body. Looks at the top
 * level, then the first choice, then its message (fields first, then
 * reasoning/thinking content parts).
 */
export function extractReasoning(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;

  const topLevel = firstKey(raw, REASONING_KEYS);
  if (topLevel !== undefined) return topLevel;

  const choices = raw.choices;
  if (!Array.isArray(choices) || choices.length === 0) return undefined;
  const choice: unknown = choices[0];
  if (!isRecord(choice)) return undefined;

  const fromChoice = firstKey(choice, CHOICE_REASONING_KEYS);
  if (fromChoice !== undefined) return fromChoice;

  const message = choice.message;
  if (!isRecord(message)) return undefined;

  const fromMessage = firstKey(message, REASONING_KEYS);
  if (fromMessage !== undefined) return fromMessage;

  if (Array.isArray(message.content)) {
    const parts = message.content
      .filter(isRecord)
      .filter((p) => p.type === "reasoning" || p.type === "thinking")
      .map(partText)
      .map(nonBlankString)
      .filter((t): t is string => t !== undefined);
    if (parts.length > 0) return parts.join("\n");
  }

  return undefined;
}

export interface ProviderErrorDetail {
  message: string;
  type?: string;
}

/**
 * Pull the human-readable message out of an error response body. Both
 * OpenAI-style and Anthropic-style bodies nest it under `error`.
 */
export function parseErrorBody(body: string): ProviderErrorDetail {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    parsed = undefined;
  }

  if (isRecord(parsed)) {
    const error = parsed.error;
    if (isRecord(error)) {
      const message = nonBlankString(error.message);
      const type = nonBlankString(error.type) ?? nonBlankString(error.code);
      if (message !== undefined) {
        return { message, ...(type !== undefined && { type }) };
      }
    }
    const flat = nonBlankString(error) ?? nonBlankString(parsed.message);
    if (flat !== undefined) return { message: flat };
  }

  const text = body.trim();
  return { message: text ? truncate(text, 200) : "empty response body" };
}
