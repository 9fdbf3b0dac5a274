import { parseTree, printParseErrorCode } from "jsonc-parser";
import type { Node as JsonNode, ParseError } from "jsonc-parser";
import { MergeConflictError, UserError } from "../infra/errors.js";
import { BatchRow } from "./row.js";
import type { BatchInputRow } from "./types.js";

const PARSE_OPTIONS = {
  disallowComments: true,
  allowTrailingComma: false,
  allowEmptyContent: false,
};

export const RESERVED_KEYS: ReadonlySet<string> = new Set([
  "response",
  "mq_input_prompt",
  "reasoning",
  "sysprompt",
  "error",
  "error_info",
]);

export const TAG_PREFIX = "tag:";

export function isReservedKey(key: string, extractTags: boolean): boolean {
  return RESERVED_KEYS.has(key) || (extractTags && key.startsWith(TAG_PREFIX));
}

/**
 * Parse one input line into an ordered row. Each value keeps its source
 * text; duplicate keys keep the first position and the last value.
 */
function parseLine(line: string, lineNumber: number): BatchInputRow {
  const errors: ParseError[] = [];
  const root: JsonNode | undefined = parseTree(line, errors, PARSE_OPTIONS);

  const [error] = errors;
  if (error !== undefined) {
    throw new UserError(
      `Invalid JSON on line ${lineNumber}: ${printParseErrorCode(error.error)} ` +
        `at column ${error.offset + 1}`,
    );
  }
  if (root?.type !== "object") {
    throw new UserError(`Line ${lineNumber}: expected a JSON object`);
  }

  const row = new BatchRow();
  let prompt: string | undefined;
  for (const property of root.children ?? []) {
    const [keyNode, valueNode] = property.children ?? [];
    if (keyNode === undefined || valueNode === undefined) continue;
    const key = String(keyNode.value);
    row.setRaw(key, line.slice(valueNode.offset, valueNode.offset + valueNode.length));
    if (key === "prompt") {
      prompt = typeof valueNode.value === "string" ? valueNode.value : undefined;
    }
  }

  if (prompt === undefined) {
    throw new UserError(`Line ${lineNumber}: missing string "prompt" field`);
  }
  return { lineNumber, row, prompt };
}

/**
 * Parse newline-delimited JSON input. Blank lines are skipped; every other
 * line must be an object with a string `prompt`.
 */
export function parseBatchInput(text: string): BatchInputRow[] {
  const rows: BatchInputRow[] = [];
  for (const [i, line] of text.split(/\r?\n/).entries()) {
    if (!line.trim()) continue;
    rows.push(parseLine(line, i + 1));
  }
  return rows;
}

/**
 * Reject the whole batch if any input row already carries a key the output
 * would add. Runs before any request is made or any output is opened.
 */
export function assertNoMergeConflicts(
  rows: readonly BatchInputRow[],
  options: { extractTags: boolean },
): void {
  for (const { lineNumber, row } of rows) {
    const key = row.keys().find((k) => isReservedKey(k, options.extractTags));
    if (key !== undefined) {
      throw new MergeConflictError(
        `merge conflict on line ${lineNumber}: input already has reserved key '${key}'`,
      );
    }
  }
}
