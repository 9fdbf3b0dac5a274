import type { BatchRow } from "./row.js";

export interface BatchInputRow {
  /** 1-based line in the input text. */
  lineNumber: number;
  row: BatchRow;
  prompt: string;
}

/**
 * Turns one input row into its output row. Request failures are recorded on
 * the row; merge conflicts and aborts are thrown.
 */
export type RowProcessor = (
  input: BatchInputRow,
  signal: AbortSignal,
) => Promise<BatchRow>;

/**
 * Destination for rendered output lines. `write` is only ever called from
 * the ordered drain, one line at a time.
 */
export interface OutputSink {
  write(line: string): void;
  /** Make everything written visible at the destination. */
  commit(): Promise<void>;
  /** Discard whatever has not been made visible. */
  abort(): Promise<void>;
}

export interface BatchSummary {
  total: number;
  failed: number;
}
