import { createLogger } from "../infra/logger.js";
import { dispatchOrdered } from "./dispatcher.js";
import { assertNoMergeConflicts } from "./input.js";
import type {
  BatchInputRow,
  BatchSummary,
  OutputSink,
  RowProcessor,
} from "./types.js";

const log = createLogger("batch");

export interface RunBatchOptions {
  rows: readonly BatchInputRow[];
  workers: number;
  processRow: RowProcessor;
  /** Opened only after the pre-flight check passes. */
  openSink: () => Promise<OutputSink>;
  extractTags: boolean;
  signal?: AbortSignal;
}

/**
 * Run a whole batch: pre-flight merge-conflict check, ordered dispatch, then
 * commit. Any fatal error aborts the sink and propagates. Rows whose request
 * failed are counted in `failed` but do not stop the run.
 */
export async function runBatch(options: RunBatchOptions): Promise<BatchSummary> {
  const { rows, extractTags } = options;
  assertNoMergeConflicts(rows, { extractTags });

  const sink = await options.openSink();
  let failed = 0;

  try {
    await dispatchOrdered(rows, {
      workers: options.workers,
      ...(options.signal && { signal: options.signal }),
      process: (row, _index, signal) => options.processRow(row, signal),
      emit: (out) => {
        if (out.has("error")) failed++;
        sink.write(out.toLine());
      },
    });
    await sink.commit();
  } catch (err) {
    await sink.abort();
    throw err;
  }

  log.info(`Batch complete: ${rows.length} row(s), ${failed} failed`);
  return { total: rows.length, failed };
}
