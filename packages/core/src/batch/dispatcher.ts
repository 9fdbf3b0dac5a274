import { ValidationError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { ReorderBuffer } from "./reorder-buffer.js";

const log = createLogger("batch");

export interface DispatchOptions<T, R> {
  /** Size of the worker pool; an integer >= 1. */
  workers: number;
  process: (item: T, index: number, signal: AbortSignal) => Promise<R>;
  /** Called once per item, in input order. */
  emit: (result: R, index: number) => void;
  /** Cancels the whole dispatch from outside. */
  signal?: AbortSignal;
}

export function assertWorkerCount(workers: number): void {
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ValidationError(
      `Worker count must be an integer >= 1 (got ${workers})`,
    );
  }
}

/**
 * Process `items` on a pool of min(workers, items.length) concurrent workers
 * and emit results in input order.
 *
 * The first error thrown by `process` or `emit` aborts the run: no further
 * items are started, the shared signal fires for in-flight ones, and their
 * results are dropped. Once every worker has settled the error is rethrown.
 */
export async function dispatchOrdered<T, R>(
  items: readonly T[],
  options: DispatchOptions<T, R>,
): Promise<void> {
  assertWorkerCount(options.workers);

  const controller = new AbortController();
  const { signal } = controller;
  const onExternalAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    onExternalAbort();
  } else {
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  const buffer = new ReorderBuffer<R>(options.emit);
  let cursor = 0;
  const errors: unknown[] = [];

  const fail = (error: unknown) => {
    errors.push(error);
    if (errors.length === 1) controller.abort(error);
  };

  const worker = async (): Promise<void> => {
    while (!signal.aborted) {
      const index = cursor++;
      if (index >= items.length) return;

      let result: R;
      try {
        result = await options.process(items[index], index, signal);
      } catch (err) {
        fail(err);
        return;
      }
      // anything that finishes after an abort is discarded
      if (signal.aborted) return;

      try {
        buffer.complete(index, result);
      } catch (err) {
        fail(err);
        return;
      }
    }
  };

  const poolSize = Math.min(options.workers, items.length);
  log.debug(`Dispatching ${items.length} item(s) on ${poolSize} worker(s)`);

  try {
    await Promise.all(Array.from({ length: poolSize }, () => worker()));
  } finally {
    options.signal?.removeEventListener("abort", onExternalAbort);
  }

  if (errors.length > 0) throw errors[0];
  if (signal.aborted) throw signal.reason;
}
