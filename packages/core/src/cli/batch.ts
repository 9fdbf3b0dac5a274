import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseBatchInput } from "../batch/input.js";
import { createRowProcessor } from "../batch/row-processor.js";
import { runBatch } from "../batch/run.js";
import { AtomicFileSink, StreamSink } from "../batch/sink.js";
import { UserError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { assertCredentials, getProvider } from "../llm/providers.js";
import { openState, samplingOf } from "./context.js";
import type { CliDeps } from "./context.js";

const log = createLogger("cli");

export const DEFAULT_WORKERS = 4;

export interface BatchCommandOptions {
  input?: string;
  output?: string;
  workers: number;
  sysprompt?: string;
  prefix?: string;
  suffix?: string;
  extractTags?: boolean;
  /** Per-request timeout in seconds. */
  timeout?: number;
  retries?: number;
}

async function readInput(deps: CliDeps, path: string | undefined): Promise<string> {
  if (path === undefined || path === "-") return deps.readStdin();
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UserError(`Failed to read input file '${path}': ${reason}`, undefined, err);
  }
}

/**
 * Run every input line through the model. Returns the exit code: 1 when at
 * least one row recorded an error, else 0.
 */
export async function batch(
  deps: CliDeps,
  shortname: string,
  options: BatchCommandOptions,
): Promise<number> {
  const entry = openState(deps.env).registry.get(shortname);
  assertCredentials(getProvider(entry.provider));

  const rows = parseBatchInput(await readInput(deps, options.input));
  const extractTags = options.extractTags === true;
  const sysprompt = options.sysprompt ?? entry.sysprompt;

  const processRow = createRowProcessor({
    chat: deps.chat,
    provider: entry.provider,
    model: entry.model,
    extractTags,
    sampling: samplingOf(entry),
    ...(sysprompt !== undefined && { sysprompt }),
    ...(options.prefix !== undefined && { prefix: options.prefix }),
    ...(options.suffix !== undefined && { suffix: options.suffix }),
    ...(options.timeout !== undefined && { timeoutMs: options.timeout * 1000 }),
    ...(options.retries !== undefined && { maxRetries: options.retries }),
  });

  const output = options.output;
  const summary = await runBatch({
    rows,
    workers: options.workers,
    processRow,
    extractTags,
    openSink:
      output !== undefined && output !== "-"
        ? () => AtomicFileSink.open(resolve(output))
        : async () => new StreamSink(deps.stdout),
    ...(deps.signal && { signal: deps.signal }),
  });

  if (summary.failed > 0) {
    deps.stderr.write(`${summary.failed} of ${summary.total} row(s) failed\n`);
    return 1;
  }
  log.debug(`batch '${shortname}' finished: ${summary.total} row(s)`);
  return 0;
}
