import { open, rename, rm } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { ensureDir, siblingTempPath } from "../infra/atomic-file.js";
import { createLogger } from "../infra/logger.js";
import type { OutputSink } from "./types.js";

const log = createLogger("batch");

export interface TextWriter {
  write(chunk: string): unknown;
}

/**
 * Builds the output in a sibling temp file and renames it over the
 * destination on commit. Nothing appears at the destination unless the whole
 * run succeeds; abort removes the temp file.
 */
export class AtomicFileSink implements OutputSink {
  private queue: Promise<void> = Promise.resolve();
  private writeError: { error: unknown } | undefined;
  private closed = false;

  private constructor(
    readonly filePath: string,
    readonly tempPath: string,
    private readonly handle: FileHandle,
  ) {}

  static async open(filePath: string): Promise<AtomicFileSink> {
    ensureDir(dirname(filePath));
    const tempPath = siblingTempPath(filePath);
    const handle = await open(tempPath, "wx", 0o600);
    return new AtomicFileSink(filePath, tempPath, handle);
  }

  write(line: string): void {
    this.queue = this.queue.then(async () => {
      if (this.writeError) return;
      try {
        await this.handle.appendFile(`${line}\n`, "utf-8");
      } catch (err) {
        this.writeError = { error: err };
      }
    });
  }

  async commit(): Promise<void> {
    await this.queue;
    if (this.writeError) throw this.writeError.error;
    await this.handle.sync();
    await this.close();
    await rename(this.tempPath, this.filePath);
    log.debug(`Wrote ${this.filePath}`);
  }

  async abort(): Promise<void> {
    await this.queue;
    try {
      await this.close();
    } catch (err) {
      log.debug(`Closing ${this.tempPath} failed: ${String(err)}`);
    }
    await rm(this.tempPath, { force: true });
  }

  private async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/**
 * Streams lines straight to a writer such as stdout. Lines already written
 * stay written when the run aborts.
 */
export class StreamSink implements OutputSink {
  constructor(private readonly out: TextWriter) {}

  write(line: string): void {
    this.out.write(`${line}\n`);
  }

  async commit(): Promise<void> {}

  async abort(): Promise<void> {}
}
