import {
  lstatSync,
  readFileSync,
  readlinkSync,
  renameSync,
  rmSync,
  symlinkSync,
} from "node:fs";
import { basename, dirname, join, relative } from "node:path";
import {
  ensureDir,
  isNotFound,
  siblingTempPath,
  writeFileAtomic,
} from "../infra/atomic-file.js";
import { createLogger } from "../infra/logger.js";
import { SESSION_ID_RE } from "./types.js";
import type { LatestPointer } from "./types.js";

const log = createLogger("latest-pointer");

function sessionFileName(sessionId: string): string {
  return `${sessionId}.json`;
}

function isSymlink(path: string): boolean {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

/**
 * Pointer stored as a symlink `last_conversation.json -> sessions/<id>.json`.
 * The link is replaced with a rename, so readers never see it missing.
 */
export class SymlinkLatestPointer implements LatestPointer {
  constructor(
    private readonly linkPath: string,
    private readonly sessionsDir: string,
  ) {}

  read(): string | undefined {
    if (!isSymlink(this.linkPath)) return undefined;
    const name = basename(readlinkSync(this.linkPath));
    return name.endsWith(".json") ? name.slice(0, -".json".length) : undefined;
  }

  write(sessionId: string): void {
    ensureDir(dirname(this.linkPath));
    const target = relative(
      dirname(this.linkPath),
      join(this.sessionsDir, sessionFileName(sessionId)),
    );
    const tempPath = siblingTempPath(this.linkPath);
    symlinkSync(target, tempPath);
    try {
      renameSync(tempPath, this.linkPath);
    } catch (err) {
      rmSync(tempPath, { force: true });
      throw err;
    }
  }
}

/**
 * Pointer stored as a plain file holding the session id. Also reads the
 * legacy layout where the file held a whole session document.
 */
export class FileLatestPointer implements LatestPointer {
  constructor(private readonly filePath: string) {}

  read(): string | undefined {
    const text = this.readText()?.trim();
    return text && SESSION_ID_RE.test(text) ? text : undefined;
  }

  write(sessionId: string): void {
    // rename replaces a symlink rather than writing through it
    writeFileAtomic(this.filePath, `${sessionId}\n`);
  }

  readDocument(): unknown {
    const text = this.readText();
    if (text === undefined || !text.trimStart().startsWith("{")) {
      return undefined;
    }
    try {
      return JSON.parse(text) as unknown;
    } catch {
      log.debug(`Ignoring unparsable pointer document at ${this.filePath}`);
      return undefined;
    }
  }

  private readText(): string | undefined {
    try {
      return readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      log.debug(`Cannot read latest pointer ${this.filePath}: ${String(err)}`);
      return undefined;
    }
  }
}

/**
 * Prefer the symlink form; fall back to the plain file where the platform
 * refuses symlinks. A pointer that cannot be written at all is logged, not
 * raised: the session itself is already safely on disk.
 */
export class FallbackLatestPointer implements LatestPointer {
  constructor(
    private readonly primary: LatestPointer,
    private readonly fallback: LatestPointer,
  ) {}

  read(): string | undefined {
    return this.primary.read() ?? this.fallback.read();
  }

  write(sessionId: string): void {
    try {
      this.primary.write(sessionId);
      return;
    } catch (err) {
      log.debug(`Symlink pointer unavailable, using plain file: ${String(err)}`);
    }
    try {
      this.fallback.write(sessionId);
    } catch (err) {
      log.warn(`Could not update latest-session pointer: ${String(err)}`);
    }
  }

  readDocument(): unknown {
    return this.primary.readDocument?.() ?? this.fallback.readDocument?.();
  }
}

export function createLatestPointer(
  pointerPath: string,
  sessionsDir: string,
): LatestPointer {
  return new FallbackLatestPointer(
    new SymlinkLatestPointer(pointerPath, sessionsDir),
    new FileLatestPointer(pointerPath),
  );
}

/**
 * In-process pointer for tests and ephemeral use.
 */
export class MemoryLatestPointer implements LatestPointer {
  constructor(
    private current?: string,
    private readonly document?: unknown,
  ) {}

  read(): string | undefined {
    return this.current;
  }

  write(sessionId: string): void {
    this.current = sessionId;
  }

  readDocument(): unknown {
    return this.document;
  }
}
