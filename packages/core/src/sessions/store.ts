import { randomBytes } from "node:crypto";
import { existsSync, readdirSync, rmSync, statSync } from "node:fs";
import { join } from "node:path";
import {
  ensureDir,
  isNotFound,
  readJsonFile,
  writeJsonAtomic,
} from "../infra/atomic-file.js";
import {
  ConfigError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { SessionDocumentSchema, toDocument, toSession } from "./schema.js";
import { SESSION_ID_RE } from "./types.js";
import type { LatestPointer, NewSession, Session } from "./types.js";

const log = createLogger("sessions");

/**
 * UTC timestamp with second precision, e.g. 2024-05-01T12:00:00Z.
 * Fixed width, so string order is chronological order.
 */
export function nowIso(now: Date = new Date()): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function validateSessionId(sessionId: string): void {
  if (!sessionId) {
    throw new ValidationError("Session id must be non-empty");
  }
  if (!SESSION_ID_RE.test(sessionId)) {
    throw new ValidationError(
      "Invalid session id (use only letters, digits, '_' and '-', no spaces)",
    );
  }
}

export function generateSessionId(): string {
  return randomBytes(16).toString("hex");
}

/**
 * Session store: one JSON document per session under `sessionsDir`, written
 * atomically, plus a pointer naming the latest session.
 *
 * No cross-process locking: concurrent writers to one id race and the last
 * rename wins.
 */
export class SessionStore {
  constructor(
    private readonly sessionsDir: string,
    private readonly pointer: LatestPointer,
    private readonly clock: () => Date = () => new Date(),
  ) {
    ensureDir(sessionsDir);
  }

  pathFor(sessionId: string): string {
    validateSessionId(sessionId);
    return join(this.sessionsDir, `${sessionId}.json`);
  }

  exists(sessionId: string): boolean {
    if (!SESSION_ID_RE.test(sessionId)) return false;
    return existsSync(this.pathFor(sessionId));
  }

  /**
   * Create a new session and make it the latest. Returns the session id.
   */
  create(input: NewSession): string {
    const sessionId = input.id ?? generateSessionId();
    const filePath = this.pathFor(sessionId);
    if (existsSync(filePath)) {
      throw new ConflictError(`Session already exists: '${sessionId}'`);
    }

    const createdAt = nowIso(this.clock());
    const session: Session = {
      id: sessionId,
      createdAt,
      updatedAt: createdAt,
      modelShortname: input.modelShortname,
      provider: input.provider,
      model: input.model,
      sysprompt: input.sysprompt ?? null,
      messages: input.messages.map((m) => ({ ...m })),
    };

    writeJsonAtomic(filePath, toDocument(session));
    this.pointer.write(sessionId);
    log.debug(`Created session ${sessionId}`);
    return sessionId;
  }

  load(sessionId: string): Session {
    const filePath = this.pathFor(sessionId);
    let data: unknown;
    try {
      data = readJsonFile(filePath);
    } catch (err) {
      if (isNotFound(err)) {
        throw new NotFoundError(`Unknown session id: '${sessionId}'`, err);
      }
      throw err;
    }
    return this.parse(data, sessionId, filePath);
  }

  /**
   * Persist a session, refreshing updatedAt, and make it the latest.
   * Returns the stored copy.
   */
  save(session: Session): Session {
    if (typeof session.id !== "string" || !session.id) {
      throw new ConfigError("Invalid session (missing id)");
    }
    const filePath = this.pathFor(session.id);
    const saved: Session = {
      ...session,
      updatedAt: this.nextTimestamp(session.updatedAt),
      messages: session.messages.map((m) => ({ ...m })),
    };
    writeJsonAtomic(filePath, toDocument(saved));
    this.pointer.write(saved.id);
    return saved;
  }

  /**
   * Resolve the latest session: a legacy full document at the pointer, then
   * the id the pointer names, then the most recently modified session file.
   */
  loadLatest(): Session {
    const legacy = this.pointer.readDocument?.();
    if (
      typeof legacy === "object" &&
      legacy !== null &&
      "id" in legacy &&
      typeof legacy.id === "string" &&
      legacy.id
    ) {
      const parsed = SessionDocumentSchema.safeParse(legacy);
      if (parsed.success) {
        return toSession(parsed.data, legacy.id);
      }
    }

    const pointed = this.pointer.read();
    if (pointed) {
      try {
        return this.load(pointed);
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        log.debug(`Latest pointer names missing session ${pointed}`);
      }
    }

    const newest = this.sessionFiles()
      .map((file) => ({ file, mtime: this.mtimeOf(file) }))
      .filter((e): e is { file: string; mtime: number } => e.mtime !== null)
      .sort((a, b) => b.mtime - a.mtime)[0];
    if (!newest) {
      throw new NotFoundError("No previous conversation found");
    }
    return this.load(newest.file.replace(/\.json$/, ""));
  }

  /**
   * All readable sessions, most recently updated first. Unreadable files are
   * skipped.
   */
  list(): Session[] {
    const sessions: Session[] = [];
    for (const file of this.sessionFiles()) {
      const stem = file.replace(/\.json$/, "");
      const filePath = join(this.sessionsDir, file);
      try {
        sessions.push(this.parse(readJsonFile(filePath), stem, filePath));
      } catch (err) {
        log.debug(`Skipping unreadable session file ${file}: ${String(err)}`);
      }
    }
    const sortKey = (s: Session) => s.updatedAt || s.createdAt || "";
    return sessions.sort((a, b) => {
      const ka = sortKey(a);
      const kb = sortKey(b);
      return ka < kb ? 1 : ka > kb ? -1 : 0;
    });
  }

  /**
   * Make an existing session the latest without modifying it.
   */
  select(sessionId: string): void {
    this.load(sessionId);
    this.pointer.write(sessionId);
  }

  rename(oldId: string, newId: string): void {
    validateSessionId(oldId);
    validateSessionId(newId);
    if (oldId === newId) return;

    const oldPath = this.pathFor(oldId);
    if (!existsSync(oldPath)) {
      throw new NotFoundError(`Unknown session id: '${oldId}'`);
    }
    const newPath = this.pathFor(newId);
    if (existsSync(newPath)) {
      throw new ConflictError(`Session already exists: '${newId}'`);
    }

    const session = this.load(oldId);
    const renamed: Session = {
      ...session,
      id: newId,
      updatedAt: this.nextTimestamp(session.updatedAt),
    };
    writeJsonAtomic(newPath, toDocument(renamed));
    rmSync(oldPath, { force: true });

    if (this.pointer.read() === oldId) {
      this.pointer.write(newId);
    }
    log.debug(`Renamed session ${oldId} -> ${newId}`);
  }

  private parse(data: unknown, sessionId: string, filePath: string): Session {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new ConfigError(`Invalid session format in ${filePath}`);
    }
    const result = SessionDocumentSchema.safeParse(data);
    if (!result.success) {
      throw new ConfigError(
        `Invalid session format in ${filePath}: ${result.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
      );
    }
    return toSession(result.data, sessionId);
  }

  // updatedAt never moves backwards, even if the clock does
  private nextTimestamp(previous: string): string {
    const now = nowIso(this.clock());
    return previous && previous > now ? previous : now;
  }

  private sessionFiles(): string[] {
    try {
      return readdirSync(this.sessionsDir).filter((f) => f.endsWith(".json"));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }

  private mtimeOf(file: string): number | null {
    try {
      return statSync(join(this.sessionsDir, file)).mtimeMs;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }
}
