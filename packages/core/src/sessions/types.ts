import type { ChatMessage } from "../llm/types.js";

export const SESSION_VERSION = 1;

export const SESSION_ID_RE = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

export interface Session {
  id: string;
  createdAt: string;
  updatedAt: string;
  modelShortname: string;
  provider: string;
  model: string;
  sysprompt: string | null;
  messages: ChatMessage[];
}

export interface NewSession {
  modelShortname: string;
  provider: string;
  model: string;
  sysprompt?: string | null;
  messages: ChatMessage[];
  /** Requested id; a random one is generated when omitted. */
  id?: string;
}

/**
 * Durable "current session" indirection.
 */
export interface LatestPointer {
  read(): string | undefined;
  write(sessionId: string): void;
  /**
   * Older installs kept a full session document at the pointer location.
   * Implementations backed by that location return its parsed JSON.
   */
  readDocument?(): unknown;
}
