import { z } from "zod";
import { SESSION_VERSION } from "./types.js";
import type { Session } from "./types.js";

export const ChatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

/**
 * On-disk session document (sessions/<id>.json).
 */
export const SessionDocumentSchema = z.object({
  version: z.number().int().optional(),
  id: z.string().optional(),
  created_at: z.string().default(""),
  updated_at: z.string().optional(),
  model_shortname: z.string().default(""),
  provider: z.string(),
  model: z.string(),
  sysprompt: z.string().nullable().default(null),
  messages: z.array(ChatMessageSchema),
});

export type SessionDocument = z.infer<typeof SessionDocumentSchema>;

export function toSession(doc: SessionDocument, fallbackId: string): Session {
  return {
    id: doc.id || fallbackId,
    createdAt: doc.created_at,
    updatedAt: doc.updated_at ?? doc.created_at,
    modelShortname: doc.model_shortname,
    provider: doc.provider,
    model: doc.model,
    sysprompt: doc.sysprompt,
    messages: doc.messages.map((m) => ({ role: m.role, content: m.content })),
  };
}

export function toDocument(session: Session): SessionDocument {
  return {
    version: SESSION_VERSION,
    id: session.id,
    created_at: session.createdAt,
    updated_at: session.updatedAt,
    model_shortname: session.modelShortname,
    provider: session.provider,
    model: session.model,
    sysprompt: session.sysprompt,
    messages: session.messages.map((m) => ({ role: m.role, content: m.content })),
  };
}
