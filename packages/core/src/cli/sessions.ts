import type { ModelRegistry } from "../config/registry.js";
import type { SamplingOptions } from "../config/types.js";
import { ConflictError } from "../infra/errors.js";
import type { ChatMessage } from "../llm/types.js";
import { toDocument } from "../sessions/schema.js";
import { validateSessionId } from "../sessions/store.js";
import { openState, samplingOf } from "./context.js";
import type { CliDeps } from "./context.js";
import {
  emitResult,
  firstUserPrompt,
  formatPromptPreview,
  sessionHeader,
} from "./output.js";

export interface AskOptions {
  sysprompt?: string;
  json?: boolean;
  /** A requested id, or false for --no-session. */
  session?: string | false;
}

export interface ContinueOptions {
  session?: string;
  json?: boolean;
}

const JSON_CONTEXT_WARNING =
  "warning: --json output does not include full conversation context (use `mq dump` for history)\n";

function samplingFor(registry: ModelRegistry, shortname: string): SamplingOptions {
  return registry.has(shortname) ? samplingOf(registry.get(shortname)) : {};
}

/**
 * One-shot query. Unless --no-session is given the exchange is stored as a
 * new session, which becomes the latest.
 */
export async function ask(
  deps: CliDeps,
  shortname: string,
  query: string,
  options: AskOptions,
): Promise<void> {
  const { registry, sessions } = openState(deps.env);
  const entry = registry.get(shortname);
  const sysprompt = options.sysprompt ?? entry.sysprompt;
  const persist = options.session !== false;
  const requestedId = typeof options.session === "string" ? options.session : undefined;

  // Fail before spending a request on an id that cannot be stored.
  if (requestedId !== undefined) {
    validateSessionId(requestedId);
    if (sessions.exists(requestedId)) {
      throw new ConflictError(`Session already exists: '${requestedId}'`);
    }
  }

  const messages: ChatMessage[] = [];
  if (sysprompt) messages.push({ role: "system", content: sysprompt });
  messages.push({ role: "user", content: query });

  const result = await deps.chat({
    provider: entry.provider,
    model: entry.model,
    messages,
    ...samplingOf(entry),
    ...(deps.signal && { signal: deps.signal }),
  });

  let sessionId: string | undefined;
  if (persist) {
    sessionId = sessions.create({
      modelShortname: shortname,
      provider: entry.provider,
      model: entry.model,
      sysprompt: sysprompt || null,
      messages: [...messages, { role: "assistant", content: result.content }],
      ...(requestedId !== undefined && { id: requestedId }),
    });
  }

  if (!options.json) deps.stdout.write(sessionHeader(sessionId));
  emitResult(
    deps.stdout,
    {
      response: result.content,
      ...(result.reasoning !== undefined && { reasoning: result.reasoning }),
      prompt: query,
      sysprompt: sysprompt ?? null,
      ...(sessionId !== undefined && { session: sessionId }),
    },
    options.json === true,
  );
}

/**
 * Follow-up turn on the given session, or the latest one.
 */
export async function continueSession(
  deps: CliDeps,
  query: string,
  options: ContinueOptions,
): Promise<void> {
  const { registry, sessions } = openState(deps.env);
  const session =
    options.session !== undefined ? sessions.load(options.session) : sessions.loadLatest();

  if (options.json) deps.stderr.write(JSON_CONTEXT_WARNING);

  const messages: ChatMessage[] = [
    ...session.messages,
    { role: "user", content: query },
  ];
  const result = await deps.chat({
    provider: session.provider,
    model: session.model,
    messages,
    ...samplingFor(registry, session.modelShortname),
    ...(deps.signal && { signal: deps.signal }),
  });

  const saved = sessions.save({
    ...session,
    messages: [...messages, { role: "assistant", content: result.content }],
  });

  if (!options.json) deps.stdout.write(sessionHeader(saved.id));
  emitResult(
    deps.stdout,
    {
      response: result.content,
      ...(result.reasoning !== undefined && { reasoning: result.reasoning }),
      prompt: query,
      sysprompt: saved.sysprompt,
      session: saved.id,
    },
    options.json === true,
  );
}

export function dumpSession(deps: CliDeps, options: { session?: string }): void {
  const { sessions } = openState(deps.env);
  const session =
    options.session !== undefined ? sessions.load(options.session) : sessions.loadLatest();
  deps.stdout.write(`${JSON.stringify(toDocument(session), null, 2)}\n`);
}

export function listSessions(deps: CliDeps): void {
  const sessions = openState(deps.env).sessions.list();
  if (sessions.length === 0) {
    deps.stdout.write("(no sessions)\n");
    return;
  }
  for (const session of sessions) {
    deps.stdout.write(`${session.id}\t${session.updatedAt || session.createdAt}\n`);
    deps.stdout.write(`${formatPromptPreview(firstUserPrompt(session.messages))}\n`);
  }
}

export function selectSession(deps: CliDeps, sessionId: string): void {
  openState(deps.env).sessions.select(sessionId);
}

export function renameSession(deps: CliDeps, oldId: string, newId: string): void {
  openState(deps.env).sessions.rename(oldId, newId);
}
