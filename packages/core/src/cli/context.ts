import { text } from "node:stream/consumers";
import type { TextWriter } from "../batch/sink.js";
import { ensurePaths, resolveHome, resolvePaths } from "../config/paths.js";
import type { MqPaths } from "../config/paths.js";
import { ModelRegistry } from "../config/registry.js";
import type { SamplingOptions } from "../config/types.js";
import { chat } from "../llm/chat.js";
import type { ChatFn } from "../llm/types.js";
import { createLatestPointer } from "../sessions/latest-pointer.js";
import { SessionStore } from "../sessions/store.js";

/**
 * Everything a command touches outside its arguments. Tests swap in a fake
 * `chat`, collecting writers and a temporary MQ_HOME.
 */
export interface CliDeps {
  chat: ChatFn;
  stdout: TextWriter;
  stderr: TextWriter;
  readStdin: () => Promise<string>;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export function defaultDeps(): CliDeps {
  return {
    chat,
    stdout: process.stdout,
    stderr: process.stderr,
    readStdin: () => text(process.stdin),
    env: process.env,
  };
}

export interface MqState {
  paths: MqPaths;
  registry: ModelRegistry;
  sessions: SessionStore;
}

/**
 * Open the state directory (created on first use) and the stores over it.
 */
export function openState(env: NodeJS.ProcessEnv): MqState {
  const paths = ensurePaths(resolvePaths(resolveHome(env)));
  return {
    paths,
    registry: new ModelRegistry(paths.config),
    sessions: new SessionStore(
      paths.sessions,
      createLatestPointer(paths.lastConversation, paths.sessions),
    ),
  };
}

export function samplingOf(options: SamplingOptions): SamplingOptions {
  return {
    ...(options.temperature !== undefined && { temperature: options.temperature }),
    ...(options.topP !== undefined && { topP: options.topP }),
    ...(options.topK !== undefined && { topK: options.topK }),
  };
}
