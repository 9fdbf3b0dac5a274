import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ensureDir } from "../infra/atomic-file.js";

/**
 * Layout of the state directory:
 *
 *   <home>/config.json              model registry
 *   <home>/sessions/<id>.json       one file per session
 *   <home>/last_conversation.json   latest-session pointer
 */
export interface MqPaths {
  home: string;
  config: string;
  sessions: string;
  lastConversation: string;
}

export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.MQ_HOME?.trim();
  if (override) {
    return resolve(override.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return join(homedir(), ".mq");
}

export function resolvePaths(home: string = resolveHome()): MqPaths {
  return {
    home,
    config: join(home, "config.json"),
    sessions: join(home, "sessions"),
    lastConversation: join(home, "last_conversation.json"),
  };
}

/**
 * Create the home and sessions directories (owner-only) if missing.
 */
export function ensurePaths(paths: MqPaths): MqPaths {
  ensureDir(paths.home);
  ensureDir(paths.sessions);
  return paths;
}
