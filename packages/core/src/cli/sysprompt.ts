import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { UserError, ValidationError } from "../infra/errors.js";

export interface SyspromptOptions {
  sysprompt?: string;
  syspromptFile?: string;
}

function expandHome(path: string): string {
  return path.replace(/^~(?=$|[\\/])/, homedir());
}

/**
 * Resolve `--sysprompt` / `--sysprompt-file` (at most one). File content
 * loses its trailing newlines; `-` reads stdin.
 */
export async function resolveSysprompt(
  options: SyspromptOptions,
  readStdin: () => Promise<string>,
): Promise<string | undefined> {
  if (options.sysprompt !== undefined && options.syspromptFile !== undefined) {
    throw new ValidationError("Use only one of --sysprompt or --sysprompt-file");
  }
  const path = options.syspromptFile;
  if (path === undefined) return options.sysprompt;

  let content: string;
  try {
    content = path === "-" ? await readStdin() : readFileSync(expandHome(path), "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UserError(`Failed to read sysprompt file '${path}': ${reason}`, undefined, err);
  }
  return content.replace(/\n+$/, "");
}
