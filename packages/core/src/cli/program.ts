import { Command, CommanderError, InvalidArgumentError } from "commander";
import { AppError, LlmError, UserError } from "../infra/errors.js";
import { createLogger, setLogLevel } from "../infra/logger.js";
import { listProviders } from "../llm/providers.js";
import { DEFAULT_WORKERS, batch } from "./batch.js";
import type { BatchCommandOptions } from "./batch.js";
import { defaultDeps } from "./context.js";
import type { CliDeps } from "./context.js";
import { DETAILED_HELP } from "./help.js";
import { addModel, listModels, removeModel, testModel } from "./models.js";
import type { AddOptions, TestOptions } from "./models.js";
import { formatLlmError } from "./output.js";
import {
  ask,
  continueSession,
  dumpSession,
  listSessions,
  renameSession,
  selectSession,
} from "./sessions.js";
import type { AskOptions, ContinueOptions } from "./sessions.js";

const log = createLogger("cli");

export const VERSION = "0.1.0";

function integerAtLeast(label: string, min: number): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`${label} must be an integer >= ${min}.`);
    }
    return parsed;
  };
}

function finiteNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function positiveNumber(value: string): number {
  const parsed = finiteNumber(value);
  if (parsed <= 0) throw new InvalidArgumentError("Must be greater than 0.");
  return parsed;
}

function findCommand(root: Command, path: readonly string[]): Command {
  let current = root;
  for (const part of path) {
    const next = current.commands.find(
      (c) => c.name() === part || c.aliases().includes(part),
    );
    if (!next) {
      throw new UserError(`Unknown help topic: '${path.join(" ")}'`);
    }
    current = next;
  }
  return current;
}

function addModelOptions(command: Command): Command {
  return command
    .requiredOption("--provider <name>", `Provider (${listProviders().join(", ")})`)
    .option("--sysprompt <text>", "System prompt")
    .option("--sysprompt-file <path>", "Read the system prompt from a file ('-' for stdin)")
    .option("--temperature <value>", "Sampling temperature", finiteNumber)
    .option("--top-p <value>", "Nucleus sampling probability", finiteNumber)
    .option("--top-k <n>", "Top-k sampling", integerAtLeast("top_k", 1));
}

/**
 * Build the command tree. `setExitCode` receives non-zero codes from
 * commands that finish without throwing.
 */
export function createProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command();

  // Settings below are inherited by every subcommand created afterwards.
  program
    .name("mq")
    .description("mq — Model Query CLI")
    .version(VERSION)
    .option("-v, --verbose", "Log debug output to stderr")
    .helpCommand(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        deps.stdout.write(text);
      },
      writeErr: (text) => {
        deps.stderr.write(text);
      },
    });

  program.hook("preAction", () => {
    if (program.opts<{ verbose?: boolean }>().verbose) setLogLevel("debug");
  });

  // --- mq help ---
  program
    .command("help [topic...]")
    .description("Show detailed help, or usage for one command")
    .action((topic: string[] | undefined) => {
      if (!topic || topic.length === 0) {
        deps.stdout.write(DETAILED_HELP);
        return;
      }
      findCommand(program, topic).outputHelp();
    });

  // --- mq add ---
  addModelOptions(
    program
      .command("add <shortname> <model>")
      .description("Add or update a model shortname"),
  ).action(async (shortname: string, model: string, options: AddOptions) => {
    await addModel(deps, shortname, model, options);
  });

  // --- mq models ---
  program
    .command("models")
    .description("List configured models")
    .action(() => {
      listModels(deps);
    });

  // --- mq rm ---
  program
    .command("rm <shortname>")
    .description("Remove a model shortname")
    .action((shortname: string) => {
      removeModel(deps, shortname);
    });

  // --- mq ask ---
  program
    .command("ask <shortname> <query>")
    .description("Ask a configured model; starts a new session")
    .option("-s, --sysprompt <text>", "Override the model's system prompt")
    .option("--json", "Print a single-line JSON object")
    .option("--session <id>", "Id for the new session")
    .option("-n, --no-session", "Do not store a session")
    .action(async (shortname: string, query: string, options: AskOptions) => {
      await ask(deps, shortname, query, options);
    });

  // --- mq continue ---
  program
    .command("continue <query>")
    .alias("cont")
    .description("Continue the latest (or given) session")
    .option("--session <id>", "Session to continue")
    .option("--json", "Print a single-line JSON object")
    .action(async (query: string, options: ContinueOptions) => {
      await continueSession(deps, query, options);
    });

  // --- mq dump ---
  program
    .command("dump")
    .description("Print a stored session as JSON")
    .option("--session <id>", "Session to print (default: latest)")
    .action((options: { session?: string }) => {
      dumpSession(deps, options);
    });

  // --- mq test ---
  addModelOptions(
    program
      .command("test <shortname> <model> <query>")
      .description("Try a provider/model without creating a session"),
  )
    .option("--save", "Save the shortname if the query succeeds")
    .option("--json", "Print a single-line JSON object")
    .action(async (shortname: string, model: string, query: string, options: TestOptions) => {
      await testModel(deps, shortname, model, query, options);
    });

  // --- mq session ---
  const session = program.command("session").description("Manage stored sessions");

  session
    .command("list")
    .description("List sessions, most recent first")
    .action(() => {
      listSessions(deps);
    });

  session
    .command("select <id>")
    .description("Make a session the latest")
    .action((id: string) => {
      selectSession(deps, id);
    });

  session
    .command("rename <old-id> <new-id>")
    .description("Rename a session")
    .action((oldId: string, newId: string) => {
      renameSession(deps, oldId, newId);
    });

  // --- mq batch ---
  program
    .command("batch <shortname>")
    .description("Run JSON-lines prompts through a model in parallel")
    .option("-i, --input <path>", "Input JSONL file ('-' or omitted: stdin)")
    .option("-o, --output <path>", "Output JSONL file ('-' or omitted: stdout)")
    .option(
      "-w, --workers <n>",
      "Concurrent requests",
      integerAtLeast("Worker count", 1),
      DEFAULT_WORKERS,
    )
    .option("-s, --sysprompt <text>", "Override the model's system prompt")
    .option("--prefix <text>", "Text prepended to every prompt")
    .option("--suffix <text>", "Text appended to every prompt")
    .option("--extract-tags", "Copy <tag>value</tag> pairs from responses into tag:* keys")
    .option("--timeout <seconds>", "Per-request timeout", positiveNumber)
    .option("--retries <n>", "Retries per request", integerAtLeast("Retries", 0))
    .action(async (shortname: string, options: BatchCommandOptions) => {
      setExitCode(await batch(deps, shortname, options));
    });

  return program;
}

function reportError(deps: CliDeps, err: unknown): number {
  if (err instanceof CommanderError) {
    // commander has already printed its message or the help text.
    return err.exitCode === 0 ? 0 : 2;
  }
  if (err instanceof LlmError) {
    deps.stderr.write(formatLlmError(err));
    return err.exitCode;
  }
  if (err instanceof AppError) {
    deps.stderr.write(`${err.message}\n`);
    return err.exitCode;
  }
  const message = err instanceof Error ? err.message : String(err);
  deps.stderr.write(`Unexpected error: ${message}\n`);
  log.debug(err);
  return 1;
}

/**
 * Run the CLI on user arguments (without node and script path) and return
 * the process exit code. Never throws.
 */
export async function runCli(
  argv: readonly string[],
  overrides: Partial<CliDeps> = {},
): Promise<number> {
  const deps: CliDeps = { ...defaultDeps(), ...overrides };
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    return reportError(deps, err);
  }
  return exitCode;
}
