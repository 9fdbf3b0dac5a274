import type { SamplingOptions } from "../config/types.js";
import { createLogger } from "../infra/logger.js";
import { getProvider } from "../llm/providers.js";
import type { ChatMessage } from "../llm/types.js";
import { openState, samplingOf } from "./context.js";
import type { CliDeps } from "./context.js";
import { emitResult } from "./output.js";
import { resolveSysprompt } from "./sysprompt.js";
import type { SyspromptOptions } from "./sysprompt.js";

const log = createLogger("cli");

export interface AddOptions extends SyspromptOptions, SamplingOptions {
  provider: string;
}

export interface TestOptions extends AddOptions {
  save?: boolean;
  json?: boolean;
}

export async function addModel(
  deps: CliDeps,
  shortname: string,
  model: string,
  options: AddOptions,
): Promise<void> {
  getProvider(options.provider);
  const sysprompt = await resolveSysprompt(options, deps.readStdin);
  openState(deps.env).registry.upsert(shortname, {
    provider: options.provider,
    model,
    ...(sysprompt !== undefined && { sysprompt }),
    ...samplingOf(options),
  });
  log.info(`Saved model '${shortname}' (${options.provider}/${model})`);
}

export function listModels(deps: CliDeps): void {
  const models = openState(deps.env).registry.list();
  if (models.length === 0) {
    deps.stdout.write("(no models configured)\n");
    return;
  }
  for (const [shortname, entry] of models) {
    deps.stdout.write(`${shortname}\t${entry.provider}\t${entry.model}\n`);
  }
}

export function removeModel(deps: CliDeps, shortname: string): void {
  openState(deps.env).registry.remove(shortname);
}

/**
 * Send one query to a provider/model pair without touching sessions. The
 * alias is stored only when --save is given and the query succeeded.
 */
export async function testModel(
  deps: CliDeps,
  shortname: string,
  model: string,
  query: string,
  options: TestOptions,
): Promise<void> {
  getProvider(options.provider);
  const sysprompt = await resolveSysprompt(options, deps.readStdin);

  const messages: ChatMessage[] = [];
  if (sysprompt) messages.push({ role: "system", content: sysprompt });
  messages.push({ role: "user", content: query });

  const result = await deps.chat({
    provider: options.provider,
    model,
    messages,
    ...samplingOf(options),
    ...(deps.signal && { signal: deps.signal }),
  });

  if (options.save) {
    openState(deps.env).registry.upsert(shortname, {
      provider: options.provider,
      model,
      ...(sysprompt !== undefined && { sysprompt }),
      ...samplingOf(options),
    });
  }

  emitResult(
    deps.stdout,
    {
      response: result.content,
      ...(result.reasoning !== undefined && { reasoning: result.reasoning }),
      prompt: query,
      sysprompt: sysprompt ?? null,
    },
    options.json === true,
  );
}
