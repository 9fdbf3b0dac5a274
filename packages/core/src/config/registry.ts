import { ConfigError, NotFoundError, ValidationError } from "../infra/errors.js";
import { formatIssues, loadConfig, saveConfig } from "./loader.js";
import { ModelEntrySchema } from "./schema.js";
import type { ModelConfig, ModelEntry } from "./types.js";

/**
 * Shortname → model configuration map persisted in config.json.
 * Every call re-reads the file, so concurrent edits by hand are picked up.
 */
export class ModelRegistry {
  constructor(private readonly configPath: string) {}

  /**
   * Add or overwrite a shortname.
   */
  upsert(shortname: string, config: ModelConfig): void {
    requireNonBlank(shortname.trim().length > 0, "Shortname");
    requireNonBlank(config.provider.trim().length > 0, "Provider");
    requireNonBlank(config.model.trim().length > 0, "Model");

    const entry: ModelEntry = {
      provider: config.provider,
      model: config.model,
      sysprompt: config.sysprompt ?? null,
      ...(config.temperature !== undefined && { temperature: config.temperature }),
      ...(config.topP !== undefined && { top_p: config.topP }),
      ...(config.topK !== undefined && { top_k: Math.trunc(config.topK) }),
    };

    const file = loadConfig(this.configPath);
    saveConfig(this.configPath, {
      ...file,
      models: { ...file.models, [shortname]: entry },
    });
  }

  get(shortname: string): ModelConfig {
    const file = loadConfig(this.configPath);
    if (!Object.hasOwn(file.models, shortname)) {
      throw new NotFoundError(`Unknown model shortname: '${shortname}'`);
    }
    return toModelConfig(shortname, file.models[shortname]);
  }

  has(shortname: string): boolean {
    return Object.hasOwn(loadConfig(this.configPath).models, shortname);
  }

  /**
   * All entries sorted by shortname. An invalid entry fails the whole listing.
   */
  list(): Array<[string, ModelConfig]> {
    const file = loadConfig(this.configPath);
    return Object.keys(file.models)
      .sort()
      .map((name) => [name, toModelConfig(name, file.models[name])]);
  }

  remove(shortname: string): void {
    const file = loadConfig(this.configPath);
    if (!Object.hasOwn(file.models, shortname)) {
      throw new NotFoundError(`Unknown model shortname: '${shortname}'`);
    }
    const { [shortname]: _removed, ...rest } = file.models;
    saveConfig(this.configPath, { ...file, models: rest });
  }
}

function requireNonBlank(ok: boolean, label: string): void {
  if (!ok) {
    throw new ValidationError(`${label} must be non-empty`);
  }
}

function toModelConfig(shortname: string, raw: unknown): ModelConfig {
  const result = ModelEntrySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid model entry for '${shortname}':\n${formatIssues(result.error.issues)}`,
    );
  }
  const entry = result.data;
  return {
    provider: entry.provider,
    model: entry.model,
    ...(entry.sysprompt != null && { sysprompt: entry.sysprompt }),
    ...(entry.temperature != null && { temperature: entry.temperature }),
    ...(entry.top_p != null && { topP: entry.top_p }),
    ...(entry.top_k != null && { topK: entry.top_k }),
  };
}
