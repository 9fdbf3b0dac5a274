import type { z } from "zod";
import type { ConfigFileSchema, ModelEntrySchema } from "./schema.js";

export type ModelEntry = z.infer<typeof ModelEntrySchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * A resolved registry entry, as handed to the request layer.
 */
export interface ModelConfig {
  provider: string;
  model: string;
  sysprompt?: string;
  temperature?: number;
  topP?: number;
  topK?: number;
}

export interface SamplingOptions {
  temperature?: number;
  topP?: number;
  topK?: number;
}
