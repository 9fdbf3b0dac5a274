import { z } from "zod";

export const CONFIG_VERSION = 1;

const nonBlank = (label: string) =>
  z.string().refine((s) => s.trim().length > 0, {
    message: `${label} must be non-empty`,
  });

/**
 * One registry entry as stored in config.json. Sampling keys keep the
 * snake_case spelling of the on-disk format.
 */
export const ModelEntrySchema = z.object({
  provider: nonBlank("provider"),
  model: nonBlank("model"),
  sysprompt: z.string().nullable().optional(),
  temperature: z.number().nullable().optional(),
  top_p: z.number().nullable().optional(),
  top_k: z.number().int().nullable().optional(),
});

export const ConfigFileSchema = z
  .object({
    version: z.number().int().min(0).default(CONFIG_VERSION),
    models: z.record(z.unknown()).default({}),
  })
  .passthrough();
