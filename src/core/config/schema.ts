/**
 * Configuration schema for `.propcheck/config.yaml`.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and applies its inner defaults when missing.
 * Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const PropertiesSettingsSchema = z.object({
  /** Files or glob patterns checked when the CLI gets none */
  paths: z.array(z.string()).min(1).default(['src/main/resources/application.properties']),
});

export const CatalogueSettingsSchema = z.object({
  /** Project rule catalogue; the bundled default is used when it does not exist */
  path: z.string().default('.propcheck/rules.yaml'),
  /** Profiles exempt from rules that declare no exclude list */
  excluded_profiles: z.array(z.string()).default(['dev', 'test']),
});

export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  error: z.number().int().default(1),
});

export const ValidationSettingsSchema = z.object({
  /** Profiles to validate under; '' is the base profile */
  profiles: z.array(z.string()).default(['']),
  /** Also validate every profile found in each file */
  all_profiles: z.boolean().default(false),
  /** Files validated in parallel (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
  exit_codes: withDefaults(ExitCodesSchema),
});

export const OutputFormatSchema = z.enum(['human', 'json', 'compact']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
});

export const ConfigSchema = z.object({
  properties: withDefaults(PropertiesSettingsSchema),
  catalogue: withDefaults(CatalogueSettingsSchema),
  validation: withDefaults(ValidationSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

/** Top-level shape of the config file. An empty file means all defaults. */
export const ConfigFileSchema = withDefaults(ConfigSchema);

export type Config = z.output<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type OutputFormat = z.output<typeof OutputFormatSchema>;
