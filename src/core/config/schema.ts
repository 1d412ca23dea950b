/**
 * Schema for setting-extractor.yaml.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** What to do when the parser cannot produce a tree for a file. */
export const ParseErrorPolicySchema = z.enum(['continue', 'abort']);

/** Output serialization format. */
export const OutputFormatSchema = z.enum(['json', 'yaml']);

/** Parsing service connection. */
export const ServiceSettingsSchema = z.object({
  /** Base URL of the tree-producing service */
  endpoint: z.string().url().default('http://localhost:9432'),
  timeout_ms: z.number().int().min(1).default(30000),
  /** Extra attempts after a transient failure */
  retries: z.number().int().min(0).max(10).default(2),
  /** Base delay for exponential backoff */
  retry_delay_ms: z.number().int().min(0).default(250),
});

/** Which files are scanned. */
export const ScanSettingsSchema = z.object({
  /** Directory to scan; recorded paths are relative to it */
  root: z.string().default('.'),
  /** File extension including the dot, e.g. `.java` */
  extension: z
    .string()
    .regex(/^\.[^./\\]+$/, 'Expected an extension with a leading dot, e.g. .java')
    .default('.java'),
  exclude: z.array(z.string()).default(['**/node_modules/**', '**/build/**', '**/.git/**']),
  on_parse_error: ParseErrorPolicySchema.default('continue'),
});

export const OutputSettingsSchema = z.object({
  path: z.string().default('settings.json'),
  format: OutputFormatSchema.default('json'),
});

/** Identifiers the extractor matches on. */
export const MatchSettingsSchema = z.object({
  setting_type: z.string().min(1).default('Setting'),
  property_anchor: z.string().min(1).default('Property'),
});

/** Complete setting-extractor.yaml schema; an empty file means all defaults. */
export const ConfigSchema = withDefaults(
  z.object({
    version: z.string().default('1.0'),
    service: withDefaults(ServiceSettingsSchema),
    scan: withDefaults(ScanSettingsSchema),
    output: withDefaults(OutputSettingsSchema),
    match: withDefaults(MatchSettingsSchema),
  })
);

export type ParseErrorPolicy = z.infer<typeof ParseErrorPolicySchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type ServiceSettings = z.infer<typeof ServiceSettingsSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type MatchSettings = z.infer<typeof MatchSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
