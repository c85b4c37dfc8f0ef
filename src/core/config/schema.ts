import { z } from 'zod';

/**
 * Make an object field optional, applying the inner schema's defaults when it
 * is missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** What to do when documented and actual parameters differ. */
export const FailurePolicySchema = z.enum(['error', 'warn']);

export const OutputFormatSchema = z.enum(['human', 'json']);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const VerificationConfigSchema = z.object({
  on_failure: FailurePolicySchema.default('error'),
});

const OutputConfigSchema = z.object({
  /** Snippets are written to <directory>/<operation>/<snippet>.<ext> */
  directory: z.string().default('build/snippets'),
  format: OutputFormatSchema.default('json'),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const ConfigSchema = z.object({
  verification: withDefaults(VerificationConfigSchema),
  output: withDefaults(OutputConfigSchema),
  logging: withDefaults(LoggingConfigSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
