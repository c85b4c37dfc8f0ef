/**
 * Schema of captured operation files (YAML or JSON).
 */
import { z } from 'zod';

/** A single value is accepted where a list of values is expected. */
const ValuesSchema = z.union([z.string(), z.array(z.string())]).transform((value) =>
  Array.isArray(value) ? value : [value]
);

export const CapturedRequestSchema = z.object({
  method: z.string().default('GET'),
  uri: z.string(),
  headers: z.record(z.string(), ValuesSchema).default({}),
  /** When omitted, parameters are read from the query string and form body */
  parameters: z.record(z.string(), ValuesSchema).optional(),
  content: z.string().optional(),
});

export const CapturedOperationSchema = z.object({
  name: z.string().optional(),
  request: CapturedRequestSchema,
  /** Path template shorthand, stored as the urlTemplate attribute */
  url_template: z.string().optional(),
  attributes: z.record(z.string(), z.unknown()).default({}),
});

export type CapturedOperation = z.infer<typeof CapturedOperationSchema>;
