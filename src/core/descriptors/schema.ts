/**
 * Schema of descriptor documents: the YAML files that declare which
 * parameter snippets an operation is documented with.
 */
import { z } from 'zod';

export const SnippetTypeSchema = z.enum(['request-parameters', 'path-parameters']);

export type SnippetType = z.infer<typeof SnippetTypeSchema>;

/**
 * Names and descriptions are only required to be strings here; blank values
 * are rejected by the registry so they surface as InvalidDescriptorError.
 */
export const ParameterEntrySchema = z.object({
  name: z.string(),
  description: z.string(),
  attributes: z.record(z.string(), z.unknown()).optional(),
});

export type ParameterEntry = z.infer<typeof ParameterEntrySchema>;

export const SnippetEntrySchema = z.object({
  type: SnippetTypeSchema,
  /** Extra keys merged into the rendered model */
  attributes: z.record(z.string(), z.unknown()).optional(),
  parameters: z.array(ParameterEntrySchema).default([]),
});

export type SnippetEntry = z.infer<typeof SnippetEntrySchema>;

export const DescriptorDocumentSchema = z.object({
  snippets: z.array(SnippetEntrySchema).min(1),
});

export type DescriptorDocument = z.infer<typeof DescriptorDocumentSchema>;
