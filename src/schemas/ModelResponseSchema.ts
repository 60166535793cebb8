import { z } from 'zod';

/**
 * Shape of one attribute in a model reply. Lenient about types:
 * values are cleaned afterwards by the response parser.
 */
export const RawAttributeFieldSchema = z.object({
  value: z
    .union([z.string(), z.number(), z.array(z.union([z.string(), z.number()])), z.null()])
    .optional(),
  evidence: z.string().nullable().optional(),
  confidence: z.union([z.number(), z.string()]).nullable().optional(),
});

/** The reply must be a JSON object carrying an `attributes` object. */
export const ModelResponseSchema = z.object({
  attributes: z.record(z.string(), z.unknown()),
});

export type RawAttributeField = z.infer<typeof RawAttributeFieldSchema>;
