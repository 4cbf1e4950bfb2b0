/**
 * Category taxonomy schemas
 */

import { z } from "zod";

const term = z.string().trim().min(1, "Must not be empty").max(64, "Must be 64 characters or less");

/**
 * Request schema for growing the taxonomy
 * - labels: new canonical labels
 * - synonyms: extra terms keyed by the label they resolve to
 */
export const ExtendCategoriesRequestSchema = z
  .object({
    labels: z.array(term).optional(),
    synonyms: z.record(term, z.array(term)).optional(),
  })
  .strict()
  .refine((body) => body.labels !== undefined || body.synonyms !== undefined, {
    message: "Provide labels or synonyms",
  });

export const CategoriesResponseSchema = z.object({
  version: z.number().int().positive(),
  labels: z.array(z.string()),
  synonyms: z.record(z.array(z.string())),
});

export type ExtendCategoriesRequest = z.infer<typeof ExtendCategoriesRequestSchema>;
export type CategoriesResponse = z.infer<typeof CategoriesResponseSchema>;
