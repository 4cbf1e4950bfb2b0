/**
 * Ledger entry schemas for logging messages and listing entries
 * Used for request/response validation and type generation
 */

import { z } from "zod";

export const MAX_MESSAGE_LENGTH = 2000;

/**
 * Request schema for logging a free-text message
 * - text: the message as typed by the user; blank text is rejected by the
 *   ledger itself, not here
 */
export const LogEntryRequestSchema = z.object({
  text: z
    .string({ required_error: "Message text is required" })
    .max(MAX_MESSAGE_LENGTH, `Message must be ${MAX_MESSAGE_LENGTH} characters or less`),
});

const isoDate = z
  .string()
  .datetime({ offset: true, message: "Must be an ISO 8601 timestamp" })
  .transform((value) => new Date(value));

/**
 * Query schema for listing entries; both bounds are inclusive
 */
export const ListEntriesQuerySchema = z
  .object({
    from: isoDate.optional(),
    to: isoDate.optional(),
  })
  .refine(
    ({ from, to }) => !from || !to || from.getTime() <= to.getTime(),
    { message: "'from' must not be after 'to'", path: ["from"] }
  );

export const EntryTypeSchema = z.enum(["income", "expense"]);

/**
 * Response schema for a committed entry
 */
export const EntryResponseSchema = z.object({
  id: z.number().int().positive(),
  timestamp: z.string(), // ISO 8601 timestamp
  description: z.string(),
  category: z.string(),
  amount: z.number().positive(),
  type: EntryTypeSchema,
});

/**
 * Response schema for POST /v1/entries
 */
export const LogEntryResponseSchema = z.object({
  entry: EntryResponseSchema,
  warnings: z.array(z.string()),
});

export const ListEntriesResponseSchema = z.object({
  entries: z.array(EntryResponseSchema),
});

/**
 * Error body for messages the ledger did not commit
 */
export const EntryErrorResponseSchema = z.object({
  error: z.string(),
  code: z.string(),
  retryable: z.boolean(),
});

export type LogEntryRequest = z.infer<typeof LogEntryRequestSchema>;
export type ListEntriesQuery = z.infer<typeof ListEntriesQuerySchema>;
export type EntryResponse = z.infer<typeof EntryResponseSchema>;
export type LogEntryResponse = z.infer<typeof LogEntryResponseSchema>;
export type ListEntriesResponse = z.infer<typeof ListEntriesResponseSchema>;
export type EntryErrorResponse = z.infer<typeof EntryErrorResponseSchema>;
