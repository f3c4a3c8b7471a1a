import { z } from 'zod';

/**
 * Harvest Config Schema
 *
 * Validates the resolved configuration before a run starts.
 */

// ============================================
// Ranges
// ============================================

/**
 * Inclusive integer range [min, max]
 */
export const IntRangeSchema = z
  .tuple([z.number().int().nonnegative(), z.number().int().nonnegative()])
  .refine(([min, max]) => min <= max, { message: 'range minimum must not exceed maximum' });

export type IntRange = z.infer<typeof IntRangeSchema>;

// ============================================
// Output Encoding
// ============================================

export const OutputEncodingSchema = z.enum(['utf8', 'latin1', 'ascii']);
export type OutputEncoding = z.infer<typeof OutputEncodingSchema>;

// ============================================
// Harvest Config
// ============================================

export const HarvestConfigSchema = z.object({
  /** Requests between forced pauses */
  stepRange: IntRangeSchema.refine(([min]) => min >= 1, {
    message: 'step range must start at 1 or more',
  }),

  /** Pause length in seconds */
  delayRange: IntRangeSchema,

  /** Seed for the pacing random source; unseeded when absent */
  seed: z.number().int().optional(),

  /** Re-fetch truncated posts from their detail page */
  expandLongText: z.boolean(),

  /** Characters outside this encoding are dropped from every string field */
  outputEncoding: OutputEncodingSchema,

  /** JSONL destination; stdout when absent */
  outputPath: z.string().min(1).optional(),

  /** Container (profile + listing) endpoint */
  apiUrl: z.string().url(),

  /** Detail page base URL */
  detailUrl: z.string().url(),

  /** Per-request timeout */
  timeoutMs: z.number().int().positive(),

  userAgent: z.string().min(1).optional(),

  verbose: z.boolean(),
});

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
