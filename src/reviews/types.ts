/**
 * Reviewed Store Type Definitions
 *
 * - ReviewedRecordSchema: Zod schema for rows read back from storage
 * - ReviewedStore: persistence boundary for accepted/edited reviews
 */

import { z } from 'zod';
import type { ReviewedRecord } from '../pipeline/types.js';

export const ReviewedRecordSchema = z.object({
  hotelId: z.string(),
  hotelName: z.string(),
  draftSummary: z.string(),
  finalSummary: z.string(),
  status: z.enum(['accept', 'edit']),
  reviewTimestamp: z.string(),
  critiqueIssues: z.array(z.string()),
});

/**
 * Keyed by hotel id, one row per completed (accepted/edited) review.
 * Rejected reviews never reach the store.
 */
export interface ReviewedStore {
  get(hotelId: string): Promise<ReviewedRecord | null>;
  /** Insert or overwrite the row for record.hotelId */
  put(record: ReviewedRecord): Promise<void>;
  /** @returns true if a row was removed */
  remove(hotelId: string): Promise<boolean>;
  /** All rows, oldest review first */
  list(): Promise<ReviewedRecord[]>;
  /** Remove every row in a single operation */
  clear(): Promise<void>;
}
