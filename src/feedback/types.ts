/**
 * Feedback Loop Type Definitions
 *
 * Types shared across the feedback module:
 * - FeedbackRecord: one completed human decision (append-only log entry)
 * - EditPair: draft vs. final text for an edited review
 * - LearnedContext: style guide + examples + error notes fed back into drafting
 * - WordRule: word-level signal derived from edits
 */

import type { FewShotExample, HumanAction } from '../pipeline/types.js';

// ---------------------------------------------------------------------------
// Feedback Record (append-only)
// ---------------------------------------------------------------------------

export interface FeedbackRecord {
  hotelId: string;
  action: HumanAction;
  /** The generated draft the reviewer saw */
  originalDraft: string;
  /** The text that was kept; null for rejections */
  finalText: string | null;
  /** ISO timestamp of when the outcome was recorded */
  recordedAt: string;
}

export interface EditPair {
  draft: string;
  final: string;
}

// ---------------------------------------------------------------------------
// Learned Context (recomputed wholesale)
// ---------------------------------------------------------------------------

export interface LearnedContext {
  /** Free-text guidance; empty until accepted or edited summaries exist */
  styleGuide: string;
  /** Most recent accepted summaries, oldest first (max 3) */
  fewShotExamples: FewShotExample[];
  /** Advisory notes derived from rejections; empty when there are none */
  errorPatterns: string[];
  /** ISO timestamp of the last recompute, null if never computed */
  updatedAt: string | null;
  /** Completed-review count at the last recompute */
  basedOnReviews: number;
}

// ---------------------------------------------------------------------------
// Word Rules
// ---------------------------------------------------------------------------

export type WordRuleKind = 'REMOVE' | 'PRIORITIZE';

export interface WordRule {
  word: string;
  rule: WordRuleKind;
}
