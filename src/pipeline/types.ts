/**
 * Review Pipeline Type Definitions
 *
 * - ReviewStage: explicit stages of one hotel's review
 * - HumanAction / ReviewDecision: what the reviewer sends through the gate
 * - Critique: rule-based advisory annotations on a draft
 * - FewShotExample / ConditioningContext: learned inputs carried into drafting
 * - ReviewState: the unit of work threaded through every stage
 * - ReviewedRecord: the row persisted for accepted/edited reviews
 */

import { z } from 'zod';
import type { NormalizedHotel } from '../hotels/types.js';

// ---------------------------------------------------------------------------
// Stages + Actions
// ---------------------------------------------------------------------------

/**
 * ingested → drafted → stored | discarded
 *
 * `drafted` is the review gate: draft + critique attached, waiting on a
 * human decision. stored/discarded are terminal.
 */
export type ReviewStage = 'ingested' | 'drafted' | 'stored' | 'discarded';

export const HUMAN_ACTIONS = ['accept', 'edit', 'reject'] as const;

export type HumanAction = typeof HUMAN_ACTIONS[number];

/** Actions that end in a persisted record */
export type StoredAction = Exclude<HumanAction, 'reject'>;

export function isHumanAction(value: unknown): value is HumanAction {
  return HUMAN_ACTIONS.some((action) => action === value);
}

/** Decision body as received from the control surface */
export const ReviewDecisionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('accept') }),
  z.object({ action: z.literal('edit'), text: z.string().optional() }),
  z.object({ action: z.literal('reject') }),
]);

export type ReviewDecision = z.infer<typeof ReviewDecisionSchema>;

// ---------------------------------------------------------------------------
// Critique
// ---------------------------------------------------------------------------

export interface Critique {
  wordCount: number;
  /** 60-100 words inclusive */
  wordCountValid: boolean;
  locationMentioned: boolean;
  starRatingMentioned: boolean;
  /** How many score keywords the draft mentions (expected 2-4) */
  amenitiesCount: number;
  noSuperlatives: boolean;
  superlativesFound: string[];
  /** Non-empty iff at least one check failed */
  issues: string[];
}

// ---------------------------------------------------------------------------
// Conditioning Context
// ---------------------------------------------------------------------------

export interface FewShotExample {
  label: string;
  summary: string;
}

/** Learned inputs the caller passes into a fresh review */
export interface ConditioningContext {
  styleGuide: string;
  fewShotExamples: FewShotExample[];
  errorPatterns: string[];
}

// ---------------------------------------------------------------------------
// Review State
// ---------------------------------------------------------------------------

export interface ReviewState {
  hotelId: string;
  stage: ReviewStage;
  hotel: NormalizedHotel;
  draftSummary: string | null;
  critique: Critique | null;
  finalSummary: string | null;
  humanAction: HumanAction | null;
  /** ISO timestamp, set only by the store stage */
  reviewTimestamp: string | null;
  styleGuide: string;
  fewShotExamples: FewShotExample[];
  errorPatterns: string[];
}

// ---------------------------------------------------------------------------
// Persisted Row
// ---------------------------------------------------------------------------

export interface ReviewedRecord {
  hotelId: string;
  hotelName: string;
  draftSummary: string;
  finalSummary: string;
  status: StoredAction;
  reviewTimestamp: string;
  critiqueIssues: string[];
}
