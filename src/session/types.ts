/**
 * Review Session Type Definitions
 */

import type { HumanAction, ReviewedRecord, ReviewState } from '../pipeline/types.js';
import type { LearnedContext, WordRule } from '../feedback/types.js';

/** Where a hotel stands in this session */
export type HotelReviewStatus = 'pending' | 'drafted' | HumanAction;

export interface HotelOverview {
  position: number;
  hotelId: string;
  name: string;
  status: HotelReviewStatus;
}

export interface DecisionOutcome {
  /** Terminal state: stored or discarded */
  state: ReviewState;
  /** Persisted row; null when rejected */
  record: ReviewedRecord | null;
  /** Whether this decision triggered a learned-context recompute */
  learningUpdated: boolean;
}

export interface ReviewStats {
  totalHotels: number;
  reviewed: number;
  accepted: number;
  edited: number;
  rejected: number;
  /** Whole-number percentages of `reviewed`; 0 when nothing is reviewed */
  percentages: { accepted: number; edited: number; rejected: number };
  /** Percentage of hotels reviewed */
  progress: number;
  learning: {
    active: boolean;
    completedReviews: number;
    threshold: number;
    reviewsUntilUpdate: number;
  };
}

export interface LearningSnapshot {
  context: LearnedContext;
  wordRules: WordRule[];
  completedReviews: number;
  threshold: number;
}
