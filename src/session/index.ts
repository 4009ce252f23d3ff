/**
 * Session Module — Barrel Export
 */

export { ReviewSession } from './review-session.js';
export type { ReviewSessionOptions } from './review-session.js';
export type {
  HotelReviewStatus,
  HotelOverview,
  DecisionOutcome,
  ReviewStats,
  LearningSnapshot,
} from './types.js';
