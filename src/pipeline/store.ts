/**
 * Store Stage — Finalizes accepted/edited reviews
 *
 * The single point that stamps completion time. Produces the row handed to
 * the ReviewedStore; actual persistence happens outside the pipeline.
 *
 * Consumers: pipeline.ts, session/review-session.ts
 */

import { ContractViolationError } from './errors.js';
import type { ReviewedRecord, ReviewState } from './types.js';

/**
 * Stamp a decided review as stored.
 *
 * @throws ContractViolationError for rejected or undecided states
 */
export function finalizeReview(state: ReviewState, now: Date = new Date()): ReviewState {
  if (state.stage !== 'drafted' || (state.humanAction !== 'accept' && state.humanAction !== 'edit')) {
    throw new ContractViolationError(
      `Cannot store hotel ${state.hotelId}: action ${state.humanAction ?? 'none'} at stage ${state.stage}`,
    );
  }
  if (state.finalSummary === null) {
    throw new ContractViolationError(`Cannot store hotel ${state.hotelId}: no final summary`);
  }

  return { ...state, stage: 'stored', reviewTimestamp: now.toISOString() };
}

/**
 * Build the persisted row for a stored review.
 *
 * @throws ContractViolationError if the state has not been through the store stage
 */
export function toReviewedRecord(state: ReviewState): ReviewedRecord {
  if (
    state.stage !== 'stored' ||
    (state.humanAction !== 'accept' && state.humanAction !== 'edit') ||
    state.draftSummary === null ||
    state.finalSummary === null ||
    state.reviewTimestamp === null
  ) {
    throw new ContractViolationError(`Hotel ${state.hotelId} has not been stored`);
  }

  return {
    hotelId: state.hotelId,
    hotelName: state.hotel.name,
    draftSummary: state.draftSummary,
    finalSummary: state.finalSummary,
    status: state.humanAction,
    reviewTimestamp: state.reviewTimestamp,
    critiqueIssues: state.critique ? [...state.critique.issues] : [],
  };
}
