/**
 * Review Gate — Applies a human decision to a drafted review
 *
 * The pipeline halts at stage `drafted` until the control surface delivers a
 * decision. There is no auto-decision and no timeout. Transitions:
 *
 *   accept → finalSummary = draftSummary (still `drafted`, ready for store)
 *   edit   → finalSummary = provided text (still `drafted`, ready for store)
 *   reject → finalSummary = null, stage `discarded` (never persisted)
 *
 * Returns a new state; the input is not mutated, so the same
 * (state, decision) pair always produces an equal result.
 *
 * Consumers: pipeline.ts
 */

import { ContractViolationError } from './errors.js';
import type { ReviewDecision, ReviewState } from './types.js';

export function applyDecision(state: ReviewState, decision: ReviewDecision): ReviewState {
  if (state.stage !== 'drafted' || state.humanAction !== null) {
    throw new ContractViolationError(
      `Hotel ${state.hotelId} is not awaiting review (stage: ${state.stage}, action: ${state.humanAction ?? 'none'})`,
    );
  }
  if (state.draftSummary === null) {
    throw new ContractViolationError(`Hotel ${state.hotelId} has no draft to review`);
  }

  switch (decision.action) {
    case 'accept':
      return { ...state, humanAction: 'accept', finalSummary: state.draftSummary };

    case 'edit': {
      const text = decision.text;
      if (text === undefined || text.trim() === '') {
        throw new ContractViolationError(`Edit decision for hotel ${state.hotelId} requires replacement text`);
      }
      return { ...state, humanAction: 'edit', finalSummary: text };
    }

    case 'reject':
      return { ...state, humanAction: 'reject', finalSummary: null, stage: 'discarded' };
  }
}
