/**
 * Summary Pipeline — Stage orchestrator for one hotel review
 *
 *   1. Ingest: normalize the raw record into a fresh ReviewState
 *   2. Draft: one generation call (GenerationError on failure)
 *   3. Critique: rule battery attached to the state
 *   -- review gate: caller waits for a human decision --
 *   4. Decide: accept / edit / reject
 *   5. Store: timestamp + persisted row (accept/edit only)
 *
 * The pipeline holds no session state. Learned context comes in with each
 * call and persistence is the caller's job, so one instance can serve any
 * number of review sessions.
 *
 * Consumers: session/review-session.ts
 */

import { normalizeHotel } from '../hotels/normalize.js';
import { generateDraft } from './drafter.js';
import { critiqueDraft } from './critic.js';
import { applyDecision } from './review-gate.js';
import { finalizeReview, toReviewedRecord } from './store.js';
import { ContractViolationError } from './errors.js';
import type { GenerateOptions, TextGenerator } from '../generation/types.js';
import type { RawHotelRecord } from '../hotels/types.js';
import type {
  ConditioningContext,
  ReviewDecision,
  ReviewedRecord,
  ReviewState,
} from './types.js';

export interface SummaryPipelineOptions {
  generator: TextGenerator;
  /** Sampling overrides for the draft call */
  draftOptions?: GenerateOptions;
  /** Clock used by the store stage */
  now?: () => Date;
}

export interface ReviewCompletion {
  /** Terminal state: `stored` or `discarded` */
  state: ReviewState;
  /** Row to persist; null for rejections */
  record: ReviewedRecord | null;
}

export class SummaryPipeline {
  private readonly generator: TextGenerator;
  private readonly draftOptions: GenerateOptions | undefined;
  private readonly now: () => Date;

  constructor(options: SummaryPipelineOptions) {
    this.generator = options.generator;
    this.draftOptions = options.draftOptions;
    this.now = options.now ?? (() => new Date());
  }

  /** Stage 1: build a fresh ReviewState from a raw record. */
  ingest(hotelId: string, raw: RawHotelRecord, context: ConditioningContext): ReviewState {
    return {
      hotelId,
      stage: 'ingested',
      hotel: normalizeHotel(raw),
      draftSummary: null,
      critique: null,
      finalSummary: null,
      humanAction: null,
      reviewTimestamp: null,
      styleGuide: context.styleGuide,
      fewShotExamples: [...context.fewShotExamples],
      errorPatterns: [...context.errorPatterns],
    };
  }

  /** Stages 2-3: draft, then critique. Leaves the state at the review gate. */
  async draft(state: ReviewState): Promise<ReviewState> {
    if (state.stage !== 'ingested') {
      throw new ContractViolationError(`Hotel ${state.hotelId} cannot be drafted at stage ${state.stage}`);
    }

    const draftSummary = await generateDraft(
      this.generator,
      state.hotelId,
      state.hotel,
      {
        styleGuide: state.styleGuide,
        fewShotExamples: state.fewShotExamples,
        errorPatterns: state.errorPatterns,
      },
      this.draftOptions,
    );
    const critique = critiqueDraft(draftSummary, state.hotel);

    console.log('[pipeline] Draft ready for review', {
      hotelId: state.hotelId,
      wordCount: critique.wordCount,
      issues: critique.issues.length,
    });

    return { ...state, stage: 'drafted', draftSummary, critique };
  }

  /** Run everything up to the review gate. */
  async runUntilReview(
    hotelId: string,
    raw: RawHotelRecord,
    context: ConditioningContext,
  ): Promise<ReviewState> {
    return this.draft(this.ingest(hotelId, raw, context));
  }

  /**
   * Stages 4-5: apply the reviewer's decision and, unless rejected, store.
   *
   * @throws ContractViolationError if the state is not awaiting review or
   *   an edit arrives without text
   */
  completeReview(state: ReviewState, decision: ReviewDecision): ReviewCompletion {
    const decided = applyDecision(state, decision);

    if (decided.humanAction === 'reject') {
      console.log('[pipeline] Draft rejected, discarding', { hotelId: state.hotelId });
      return { state: decided, record: null };
    }

    const stored = finalizeReview(decided, this.now());
    console.log('[pipeline] Review stored', { hotelId: state.hotelId, action: stored.humanAction });
    return { state: stored, record: toReviewedRecord(stored) };
  }
}
