/**
 * Review Session — Caller-owned context for a run of hotel reviews
 *
 * Replaces ambient globals with one explicit object that owns:
 * - the ordered hotel list (record source)
 * - drafts waiting at the review gate (at most one per hotel)
 * - hotels rejected in this session
 * - the feedback learner and its learned context
 * and talks to the reviewed store for everything persisted.
 *
 * Flow per hotel:
 *   startReview → (human decides) → submitDecision → store / discard
 *                                                 → learner records outcome
 *                                                 → recompute on cadence
 *
 * Consumers: server/server.ts, index.ts
 */

import { findHotel } from '../hotels/source.js';
import { normalizeHotel } from '../hotels/normalize.js';
import { ContractViolationError, HotelNotFoundError } from '../pipeline/errors.js';
import { FeedbackLearner } from '../feedback/learner.js';
import type { SummaryPipeline } from '../pipeline/pipeline.js';
import type { ReviewDecision, ReviewedRecord, ReviewState } from '../pipeline/types.js';
import type { HotelSourceItem } from '../hotels/types.js';
import type { ReviewedStore } from '../reviews/types.js';
import type { GenerateOptions, TextGenerator } from '../generation/types.js';
import type {
  DecisionOutcome,
  HotelOverview,
  HotelReviewStatus,
  LearningSnapshot,
  ReviewStats,
} from './types.js';

export interface ReviewSessionOptions {
  hotels: readonly HotelSourceItem[];
  pipeline: SummaryPipeline;
  store: ReviewedStore;
  /** Recompute learned context every N completed reviews */
  learningThreshold: number;
  learner?: FeedbackLearner;
  /** When set, each recompute is followed by narrative style-guide enrichment */
  narrativeGenerator?: TextGenerator;
  narrativeOptions?: GenerateOptions;
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 100);
}

export class ReviewSession {
  readonly learner: FeedbackLearner;

  private readonly hotels: readonly HotelSourceItem[];
  private readonly pipeline: SummaryPipeline;
  private readonly store: ReviewedStore;
  private readonly threshold: number;
  private readonly narrativeGenerator: TextGenerator | undefined;
  private readonly narrativeOptions: GenerateOptions | undefined;

  private readonly pending = new Map<string, ReviewState>();
  private readonly rejected = new Set<string>();
  /** Bumped by reset(); work that straddles a reset must not write into the new epoch */
  private epoch = 0;

  constructor(options: ReviewSessionOptions) {
    if (!Number.isInteger(options.learningThreshold) || options.learningThreshold <= 0) {
      throw new ContractViolationError(
        `Learning threshold must be a positive integer, got ${options.learningThreshold}`,
      );
    }
    this.hotels = options.hotels;
    this.pipeline = options.pipeline;
    this.store = options.store;
    this.threshold = options.learningThreshold;
    this.learner = options.learner ?? new FeedbackLearner();
    this.narrativeGenerator = options.narrativeGenerator;
    this.narrativeOptions = options.narrativeOptions;
  }

  // -------------------------------------------------------------------------
  // Review flow
  // -------------------------------------------------------------------------

  /**
   * Draft a hotel and park it at the review gate.
   *
   * Any previously stored review for the hotel is removed first, and any
   * earlier pending draft is replaced.
   *
   * @throws HotelNotFoundError for unknown ids
   * @throws GenerationError if drafting fails
   * @throws ContractViolationError if the session is reset while drafting
   */
  async startReview(hotelId: string): Promise<ReviewState> {
    const item = this.requireHotel(hotelId);
    const epoch = this.epoch;

    if (await this.store.remove(hotelId)) {
      console.log('[session] Removed prior review before re-review', { hotelId });
    }
    this.rejected.delete(hotelId);
    this.pending.delete(hotelId);

    const { styleGuide, fewShotExamples, errorPatterns } = this.learner.getContext();
    const state = await this.pipeline.runUntilReview(hotelId, item.record, {
      styleGuide,
      fewShotExamples,
      errorPatterns,
    });

    if (this.epoch !== epoch) {
      throw new ContractViolationError(`Review session was reset while drafting hotel ${hotelId}`);
    }

    this.pending.set(hotelId, state);
    return state;
  }

  /**
   * Apply the reviewer's decision to the pending draft.
   *
   * The draft is taken off the gate before any I/O, so a second decision
   * for the same hotel is refused while the first is being stored. A store
   * failure puts the draft back for another attempt.
   *
   * @throws ContractViolationError if no draft is pending, the decision is
   *   invalid, or the session is reset while the review is being stored
   */
  async submitDecision(hotelId: string, decision: ReviewDecision): Promise<DecisionOutcome> {
    this.requireHotel(hotelId);
    const pendingState = this.pending.get(hotelId);
    if (!pendingState) {
      throw new ContractViolationError(`No draft awaiting review for hotel ${hotelId}`);
    }

    const { state, record } = this.pipeline.completeReview(pendingState, decision);
    this.pending.delete(hotelId);
    const epoch = this.epoch;

    if (record) {
      try {
        await this.store.put(record);
      } catch (err) {
        if (this.epoch === epoch && !this.pending.has(hotelId)) {
          this.pending.set(hotelId, pendingState);
        }
        throw err;
      }

      if (this.epoch !== epoch) {
        await this.discardStaleRecord(record);
        throw new ContractViolationError(`Review session was reset while storing hotel ${hotelId}`);
      }
    } else {
      this.rejected.add(hotelId);
    }

    this.learner.recordOutcome(hotelId, decision.action, pendingState.draftSummary ?? '', state.finalSummary);
    const learningUpdated = this.learner.recomputeIfDue(this.learner.completedCount, this.threshold);

    if (learningUpdated && this.narrativeGenerator) {
      await this.learner.enrichStyleGuide(this.narrativeGenerator, this.narrativeOptions);
    }

    return { state, record, learningUpdated };
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  getPending(hotelId: string): ReviewState | undefined {
    this.requireHotel(hotelId);
    return this.pending.get(hotelId);
  }

  async getStored(hotelId: string): Promise<ReviewedRecord | null> {
    this.requireHotel(hotelId);
    return this.store.get(hotelId);
  }

  async listReviews(): Promise<ReviewedRecord[]> {
    return this.store.list();
  }

  async listHotels(): Promise<HotelOverview[]> {
    const stored = new Map((await this.store.list()).map((r) => [r.hotelId, r.status]));

    return this.hotels.map((item) => ({
      position: item.position,
      hotelId: item.hotelId,
      name: normalizeHotel(item.record).name,
      status: this.statusOf(item.hotelId, stored.get(item.hotelId)),
    }));
  }

  async stats(): Promise<ReviewStats> {
    const rows = await this.store.list();
    const accepted = rows.filter((r) => r.status === 'accept').length;
    const edited = rows.filter((r) => r.status === 'edit').length;
    const rejected = this.rejected.size;
    const reviewed = accepted + edited + rejected;
    const completed = this.learner.completedCount;

    return {
      totalHotels: this.hotels.length,
      reviewed,
      accepted,
      edited,
      rejected,
      percentages: {
        accepted: percent(accepted, reviewed),
        edited: percent(edited, reviewed),
        rejected: percent(rejected, reviewed),
      },
      progress: percent(reviewed, this.hotels.length),
      learning: {
        active: this.learner.getContext().updatedAt !== null,
        completedReviews: completed,
        threshold: this.threshold,
        reviewsUntilUpdate: this.threshold - (completed % this.threshold),
      },
    };
  }

  learning(): LearningSnapshot {
    return {
      context: this.learner.getContext(),
      wordRules: this.learner.deriveWordRules(),
      completedReviews: this.learner.completedCount,
      threshold: this.threshold,
    };
  }

  // -------------------------------------------------------------------------
  // Reset
  // -------------------------------------------------------------------------

  /**
   * Destroy all review state: persisted rows, learned context, feedback log,
   * pending drafts and rejections.
   *
   * The store is cleared first; if that fails nothing else is touched and
   * the error propagates, so the session is never half reset.
   */
  async reset(): Promise<void> {
    await this.store.clear();
    this.epoch += 1;
    this.learner.reset();
    this.pending.clear();
    this.rejected.clear();
    console.log('[session] Review session reset');
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private requireHotel(hotelId: string): HotelSourceItem {
    const item = findHotel(this.hotels, hotelId);
    if (!item) throw new HotelNotFoundError(hotelId);
    return item;
  }

  /** Remove a row written after a reset, unless a newer review replaced it. */
  private async discardStaleRecord(record: ReviewedRecord): Promise<void> {
    const current = await this.store.get(record.hotelId);
    if (current && current.reviewTimestamp === record.reviewTimestamp && current.draftSummary === record.draftSummary) {
      await this.store.remove(record.hotelId);
      console.warn('[session] Discarded review stored across a reset', { hotelId: record.hotelId });
    }
  }

  private statusOf(hotelId: string, storedStatus: HotelReviewStatus | undefined): HotelReviewStatus {
    if (this.pending.has(hotelId)) return 'drafted';
    if (storedStatus) return storedStatus;
    if (this.rejected.has(hotelId)) return 'reject';
    return 'pending';
  }
}
