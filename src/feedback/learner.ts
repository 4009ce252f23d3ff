/**
 * Feedback Learner — Turns review outcomes into drafting guidance
 *
 * Holds the append-only log of completed decisions and the current
 * LearnedContext. The context is recomputed wholesale from the entire log
 * whenever the completed-review count lands on a multiple of the threshold,
 * so later recomputes always reflect all history, not just the newest batch.
 *
 * One learner belongs to one review session; nothing here is module-global.
 *
 * Consumers: session/review-session.ts
 */

import { ContractViolationError } from '../pipeline/errors.js';
import { isHumanAction } from '../pipeline/types.js';
import { feedbackConfig } from './config.js';
import { extractStylePatterns } from './style-guide.js';
import { enrichStyleGuide } from './pattern-analyzer.js';
import { deriveWordRules } from './word-rules.js';
import type { GenerateOptions, TextGenerator } from '../generation/types.js';
import type { EditPair, FeedbackRecord, LearnedContext, WordRule } from './types.js';

export function emptyLearnedContext(): LearnedContext {
  return {
    styleGuide: '',
    fewShotExamples: [],
    errorPatterns: [],
    updatedAt: null,
    basedOnReviews: 0,
  };
}

export class FeedbackLearner {
  private records: FeedbackRecord[] = [];
  private context: LearnedContext = emptyLearnedContext();
  /** Bumped on every recompute and reset; async work started under an older epoch is discarded */
  private epoch = 0;
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /** Number of completed decisions recorded so far */
  get completedCount(): number {
    return this.records.length;
  }

  /**
   * Append one completed decision to the log.
   *
   * @throws ContractViolationError if action is not accept, edit or reject
   */
  recordOutcome(
    hotelId: string,
    action: string,
    originalDraft: string,
    finalText: string | null,
  ): FeedbackRecord {
    if (!isHumanAction(action)) {
      throw new ContractViolationError(`Unknown review action "${action}" for hotel ${hotelId}`);
    }

    const record: FeedbackRecord = {
      hotelId,
      action,
      originalDraft,
      finalText: action === 'reject' ? null : finalText,
      recordedAt: this.now().toISOString(),
    };
    this.records.push(record);
    return record;
  }

  /**
   * Recompute the learned context when the count is a positive multiple of
   * the threshold.
   *
   * @returns true if the context was recomputed
   */
  recomputeIfDue(totalCompletedCount: number, threshold: number): boolean {
    if (!Number.isInteger(threshold) || threshold <= 0) {
      throw new ContractViolationError(`Learning threshold must be a positive integer, got ${threshold}`);
    }
    if (totalCompletedCount <= 0 || totalCompletedCount % threshold !== 0) {
      return false;
    }

    const accepted = this.acceptedTexts();
    const editPairs = this.editPairs();
    const hasRejections = this.records.some((r) => r.action === 'reject');

    this.epoch += 1;
    this.context = {
      styleGuide: extractStylePatterns(accepted, editPairs),
      fewShotExamples: accepted
        .slice(-feedbackConfig.fewShotCount)
        .map((summary) => ({ label: feedbackConfig.fewShotLabel, summary })),
      errorPatterns: hasRejections ? [...feedbackConfig.rejectionNotes] : [],
      updatedAt: this.now().toISOString(),
      basedOnReviews: totalCompletedCount,
    };

    console.log('[feedback] Learned context recomputed', {
      basedOnReviews: totalCompletedCount,
      accepted: accepted.length,
      edited: editPairs.length,
      examples: this.context.fewShotExamples.length,
    });
    return true;
  }

  /**
   * Narrative variant: append model-written improvements to the current
   * style guide. Never throws; on any failure the guide is left as is.
   * If the context was recomputed or reset while the model calls were in
   * flight, the result is dropped.
   *
   * @returns The style guide now in effect
   */
  async enrichStyleGuide(generator: TextGenerator, options?: GenerateOptions): Promise<string> {
    const startedAt = this.epoch;
    const base = this.context.styleGuide;
    const enriched = await enrichStyleGuide(generator, base, this.editPairs(), options);

    if (this.epoch !== startedAt) {
      console.warn('[feedback] Learned context changed during narrative enrichment, discarding result');
      return this.context.styleGuide;
    }

    this.context = { ...this.context, styleGuide: enriched };
    return enriched;
  }

  /** Word-level REMOVE / PRIORITIZE signals from all edits */
  deriveWordRules(): WordRule[] {
    return deriveWordRules(this.editPairs());
  }

  getContext(): LearnedContext {
    return {
      ...this.context,
      fewShotExamples: this.context.fewShotExamples.map((ex) => ({ ...ex })),
      errorPatterns: [...this.context.errorPatterns],
    };
  }

  getRecords(): readonly FeedbackRecord[] {
    return [...this.records];
  }

  /** Drop the whole log and the learned context. */
  reset(): void {
    this.epoch += 1;
    this.records = [];
    this.context = emptyLearnedContext();
  }

  // -------------------------------------------------------------------------
  // Aggregation helpers
  // -------------------------------------------------------------------------

  private acceptedTexts(): string[] {
    const texts: string[] = [];
    for (const record of this.records) {
      if (record.action === 'accept' && record.finalText !== null) texts.push(record.finalText);
    }
    return texts;
  }

  private editPairs(): EditPair[] {
    const pairs: EditPair[] = [];
    for (const record of this.records) {
      if (record.action === 'edit' && record.finalText !== null) {
        pairs.push({ draft: record.originalDraft, final: record.finalText });
      }
    }
    return pairs;
  }
}
