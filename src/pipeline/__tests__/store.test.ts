/**
 * Tests for the Store stage
 *
 * Tests cover:
 * - finalizeReview stamps the timestamp and moves to `stored`
 * - rejected / undecided states are contract violations
 * - toReviewedRecord builds the persisted row
 */

import { describe, it, expect } from 'vitest';
import { finalizeReview, toReviewedRecord } from '../store.js';
import { ContractViolationError } from '../errors.js';
import { bayInn } from './fixtures/index.js';
import type { ReviewState } from '../types.js';

const NOW = new Date('2026-03-14T09:30:00.000Z');

function decidedState(overrides: Partial<ReviewState> = {}): ReviewState {
  return {
    hotelId: '42',
    stage: 'drafted',
    hotel: bayInn,
    draftSummary: 'Draft text',
    critique: {
      wordCount: 2,
      wordCountValid: false,
      locationMentioned: false,
      starRatingMentioned: false,
      amenitiesCount: 0,
      noSuperlatives: true,
      superlativesFound: [],
      issues: ['Word count 2 (expected 60-100)'],
    },
    finalSummary: 'Final text',
    humanAction: 'edit',
    reviewTimestamp: null,
    styleGuide: '',
    fewShotExamples: [],
    errorPatterns: [],
    ...overrides,
  };
}

describe('finalizeReview', () => {
  it('stamps the review time and marks the state stored', () => {
    const stored = finalizeReview(decidedState(), NOW);

    expect(stored.stage).toBe('stored');
    expect(stored.reviewTimestamp).toBe('2026-03-14T09:30:00.000Z');
  });

  it('refuses a rejected state', () => {
    const rejected = decidedState({ humanAction: 'reject', finalSummary: null, stage: 'discarded' });

    expect(() => finalizeReview(rejected, NOW)).toThrow(ContractViolationError);
  });

  it('refuses an undecided state', () => {
    expect(() => finalizeReview(decidedState({ humanAction: null }), NOW)).toThrow(
      'Cannot store hotel 42: action none at stage drafted',
    );
  });
});

describe('toReviewedRecord', () => {
  it('builds the persisted row', () => {
    const record = toReviewedRecord(finalizeReview(decidedState(), NOW));

    expect(record).toEqual({
      hotelId: '42',
      hotelName: 'Bay Inn',
      draftSummary: 'Draft text',
      finalSummary: 'Final text',
      status: 'edit',
      reviewTimestamp: '2026-03-14T09:30:00.000Z',
      critiqueIssues: ['Word count 2 (expected 60-100)'],
    });
  });

  it('refuses a state that was never stored', () => {
    expect(() => toReviewedRecord(decidedState())).toThrow('Hotel 42 has not been stored');
  });
});
