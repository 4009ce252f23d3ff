/**
 * Tests for the Review Gate
 *
 * Tests cover:
 * - accept / edit / reject transitions
 * - edit without text is a contract violation (no fallback to the draft)
 * - only drafted, undecided states accept a decision
 * - determinism and no mutation of the input
 */

import { describe, it, expect } from 'vitest';
import { applyDecision } from '../review-gate.js';
import { ContractViolationError } from '../errors.js';
import { bayInn } from './fixtures/index.js';
import type { ReviewState } from '../types.js';

function draftedState(draftSummary = 'X'): ReviewState {
  return {
    hotelId: '42',
    stage: 'drafted',
    hotel: bayInn,
    draftSummary,
    critique: null,
    finalSummary: null,
    humanAction: null,
    reviewTimestamp: null,
    styleGuide: '',
    fewShotExamples: [],
    errorPatterns: [],
  };
}

describe('applyDecision', () => {
  it('accept copies the draft into finalSummary', () => {
    const result = applyDecision(draftedState('X'), { action: 'accept' });

    expect(result.humanAction).toBe('accept');
    expect(result.finalSummary).toBe('X');
    expect(result.stage).toBe('drafted');
  });

  it('edit uses the provided text', () => {
    const result = applyDecision(draftedState('X'), { action: 'edit', text: 'Y' });

    expect(result.humanAction).toBe('edit');
    expect(result.finalSummary).toBe('Y');
  });

  it('edit keeps the reviewer text exactly as provided', () => {
    const result = applyDecision(draftedState('X'), { action: 'edit', text: '  Y\n' });

    expect(result.finalSummary).toBe('  Y\n');
  });

  it('reject clears finalSummary and discards', () => {
    const result = applyDecision(draftedState('X'), { action: 'reject' });

    expect(result.humanAction).toBe('reject');
    expect(result.finalSummary).toBeNull();
    expect(result.stage).toBe('discarded');
  });

  it.each([undefined, '', '   '])('edit with text %j is a contract violation', (text) => {
    expect(() => applyDecision(draftedState('X'), { action: 'edit', text })).toThrow(ContractViolationError);
  });

  it('refuses a state that is not at the gate', () => {
    const ingested: ReviewState = { ...draftedState(), stage: 'ingested', draftSummary: null };

    expect(() => applyDecision(ingested, { action: 'accept' })).toThrow(
      'Hotel 42 is not awaiting review (stage: ingested, action: none)',
    );
  });

  it('refuses a second decision on the same state', () => {
    const accepted = applyDecision(draftedState(), { action: 'accept' });

    expect(() => applyDecision(accepted, { action: 'reject' })).toThrow(ContractViolationError);
  });

  it('is deterministic and leaves the input untouched', () => {
    const state = draftedState('X');

    const first = applyDecision(state, { action: 'edit', text: 'Y' });
    const second = applyDecision(state, { action: 'edit', text: 'Y' });

    expect(first).toEqual(second);
    expect(state.humanAction).toBeNull();
    expect(state.finalSummary).toBeNull();
  });
});
