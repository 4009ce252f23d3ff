/**
 * Tests for the Summary Pipeline orchestrator
 *
 * Tests cover:
 * - ingest → draft → critique leaves the state at the review gate
 * - conditioning context flows into the prompt
 * - completeReview: accept/edit stored with timestamp, reject discarded
 * - stage ordering enforced (contract violations)
 * - generation failures propagate without a fallback draft
 * - End-to-end: Bay Inn drafted, edited, stored with status "edit"
 */

import { describe, it, expect } from 'vitest';
import { SummaryPipeline } from '../pipeline.js';
import { ContractViolationError, GenerationError } from '../errors.js';
import {
  bayInnRecord,
  EMPTY_CONTEXT,
  GOOD_DRAFT,
  stubGenerator,
  failingGenerator,
} from './fixtures/index.js';

const NOW = new Date('2026-05-01T12:00:00.000Z');

function createPipeline(generator = stubGenerator(GOOD_DRAFT)) {
  return { generator, pipeline: new SummaryPipeline({ generator, now: () => NOW }) };
}

describe('SummaryPipeline', () => {
  describe('ingest', () => {
    it('creates a fresh state from the raw record and context', () => {
      const { pipeline } = createPipeline();
      const context = {
        styleGuide: '- Prefer concise, direct language',
        fewShotExamples: [{ label: 'Accepted summary', summary: 'Earlier summary.' }],
        errorPatterns: ['Focus on concrete data points'],
      };

      const state = pipeline.ingest('42', bayInnRecord, context);

      expect(state.stage).toBe('ingested');
      expect(state.hotel.location).toBe('Austin, USA');
      expect(state.draftSummary).toBeNull();
      expect(state.critique).toBeNull();
      expect(state.finalSummary).toBeNull();
      expect(state.humanAction).toBeNull();
      expect(state.reviewTimestamp).toBeNull();
      expect(state.styleGuide).toBe('- Prefer concise, direct language');
      expect(state.fewShotExamples).toEqual(context.fewShotExamples);
      expect(state.fewShotExamples).not.toBe(context.fewShotExamples);
      expect(state.errorPatterns).toEqual(['Focus on concrete data points']);
    });
  });

  describe('runUntilReview', () => {
    it('stops at the review gate with draft and critique attached', async () => {
      const { pipeline, generator } = createPipeline();

      const state = await pipeline.runUntilReview('42', bayInnRecord, EMPTY_CONTEXT);

      expect(state.stage).toBe('drafted');
      expect(state.draftSummary).toBe(GOOD_DRAFT);
      expect(state.critique?.issues).toEqual([]);
      expect(state.humanAction).toBeNull();
      expect(generator.generate).toHaveBeenCalledOnce();
    });

    it('feeds the learned style guide into the draft prompt', async () => {
      const { pipeline, generator } = createPipeline();

      await pipeline.runUntilReview('42', bayInnRecord, { ...EMPTY_CONTEXT, styleGuide: '- Preferred length: ~80 words' });

      const [prompt] = generator.generate.mock.calls[0];
      expect(prompt.system).toContain('LEARNED STYLE PREFERENCES:\n- Preferred length: ~80 words');
    });

    it('propagates generation failures and produces no draft', async () => {
      const { pipeline } = createPipeline(failingGenerator('model unavailable'));

      await expect(pipeline.runUntilReview('42', bayInnRecord, EMPTY_CONTEXT)).rejects.toBeInstanceOf(GenerationError);
    });

    it('refuses to draft a state twice', async () => {
      const { pipeline } = createPipeline();
      const drafted = await pipeline.runUntilReview('42', bayInnRecord, EMPTY_CONTEXT);

      await expect(pipeline.draft(drafted)).rejects.toBeInstanceOf(ContractViolationError);
    });
  });

  describe('completeReview', () => {
    it('accept stores the draft as final with a timestamp', async () => {
      const { pipeline } = createPipeline();
      const drafted = await pipeline.runUntilReview('42', bayInnRecord, EMPTY_CONTEXT);

      const { state, record } = pipeline.completeReview(drafted, { action: 'accept' });

      expect(state.stage).toBe('stored');
      expect(state.finalSummary).toBe(GOOD_DRAFT);
      expect(state.reviewTimestamp).toBe('2026-05-01T12:00:00.000Z');
      expect(record?.status).toBe('accept');
    });

    it('reject discards without a record or timestamp', async () => {
      const { pipeline } = createPipeline();
      const drafted = await pipeline.runUntilReview('42', bayInnRecord, EMPTY_CONTEXT);

      const { state, record } = pipeline.completeReview(drafted, { action: 'reject' });

      expect(state.stage).toBe('discarded');
      expect(state.finalSummary).toBeNull();
      expect(state.reviewTimestamp).toBeNull();
      expect(record).toBeNull();
    });

    it('refuses a decision before drafting', () => {
      const { pipeline } = createPipeline();
      const ingested = pipeline.ingest('42', bayInnRecord, EMPTY_CONTEXT);

      expect(() => pipeline.completeReview(ingested, { action: 'accept' })).toThrow(ContractViolationError);
    });
  });

  it('end-to-end: Bay Inn is drafted, edited and stored as "edit"', async () => {
    const { pipeline } = createPipeline();

    const drafted = await pipeline.runUntilReview('42', bayInnRecord, EMPTY_CONTEXT);
    expect(drafted.draftSummary).toContain('Austin');
    expect(drafted.draftSummary).toContain('4');
    expect(drafted.critique?.issues).toEqual([]);

    const replacement = 'Bay Inn is a 4-star hotel in Austin, USA, scoring 8 for cleanliness and 9 for staff.';
    const { state, record } = pipeline.completeReview(drafted, { action: 'edit', text: replacement });

    expect(state.reviewTimestamp).toBe('2026-05-01T12:00:00.000Z');
    expect(record).toEqual({
      hotelId: '42',
      hotelName: 'Bay Inn',
      draftSummary: GOOD_DRAFT,
      finalSummary: replacement,
      status: 'edit',
      reviewTimestamp: '2026-05-01T12:00:00.000Z',
      critiqueIssues: [],
    });
  });
});
