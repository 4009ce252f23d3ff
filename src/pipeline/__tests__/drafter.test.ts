/**
 * Tests for the Drafter
 *
 * Tests cover:
 * - Prompt carries fixed style rules and the hotel data
 * - Learned sections appear only when non-empty; max 3 examples
 * - Exactly one generation call, trimmed text returned
 * - Generation failures and empty responses become GenerationError
 */

import { describe, it, expect } from 'vitest';
import { buildDraftPrompt, generateDraft } from '../drafter.js';
import { GenerationError } from '../errors.js';
import { bayInn, EMPTY_CONTEXT, stubGenerator, failingGenerator } from './fixtures/index.js';

describe('buildDraftPrompt', () => {
  it('includes style rules and the hotel data', () => {
    const prompt = buildDraftPrompt(bayInn, EMPTY_CONTEXT);

    expect(prompt.system).toContain('Length: 60-100 words, single paragraph');
    expect(prompt.system).toContain('NO invented facts');
    expect(prompt.user).toContain('Name: Bay Inn');
    expect(prompt.user).toContain('Location: Austin, USA');
    expect(prompt.user).toContain('Star Rating: 4');
    expect(prompt.user).toContain(
      'Scores: Cleanliness 8, Comfort 7.5, Facilities 7, Location 9, Staff 9, Value for money 8',
    );
  });

  it('omits learned sections when the context is empty', () => {
    const prompt = buildDraftPrompt(bayInn, EMPTY_CONTEXT);

    expect(prompt.system).not.toContain('LEARNED STYLE PREFERENCES');
    expect(prompt.system).not.toContain('EXAMPLES OF GOOD SUMMARIES');
    expect(prompt.system).not.toContain('KNOWN ISSUES TO AVOID');
  });

  it('adds the style guide, examples and known issues', () => {
    const prompt = buildDraftPrompt(bayInn, {
      styleGuide: '- Preferred length: ~80 words',
      fewShotExamples: [{ label: 'Accepted summary', summary: 'Example one.' }],
      errorPatterns: ['Focus on concrete data points'],
    });

    expect(prompt.system).toContain('LEARNED STYLE PREFERENCES:\n- Preferred length: ~80 words');
    expect(prompt.system).toContain('EXAMPLES OF GOOD SUMMARIES:\n- Example one.');
    expect(prompt.system).toContain('KNOWN ISSUES TO AVOID:\n- Focus on concrete data points');
  });

  it('uses only the first three examples', () => {
    const prompt = buildDraftPrompt(bayInn, {
      ...EMPTY_CONTEXT,
      fewShotExamples: ['one', 'two', 'three', 'four'].map((s) => ({ label: 'Accepted summary', summary: s })),
    });

    expect(prompt.system).toContain('- one\n- two\n- three');
    expect(prompt.system).not.toContain('- four');
  });
});

describe('generateDraft', () => {
  it('makes one generation call and trims the response', async () => {
    const generator = stubGenerator('  A factual summary.\n');

    const draft = await generateDraft(generator, '42', bayInn, EMPTY_CONTEXT);

    expect(draft).toBe('A factual summary.');
    expect(generator.generate).toHaveBeenCalledOnce();
    expect(generator.generate).toHaveBeenCalledWith(buildDraftPrompt(bayInn, EMPTY_CONTEXT), undefined);
  });

  it('forwards generation options', async () => {
    const generator = stubGenerator('text');

    await generateDraft(generator, '42', bayInn, EMPTY_CONTEXT, { temperature: 0.3 });

    expect(generator.generate).toHaveBeenCalledWith(expect.any(Object), { temperature: 0.3 });
  });

  it('wraps generation failures in GenerationError', async () => {
    const generator = failingGenerator('upstream timeout');

    const drafting = generateDraft(generator, '42', bayInn, EMPTY_CONTEXT);

    await expect(drafting).rejects.toBeInstanceOf(GenerationError);
    await expect(drafting).rejects.toMatchObject({
      name: 'GenerationError',
      message: 'Draft generation failed for hotel 42: upstream timeout',
      hotelId: '42',
      cause: expect.any(Error),
    });
  });

  it('rejects whitespace-only responses', async () => {
    const generator = stubGenerator('   ');

    await expect(generateDraft(generator, '42', bayInn, EMPTY_CONTEXT)).rejects.toThrow(
      'Draft generation returned empty text for hotel 42',
    );
  });
});
