/**
 * Drafter — Generates a candidate hotel summary
 *
 * Builds a prompt from the normalized hotel plus whatever the feedback
 * learner has produced so far (style guide, few-shot examples, known issues),
 * then makes exactly one generation call.
 *
 * Failure policy: any generation error, or an empty response, surfaces as a
 * GenerationError. There is no fallback draft and no retry at this layer.
 *
 * Consumers: pipeline.ts
 */

import { GenerationError } from './errors.js';
import type { GenerateOptions, GenerationPrompt, TextGenerator } from '../generation/types.js';
import type { NormalizedHotel } from '../hotels/types.js';
import type { ConditioningContext } from './types.js';

/** Maximum few-shot examples included in a prompt */
export const MAX_PROMPT_EXAMPLES = 3;

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

const STYLE_RULES = `You are writing concise, factual hotel summaries based on structured data.

STYLE REQUIREMENTS:
- Length: 60-100 words, single paragraph
- Include: location (city, country), star rating, 2-4 notable scores
- Use concrete, data-grounded statements
- NO vague superlatives or marketing copy (amazing, incredible, stunning, breathtaking, perfect, ultimate)
- NO invented facts: use only the hotel data provided`;

function styleGuideSection(styleGuide: string): string {
  const trimmed = styleGuide.trim();
  return trimmed ? `LEARNED STYLE PREFERENCES:\n${trimmed}` : '';
}

function examplesSection(context: ConditioningContext): string {
  const examples = context.fewShotExamples.slice(0, MAX_PROMPT_EXAMPLES);
  if (examples.length === 0) return '';
  return ['EXAMPLES OF GOOD SUMMARIES:', ...examples.map((ex) => `- ${ex.summary}`)].join('\n');
}

function errorPatternsSection(errorPatterns: string[]): string {
  if (errorPatterns.length === 0) return '';
  return ['KNOWN ISSUES TO AVOID:', ...errorPatterns.map((p) => `- ${p}`)].join('\n');
}

function hotelDataSection(hotel: NormalizedHotel): string {
  const { scores } = hotel;
  return `HOTEL DATA:
Name: ${hotel.name}
Location: ${hotel.location}
Star Rating: ${hotel.starRating}
Scores: Cleanliness ${scores.cleanliness}, Comfort ${scores.comfort}, Facilities ${scores.facilities}, Location ${scores.location}, Staff ${scores.staff}, Value for money ${scores.value}

Write a summary paragraph (60-100 words):`;
}

/**
 * Build the system + user prompt for one draft.
 * Learned sections are omitted entirely when empty.
 */
export function buildDraftPrompt(
  hotel: NormalizedHotel,
  context: ConditioningContext,
): GenerationPrompt {
  const system = [
    STYLE_RULES,
    styleGuideSection(context.styleGuide),
    examplesSection(context),
    errorPatternsSection(context.errorPatterns),
  ]
    .filter((section) => section !== '')
    .join('\n\n');

  return { system, user: hotelDataSection(hotel) };
}

// ---------------------------------------------------------------------------
// Drafting
// ---------------------------------------------------------------------------

/**
 * Generate a draft summary for a hotel.
 *
 * @returns The trimmed response text, otherwise verbatim
 * @throws GenerationError if the call fails or returns only whitespace
 */
export async function generateDraft(
  generator: TextGenerator,
  hotelId: string,
  hotel: NormalizedHotel,
  context: ConditioningContext,
  options?: GenerateOptions,
): Promise<string> {
  const prompt = buildDraftPrompt(hotel, context);

  let text: string;
  try {
    text = await generator.generate(prompt, options);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GenerationError(`Draft generation failed for hotel ${hotelId}: ${reason}`, hotelId, err);
  }

  const draft = text.trim();
  if (!draft) {
    throw new GenerationError(`Draft generation returned empty text for hotel ${hotelId}`, hotelId);
  }
  return draft;
}
