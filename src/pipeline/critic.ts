/**
 * Critic — Deterministic rule checks on a draft summary
 *
 * Pure and local: same (draft, hotel) always yields an equal Critique.
 * Every rule runs independently, so a draft can fail several at once.
 * The result is advisory; it annotates the draft for the reviewer and never
 * blocks the review gate.
 *
 * Consumers: pipeline.ts
 */

import type { NormalizedHotel } from '../hotels/types.js';
import type { Critique } from './types.js';

export const MIN_WORDS = 60;
export const MAX_WORDS = 100;
export const MIN_AMENITIES = 2;

/** Substrings that count as mentioning a score/amenity */
export const AMENITY_KEYWORDS = [
  'cleanli',
  'comfort',
  'facilit',
  'staff',
  'value',
  'location score',
] as const;

export const BANNED_SUPERLATIVES = [
  'amazing',
  'incredible',
  'stunning',
  'breathtaking',
  'perfect',
  'ultimate',
] as const;

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word !== '').length;
}

/**
 * Run the full rule battery against a draft.
 */
export function critiqueDraft(draft: string, hotel: NormalizedHotel): Critique {
  const lower = draft.toLowerCase();
  const issues: string[] = [];

  // Word count
  const wordCount = countWords(draft);
  const wordCountValid = wordCount >= MIN_WORDS && wordCount <= MAX_WORDS;
  if (!wordCountValid) {
    issues.push(`Word count ${wordCount} (expected ${MIN_WORDS}-${MAX_WORDS})`);
  }

  // Location: city or country
  const locationMentioned =
    lower.includes(hotel.city.toLowerCase()) || lower.includes(hotel.country.toLowerCase());
  if (!locationMentioned) {
    issues.push('Location not clearly mentioned');
  }

  // Star rating: the numeral, or the word "star"
  const starRatingMentioned = draft.includes(String(hotel.starRating)) || lower.includes('star');
  if (!starRatingMentioned) {
    issues.push('Star rating not mentioned');
  }

  // Amenity / score coverage
  const amenitiesCount = AMENITY_KEYWORDS.filter((kw) => lower.includes(kw)).length;
  if (amenitiesCount < MIN_AMENITIES) {
    issues.push(`Only ${amenitiesCount} amenities mentioned (expected ${MIN_AMENITIES}-4)`);
  }

  // Marketing superlatives
  const superlativesFound = BANNED_SUPERLATIVES.filter((word) => lower.includes(word));
  const noSuperlatives = superlativesFound.length === 0;
  if (!noSuperlatives) {
    issues.push(`Contains superlatives: ${superlativesFound.join(', ')}`);
  }

  return {
    wordCount,
    wordCountValid,
    locationMentioned,
    starRatingMentioned,
    amenitiesCount,
    noSuperlatives,
    superlativesFound,
    issues,
  };
}
