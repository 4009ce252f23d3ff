/**
 * Hotel Normalizer — Raw record → NormalizedHotel
 *
 * Total function: never throws, never mutates its input.
 * Missing numbers become 0, missing strings become "Unknown".
 *
 * Accepts two record layouts:
 * - flat source columns: { hotel_name, city, country, star_rating, lat, lon, cleanliness_base, ... }
 * - nested scores:       { name, city, country, star_rating, scores: { cleanliness, ... } }
 * A flat column wins when both are present.
 */

import { SCORE_COLUMNS } from './types.js';
import type { HotelScores, NormalizedHotel, RawHotelRecord, ScoreKey } from './types.js';

export const UNKNOWN = 'Unknown';

const MAX_STARS = 5;

export function normalizeHotel(raw: RawHotelRecord): NormalizedHotel {
  const name = toText(raw.hotel_name ?? raw.name);
  const city = toText(raw.city);
  const country = toText(raw.country);
  const nested = isRecord(raw.scores) ? raw.scores : {};

  const score = (key: ScoreKey): number => toNumber(raw[SCORE_COLUMNS[key]] ?? nested[key]);
  const scores: HotelScores = {
    cleanliness: score('cleanliness'),
    comfort: score('comfort'),
    facilities: score('facilities'),
    location: score('location'),
    staff: score('staff'),
    value: score('value'),
  };

  return Object.freeze({
    name,
    city,
    country,
    location: `${city}, ${country}`,
    starRating: toStarRating(raw.star_rating),
    coordinates: Object.freeze({ lat: toNumber(raw.lat), lon: toNumber(raw.lon) }),
    scores: Object.freeze(scores),
  });
}

// ---------------------------------------------------------------------------
// Coercion helpers
// ---------------------------------------------------------------------------

function toText(value: unknown): string {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return UNKNOWN;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function toStarRating(value: unknown): number {
  const rounded = Math.round(toNumber(value));
  return Math.min(MAX_STARS, Math.max(0, rounded));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
