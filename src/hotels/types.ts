/**
 * Hotel Record Type Definitions
 *
 * - RawHotelRecord: one entry from the record source, keys may be missing
 * - HotelSourceEntrySchema: Zod schema the record source validates against
 * - SCORE_KEYS / HotelScores: the six sub-scores every normalized hotel carries
 * - NormalizedHotel: canonical shape consumed by drafter + critic
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Raw Records
// ---------------------------------------------------------------------------

/** A raw hotel record as read from the source. Any key may be absent. */
export type RawHotelRecord = Record<string, unknown>;

/**
 * Source entries must be objects with an id; every other column is optional
 * and left for the normalizer to default.
 */
export const HotelSourceEntrySchema = z
  .object({
    hotel_id: z.union([z.number(), z.string().min(1)]),
  })
  .passthrough();

/** A source entry paired with its resolved id and position */
export interface HotelSourceItem {
  hotelId: string;
  position: number;
  record: RawHotelRecord;
}

// ---------------------------------------------------------------------------
// Scores
// ---------------------------------------------------------------------------

export const SCORE_KEYS = [
  'cleanliness',
  'comfort',
  'facilities',
  'location',
  'staff',
  'value',
] as const;

export type ScoreKey = typeof SCORE_KEYS[number];

export type HotelScores = Record<ScoreKey, number>;

/** Source column holding each sub-score in the flat record layout */
export const SCORE_COLUMNS: Record<ScoreKey, string> = {
  cleanliness: 'cleanliness_base',
  comfort: 'comfort_base',
  facilities: 'facilities_base',
  location: 'location_base',
  staff: 'staff_base',
  value: 'value_for_money_base',
};

// ---------------------------------------------------------------------------
// Normalized Hotel
// ---------------------------------------------------------------------------

export interface NormalizedHotel {
  readonly name: string;
  readonly city: string;
  readonly country: string;
  /** Always "{city}, {country}" from the resolved values */
  readonly location: string;
  /** Integer 0-5 */
  readonly starRating: number;
  readonly coordinates: { readonly lat: number; readonly lon: number };
  readonly scores: Readonly<HotelScores>;
}
