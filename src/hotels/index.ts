/**
 * Hotels Module — Barrel Export
 *
 * Record source + normalizer for the review pipeline.
 */

export type {
  RawHotelRecord,
  HotelSourceItem,
  ScoreKey,
  HotelScores,
  NormalizedHotel,
} from './types.js';

export { SCORE_KEYS, SCORE_COLUMNS, HotelSourceEntrySchema } from './types.js';
export { normalizeHotel, UNKNOWN } from './normalize.js';
export { parseHotelRecords, loadHotelRecords, findHotel } from './source.js';
