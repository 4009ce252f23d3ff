/**
 * Reviews Module — Barrel Export
 *
 * Persistence + export for accepted/edited hotel summaries.
 */

export type { ReviewedStore } from './types.js';
export { ReviewedRecordSchema } from './types.js';
export { RedisReviewedStore, REVIEWS_KEY } from './reviewed-store.js';
export { getRedis, closeRedis, createRedisOptions, parseRedisUrl } from './redis.js';
export { reviewsToCsv, escapeCsvField, CSV_COLUMNS } from './export.js';
