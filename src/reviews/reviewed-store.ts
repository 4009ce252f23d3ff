/**
 * Reviewed Store — Redis-backed persistence for reviewed summaries
 *
 * Rows live in one Redis hash (field = hotelId, value = JSON row), so a
 * re-review overwrites in place and clear() is a single DEL.
 * Rows are validated with Zod on the way out.
 *
 * Consumers: session/review-session.ts
 */

import type { Redis as IORedis } from 'ioredis';
import { ReviewedRecordSchema } from './types.js';
import type { ReviewedStore } from './types.js';
import type { ReviewedRecord } from '../pipeline/types.js';

export const REVIEWS_KEY = 'reviews:records';

function parseRow(raw: string): ReviewedRecord {
  return ReviewedRecordSchema.parse(JSON.parse(raw));
}

export class RedisReviewedStore implements ReviewedStore {
  constructor(
    private readonly redis: IORedis,
    private readonly key: string = REVIEWS_KEY,
  ) {}

  async get(hotelId: string): Promise<ReviewedRecord | null> {
    const raw = await this.redis.hget(this.key, hotelId);
    return raw ? parseRow(raw) : null;
  }

  async put(record: ReviewedRecord): Promise<void> {
    await this.redis.hset(this.key, record.hotelId, JSON.stringify(record));
  }

  async remove(hotelId: string): Promise<boolean> {
    const removed = await this.redis.hdel(this.key, hotelId);
    return removed > 0;
  }

  async list(): Promise<ReviewedRecord[]> {
    const values = await this.redis.hvals(this.key);
    return values
      .map(parseRow)
      .sort((a, b) => a.reviewTimestamp.localeCompare(b.reviewTimestamp));
  }

  async clear(): Promise<void> {
    await this.redis.del(this.key);
  }
}
