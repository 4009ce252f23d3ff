/**
 * Tests for the Redis Reviewed Store
 *
 * Tests cover:
 * - put/get round-trip through the hash
 * - get returns null for unknown hotels
 * - remove reports whether a row existed
 * - list returns rows oldest first and validates them
 * - clear is a single DEL
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ReviewedRecord } from '../../pipeline/types.js';

// ---------------------------------------------------------------------------
// Mock Redis (must be before imports)
// ---------------------------------------------------------------------------

const { mockHget, mockHset, mockHdel, mockHvals, mockDel } = vi.hoisted(() => ({
  mockHget: vi.fn(),
  mockHset: vi.fn(),
  mockHdel: vi.fn(),
  mockHvals: vi.fn(),
  mockDel: vi.fn(),
}));

vi.mock('ioredis', () => ({
  Redis: class MockIORedis {
    hget = mockHget;
    hset = mockHset;
    hdel = mockHdel;
    hvals = mockHvals;
    del = mockDel;
  },
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { Redis } from 'ioredis';
import { RedisReviewedStore } from '../reviewed-store.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const earlier: ReviewedRecord = {
  hotelId: '1',
  hotelName: 'Canal House',
  draftSummary: 'Draft one',
  finalSummary: 'Draft one',
  status: 'accept',
  reviewTimestamp: '2026-04-01T10:00:00.000Z',
  critiqueIssues: [],
};

const later: ReviewedRecord = {
  hotelId: '2',
  hotelName: 'Dune Lodge',
  draftSummary: 'Draft two',
  finalSummary: 'Edited two',
  status: 'edit',
  reviewTimestamp: '2026-04-02T10:00:00.000Z',
  critiqueIssues: ['Star rating not mentioned'],
};

describe('RedisReviewedStore', () => {
  let store: RedisReviewedStore;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new RedisReviewedStore(new Redis());
  });

  it('put writes the JSON row under the hotel id', async () => {
    mockHset.mockResolvedValue(1);

    await store.put(later);

    expect(mockHset).toHaveBeenCalledWith('reviews:records', '2', JSON.stringify(later));
  });

  it('get parses the stored row', async () => {
    mockHget.mockResolvedValue(JSON.stringify(later));

    await expect(store.get('2')).resolves.toEqual(later);
    expect(mockHget).toHaveBeenCalledWith('reviews:records', '2');
  });

  it('get returns null for an unknown hotel', async () => {
    mockHget.mockResolvedValue(null);

    await expect(store.get('99')).resolves.toBeNull();
  });

  it('get rejects a malformed row', async () => {
    mockHget.mockResolvedValue(JSON.stringify({ hotelId: '2', status: 'reject' }));

    await expect(store.get('2')).rejects.toThrow();
  });

  it('remove reports whether a row existed', async () => {
    mockHdel.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

    await expect(store.remove('1')).resolves.toBe(true);
    await expect(store.remove('1')).resolves.toBe(false);
  });

  it('list returns rows oldest first', async () => {
    mockHvals.mockResolvedValue([JSON.stringify(later), JSON.stringify(earlier)]);

    const rows = await store.list();

    expect(rows.map((r) => r.hotelId)).toEqual(['1', '2']);
  });

  it('clear deletes the whole hash', async () => {
    mockDel.mockResolvedValue(1);

    await store.clear();

    expect(mockDel).toHaveBeenCalledOnce();
    expect(mockDel).toHaveBeenCalledWith('reviews:records');
  });
});
