/**
 * Hotel Record Source — Loads the ordered list of hotels to review
 *
 * Reads a JSON array from disk and validates each entry with Zod. Entries are
 * addressed both by position (0-based) and by hotel_id, which must be unique.
 * No cleaning happens here; the normalizer handles missing columns.
 *
 * Consumers: index.ts (startup), session/review-session.ts
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { HotelSourceEntrySchema } from './types.js';
import type { HotelSourceItem } from './types.js';

const HotelSourceSchema = z.array(HotelSourceEntrySchema);

/**
 * Validate parsed JSON into source items.
 *
 * @throws ZodError if the payload is not an array of objects with hotel_id
 * @throws Error if two entries share a hotel_id
 */
export function parseHotelRecords(payload: unknown): HotelSourceItem[] {
  const entries = HotelSourceSchema.parse(payload);
  const seen = new Set<string>();

  return entries.map((entry, position) => {
    const hotelId = String(entry.hotel_id);
    if (seen.has(hotelId)) {
      throw new Error(`Duplicate hotel_id ${hotelId} at position ${position}`);
    }
    seen.add(hotelId);
    return { hotelId, position, record: { ...entry } };
  });
}

/**
 * Load and validate the hotel records file.
 *
 * @param filePath - Path to a JSON array of hotel records
 */
export async function loadHotelRecords(filePath: string): Promise<HotelSourceItem[]> {
  const raw = await readFile(filePath, 'utf-8');
  const items = parseHotelRecords(JSON.parse(raw));
  console.log('[hotels] Loaded hotel records', { count: items.length });
  return items;
}

/** Look up a source item by hotel id. */
export function findHotel(
  items: readonly HotelSourceItem[],
  hotelId: string,
): HotelSourceItem | undefined {
  return items.find((item) => item.hotelId === hotelId);
}
