/**
 * Reviewed Summary Export — CSV rendering
 *
 * Column layout matches the reviewed-summary sheet:
 *   hotel_id, hotel_name, draft_summary, final_summary, status,
 *   review_timestamp, critique_flags (JSON array of issue strings)
 *
 * Fields are quoted per RFC 4180 when they contain a comma, quote or newline.
 *
 * Consumers: server/server.ts (GET /reviews/export)
 */

import type { ReviewedRecord } from '../pipeline/types.js';

export const CSV_COLUMNS = [
  'hotel_id',
  'hotel_name',
  'draft_summary',
  'final_summary',
  'status',
  'review_timestamp',
  'critique_flags',
] as const;

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toRow(record: ReviewedRecord): string[] {
  return [
    record.hotelId,
    record.hotelName,
    record.draftSummary,
    record.finalSummary,
    record.status,
    record.reviewTimestamp,
    JSON.stringify(record.critiqueIssues),
  ];
}

/** Render reviewed rows as CSV text with a header line and CRLF line endings. */
export function reviewsToCsv(records: readonly ReviewedRecord[]): string {
  const lines = [CSV_COLUMNS.join(','), ...records.map((r) => toRow(r).map(escapeCsvField).join(','))];
  return `${lines.join('\r\n')}\r\n`;
}
