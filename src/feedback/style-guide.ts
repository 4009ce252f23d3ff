/**
 * Style Guide Extraction — Base (non-narrative) learned guidance
 *
 * Pure function over accepted texts and edit pairs. Produces bullet lines:
 * - a preferred length once enough accepted summaries exist
 * - fixed qualitative notes whenever any edits exist
 * Returns empty text when there is nothing to learn from.
 *
 * Consumers: learner.ts
 */

import { countWords } from '../pipeline/critic.js';
import { feedbackConfig } from './config.js';
import type { EditPair } from './types.js';

export function averageWordCount(texts: readonly string[]): number {
  if (texts.length === 0) return 0;
  const total = texts.reduce((sum, text) => sum + countWords(text), 0);
  return total / texts.length;
}

export function extractStylePatterns(
  acceptedSummaries: readonly string[],
  editPairs: readonly EditPair[],
): string {
  const lines: string[] = [];

  if (acceptedSummaries.length >= feedbackConfig.minAcceptedForLength) {
    lines.push(`- Preferred length: ~${Math.floor(averageWordCount(acceptedSummaries))} words`);
  }

  if (editPairs.length > 0) {
    for (const note of feedbackConfig.editNotes) {
      lines.push(`- ${note}`);
    }
  }

  return lines.join('\n');
}
