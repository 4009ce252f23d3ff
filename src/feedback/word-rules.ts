/**
 * Word Rules — Word-level signals from reviewer edits
 *
 * For each edited review, compares the draft and final word sets:
 * - words the reviewer removed → REMOVE
 * - words the reviewer added → PRIORITIZE
 * Short words are ignored. When a word appears in several edits, the
 * latest edit decides its rule. Informational only; drafting does not
 * consume these yet.
 *
 * Consumers: learner.ts (exposed via the learning endpoint)
 */

import { feedbackConfig } from './config.js';
import type { EditPair, WordRule, WordRuleKind } from './types.js';

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter((w) => w !== ''));
}

export function deriveWordRules(editPairs: readonly EditPair[]): WordRule[] {
  const rules = new Map<string, WordRuleKind>();

  for (const pair of editPairs) {
    const draftWords = wordSet(pair.draft);
    const finalWords = wordSet(pair.final);

    for (const word of draftWords) {
      if (!finalWords.has(word) && word.length > feedbackConfig.wordRuleMinLength) {
        rules.set(word, 'REMOVE');
      }
    }
    for (const word of finalWords) {
      if (!draftWords.has(word) && word.length > feedbackConfig.wordRuleMinLength) {
        rules.set(word, 'PRIORITIZE');
      }
    }
  }

  return [...rules].map(([word, rule]) => ({ word, rule }));
}
