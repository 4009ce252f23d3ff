/**
 * Pattern Analyzer — Narrative style-guide enrichment from reviewer edits
 *
 * Two chained generation calls:
 *   1. Describe the patterns in up to N (draft, final) edit pairs
 *   2. Turn that description into concrete style-guide additions
 *
 * Best-effort only. If there are no edits, either call fails, or either
 * call returns nothing, the base guide comes back unchanged. Nothing here
 * throws; degradation is logged and swallowed into the fallback.
 *
 * Consumers: learner.ts
 */

import { feedbackConfig } from './config.js';
import type { GenerateOptions, TextGenerator } from '../generation/types.js';
import type { EditPair } from './types.js';

export const IMPROVEMENTS_HEADER = 'FEEDBACK-BASED IMPROVEMENTS:';

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

const ANALYST_SYSTEM = 'You are an analyst that identifies patterns in text edits.';

const EDITOR_SYSTEM = 'You improve style guides based on human feedback patterns.';

function analysisPrompt(pairs: readonly EditPair[]): string {
  const examples = pairs.map((pair) => ({ original_draft: pair.draft, final_text: pair.final }));

  return `Analyze these hotel summary edits to identify common patterns in human corrections.

EDIT EXAMPLES:
${JSON.stringify(examples, null, 2)}

Identify:
1. Common types of factual errors in original drafts
2. Frequent style improvements made by reviewers
3. Missing elements that reviewers consistently add
4. Length adjustment patterns

Provide a concise analysis of improvement patterns.`;
}

function improvementPrompt(analysis: string): string {
  return `Based on this pattern analysis of human edits:

${analysis}

Generate specific improvements to add to the hotel summary style guide. Focus on concrete, actionable improvements.`;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Enrich a base style guide with model-written improvements.
 *
 * @param generator - Text generation capability (both calls)
 * @param baseGuide - The rule-derived style guide
 * @param editPairs - All edit pairs; only the first few are analyzed
 * @returns The enriched guide, or baseGuide unchanged on any failure
 */
export async function enrichStyleGuide(
  generator: TextGenerator,
  baseGuide: string,
  editPairs: readonly EditPair[],
  options?: GenerateOptions,
): Promise<string> {
  if (editPairs.length === 0) return baseGuide;

  const sample = editPairs.slice(0, feedbackConfig.narrativeMaxEdits);

  try {
    const analysis = (
      await generator.generate({ system: ANALYST_SYSTEM, user: analysisPrompt(sample) }, options)
    ).trim();
    if (!analysis) {
      console.warn('[feedback] Narrative enrichment degraded: empty pattern analysis');
      return baseGuide;
    }

    const improvements = (
      await generator.generate({ system: EDITOR_SYSTEM, user: improvementPrompt(analysis) }, options)
    ).trim();
    if (!improvements) {
      console.warn('[feedback] Narrative enrichment degraded: empty style improvements');
      return baseGuide;
    }

    console.log('[feedback] Style guide enriched from edit patterns', { editsAnalyzed: sample.length });
    return [baseGuide, `${IMPROVEMENTS_HEADER}\n${improvements}`].filter((part) => part !== '').join('\n\n');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn('[feedback] Narrative enrichment degraded, keeping base style guide:', reason);
    return baseGuide;
  }
}
