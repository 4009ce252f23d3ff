/**
 * Feedback Learner Configuration
 *
 * Fixed knobs for how review outcomes turn into drafting guidance.
 * The recompute cadence (LEARNING_THRESHOLD) and the narrative switch
 * (LEARNING_NARRATIVE_ENABLED) are environment-driven and live in src/config.ts.
 */

export const feedbackConfig = {
  /** Accepted summaries kept as few-shot examples */
  fewShotCount: 3,
  /** Label attached to each few-shot example */
  fewShotLabel: 'Previously accepted summary',
  /** Minimum accepted summaries before a preferred length is derived */
  minAcceptedForLength: 3,
  /** Qualitative notes added whenever any edits exist */
  editNotes: [
    'Prefer concise, direct language',
    'Emphasize factual scores over descriptions',
  ],
  /** Advisory notes set whenever any rejections exist */
  rejectionNotes: [
    'Rejected summaries had poor structure',
    'Focus on concrete data points',
  ],
  /** Edit pairs sent to the narrative pattern analysis */
  narrativeMaxEdits: 5,
  /** Words at or below this length are ignored by word rules */
  wordRuleMinLength: 4,
} as const;
