/**
 * Feedback Module — Barrel Export
 *
 * Learns from reviewer decisions and feeds the result back into drafting.
 *
 * Base path: append-only log → style guide, few-shot examples, error notes
 * Narrative path: two generation calls enrich the style guide (best-effort)
 */

// Types
export type {
  FeedbackRecord,
  EditPair,
  LearnedContext,
  WordRule,
  WordRuleKind,
} from './types.js';

// Config
export { feedbackConfig } from './config.js';

// Base learning
export { extractStylePatterns, averageWordCount } from './style-guide.js';
export { deriveWordRules } from './word-rules.js';

// Narrative learning
export { enrichStyleGuide, IMPROVEMENTS_HEADER } from './pattern-analyzer.js';

// Learner
export { FeedbackLearner, emptyLearnedContext } from './learner.js';
