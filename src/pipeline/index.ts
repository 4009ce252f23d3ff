/**
 * Pipeline Module — Barrel Export
 *
 * Ingest → Draft → Critique → Review gate → Store for a single hotel.
 */

// Types
export type {
  ReviewStage,
  HumanAction,
  StoredAction,
  ReviewDecision,
  Critique,
  FewShotExample,
  ConditioningContext,
  ReviewState,
  ReviewedRecord,
} from './types.js';
export { HUMAN_ACTIONS, ReviewDecisionSchema, isHumanAction } from './types.js';

// Errors
export {
  PipelineError,
  MissingConfigurationError,
  GenerationError,
  ContractViolationError,
  HotelNotFoundError,
} from './errors.js';

// Stages
export { buildDraftPrompt, generateDraft, MAX_PROMPT_EXAMPLES } from './drafter.js';
export { critiqueDraft, countWords, AMENITY_KEYWORDS, BANNED_SUPERLATIVES } from './critic.js';
export { applyDecision } from './review-gate.js';
export { finalizeReview, toReviewedRecord } from './store.js';

// Orchestrator
export { SummaryPipeline } from './pipeline.js';
export type { SummaryPipelineOptions, ReviewCompletion } from './pipeline.js';
