// ============================================================================
// Pipeline Error Types — Typed errors for the review pipeline
// ============================================================================

/**
 * Base error for everything the review pipeline raises on purpose.
 * Messages carry ids and counts only, never summary text.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/**
 * Thrown at startup when a required environment variable is absent.
 * Not recoverable by the pipeline; the process should exit.
 */
export class MissingConfigurationError extends PipelineError {
  readonly key: string;

  constructor(key: string) {
    super(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`,
    );
    this.name = 'MissingConfigurationError';
    this.key = key;
  }
}

/**
 * Thrown when the text generation call fails or returns nothing usable.
 * No fallback draft is produced; retry policy belongs to the caller.
 */
export class GenerationError extends PipelineError {
  readonly hotelId: string | null;

  constructor(message: string, hotelId: string | null, cause?: unknown) {
    super(message, { cause });
    this.name = 'GenerationError';
    this.hotelId = hotelId;
  }
}

/**
 * Thrown when a stage is invoked without its preconditions, e.g. storing a
 * rejected review or an edit decision with no replacement text.
 */
export class ContractViolationError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

/**
 * Thrown when a hotel id is not present in the record source.
 */
export class HotelNotFoundError extends PipelineError {
  readonly hotelId: string;

  constructor(hotelId: string) {
    super(`Hotel ${hotelId} not found`);
    this.name = 'HotelNotFoundError';
    this.hotelId = hotelId;
  }
}
