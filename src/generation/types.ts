/**
 * Text Generation Type Definitions
 *
 * The pipeline treats the language model as an opaque capability: a
 * structured prompt goes in, text comes out. Anything implementing
 * TextGenerator can back the drafter and the feedback learner, which keeps
 * both testable without a live model.
 */

/** System instruction + user content for a single completion */
export interface GenerationPrompt {
  system: string;
  user: string;
}

export interface GenerateOptions {
  /** Overrides the generator's default sampling temperature */
  temperature?: number;
}

export interface TextGenerator {
  /**
   * Run one completion and return the raw response text.
   * Implementations propagate failures as thrown errors; no retries.
   */
  generate(prompt: GenerationPrompt, options?: GenerateOptions): Promise<string>;
}
