/**
 * Text Generation Configuration
 *
 * Follows the same pattern as src/config.ts.
 *
 * Environment variables:
 * - GEMINI_API_KEY: Required Google Gemini API key
 * - GENERATION_MODEL: Gemini model ID (default: gemini-2.0-flash)
 * - DRAFT_TEMPERATURE: Sampling temperature for summary drafts (default: 0.3)
 * - ANALYSIS_TEMPERATURE: Sampling temperature for feedback analysis (default: 0.1)
 */

import 'dotenv/config';
import { requiredEnv, optionalEnv } from '../config.js';

export interface GenerationConfig {
  /** Google Gemini API key */
  geminiApiKey: string;
  /** Gemini model ID used for both drafting and analysis */
  model: string;
  /** Temperature for hotel summary drafts */
  draftTemperature: number;
  /** Temperature for edit-pattern analysis (kept low for consistency) */
  analysisTemperature: number;
}

export const generationConfig: GenerationConfig = {
  geminiApiKey: requiredEnv('GEMINI_API_KEY'),
  model: optionalEnv('GENERATION_MODEL', 'gemini-2.0-flash'),
  draftTemperature: parseFloat(optionalEnv('DRAFT_TEMPERATURE', '0.3')),
  analysisTemperature: parseFloat(optionalEnv('ANALYSIS_TEMPERATURE', '0.1')),
};
