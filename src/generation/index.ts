/**
 * Generation Module — Barrel Export
 *
 * generationConfig is not re-exported: importing it requires GEMINI_API_KEY,
 * so only the entry point pulls it in directly.
 */

export type { GenerationPrompt, GenerateOptions, TextGenerator } from './types.js';
export { createGeminiGenerator } from './gemini-client.js';
export type { GeminiGeneratorOptions } from './gemini-client.js';
