/**
 * Gemini Text Generator — Google Gemini behind the TextGenerator interface
 *
 * Uses the @google/generative-ai package with the system prompt passed as
 * systemInstruction and the user content as the single request part.
 * Errors from the SDK propagate unchanged; callers decide how to wrap them.
 *
 * Consumers: index.ts (wires the generator into the review session)
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerateOptions, GenerationPrompt, TextGenerator } from './types.js';

export interface GeminiGeneratorOptions {
  apiKey: string;
  model: string;
  temperature: number;
}

/**
 * Create a TextGenerator backed by Gemini.
 *
 * The SDK client is created lazily on first use so building the generator
 * never touches the network.
 */
export function createGeminiGenerator(options: GeminiGeneratorOptions): TextGenerator {
  let genAI: GoogleGenerativeAI | null = null;

  function getGenAI(): GoogleGenerativeAI {
    if (genAI) return genAI;
    genAI = new GoogleGenerativeAI(options.apiKey);
    return genAI;
  }

  return {
    async generate(prompt: GenerationPrompt, overrides?: GenerateOptions): Promise<string> {
      const model = getGenAI().getGenerativeModel({
        model: options.model,
        systemInstruction: prompt.system,
        generationConfig: {
          temperature: overrides?.temperature ?? options.temperature,
        },
      });

      const result = await model.generateContent([{ text: prompt.user }]);
      return result.response.text();
    },
  };
}
