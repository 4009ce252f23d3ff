/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the review server.
 * Generation settings live in src/generation/config.ts.
 *
 * Environment variables:
 * - APP_ENV: 'production' disables dev behaviour (default development)
 * - PORT: HTTP server port (default 3000)
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - HOTELS_FILE: JSON array of hotel records, relative to the working directory (default data/hotels.json)
 * - LEARNING_THRESHOLD: Recompute learned context every N completed reviews (default 5)
 * - LEARNING_NARRATIVE_ENABLED: Enrich the style guide with Gemini pattern analysis (default false)
 */

import 'dotenv/config';
import path from 'node:path';
import { MissingConfigurationError } from './pipeline/errors.js';

export interface AppConfig {
  isDev: boolean;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  server: {
    port: number;
  };
  review: {
    /** Absolute path to the hotel records file */
    hotelsFile: string;
    /** Learned context is recomputed whenever completed reviews hit a multiple of this */
    learningThreshold: number;
    /** Run the two-call narrative analysis after each recompute */
    narrativeLearning: boolean;
  };
}

export function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new MissingConfigurationError(key);
  }
  return value;
}

export function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function positiveInt(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export const appConfig: AppConfig = {
  isDev,
  redis: {
    url: process.env.REDIS_URL || undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: parseInt(optionalEnv('REDIS_PORT', '6379'), 10),
    password: process.env.REDIS_PASSWORD || undefined,
  },
  server: {
    port: parseInt(optionalEnv('PORT', '3000'), 10),
  },
  review: {
    hotelsFile: path.resolve(optionalEnv('HOTELS_FILE', 'data/hotels.json')),
    learningThreshold: positiveInt('LEARNING_THRESHOLD', 5),
    narrativeLearning: process.env.LEARNING_NARRATIVE_ENABLED === 'true',
  },
};
