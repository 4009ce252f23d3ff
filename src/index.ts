/**
 * Application Entry Point
 *
 * Starts the review server in a single process.
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Load and validate the hotel records file
 * 3. Build the Gemini generator, Redis-backed store, and review session
 * 4. Start Express server on configured port
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close the Redis connection
 * 3. Exit process
 *
 * Usage:
 *   Production: node dist/src/index.js
 *   Development: npx tsx src/index.ts
 */

import { appConfig } from './config.js';
import { loadHotelRecords } from './hotels/source.js';
import { createGeminiGenerator } from './generation/gemini-client.js';
import { SummaryPipeline } from './pipeline/pipeline.js';
import { RedisReviewedStore } from './reviews/reviewed-store.js';
import { getRedis, closeRedis } from './reviews/redis.js';
import { ReviewSession } from './session/review-session.js';
import { createApp } from './server/server.js';

async function main() {
  console.log('[startup] Hotel summary review server starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Learning threshold:', appConfig.review.learningThreshold);
  console.log('[startup] Narrative learning:', appConfig.review.narrativeLearning ? 'enabled' : 'disabled');

  // Loaded here so a missing GEMINI_API_KEY is reported through main().catch
  const { generationConfig } = await import('./generation/config.js');

  const hotels = await loadHotelRecords(appConfig.review.hotelsFile);

  const drafter = createGeminiGenerator({
    apiKey: generationConfig.geminiApiKey,
    model: generationConfig.model,
    temperature: generationConfig.draftTemperature,
  });
  const analyst = createGeminiGenerator({
    apiKey: generationConfig.geminiApiKey,
    model: generationConfig.model,
    temperature: generationConfig.analysisTemperature,
  });

  const session = new ReviewSession({
    hotels,
    pipeline: new SummaryPipeline({ generator: drafter }),
    store: new RedisReviewedStore(getRedis()),
    learningThreshold: appConfig.review.learningThreshold,
    narrativeGenerator: appConfig.review.narrativeLearning ? analyst : undefined,
  });

  // Start Express server
  const app = createApp(session);
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeRedis();
    console.log('[shutdown] Redis connection closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
