/**
 * Express Review Server
 *
 * HTTP layer over a ReviewSession. Routes:
 * - GET  /health                     — Server status
 * - GET  /hotels                     — Ordered hotels with review status
 * - POST /hotels/:hotelId/draft      — Draft + critique, parked at the review gate
 * - GET  /hotels/:hotelId/review     — Pending draft or stored review
 * - POST /hotels/:hotelId/decision   — { action, text? } from the reviewer
 * - GET  /reviews                    — Stored reviews, oldest first
 * - GET  /reviews/export             — Stored reviews as CSV
 * - GET  /stats                      — Totals, percentages, learning progress
 * - GET  /learning                   — Learned context and word rules
 * - POST /admin/reset                — Wipe all review state ({ confirm: true })
 *
 * Error mapping (see errorHandler): unknown hotel 404, invalid body 400,
 * contract violation 409, generation failure 502, anything else 500.
 * Summary text is never logged.
 */

import express from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z, ZodError } from 'zod';
import { healthHandler } from './health.js';
import { ReviewDecisionSchema } from '../pipeline/types.js';
import { ContractViolationError, GenerationError, HotelNotFoundError } from '../pipeline/errors.js';
import { reviewsToCsv } from '../reviews/export.js';
import type { ReviewSession } from '../session/review-session.js';

const ResetRequestSchema = z.object({ confirm: z.literal(true) });

/** Forward rejections from async handlers to the error handler. */
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof HotelNotFoundError) {
    res.status(404).json({ error: 'not_found', message: err.message });
    return;
  }
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'invalid_request', issues: err.issues });
    return;
  }
  // express.json() rejects malformed bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'invalid_json' });
    return;
  }
  if (err instanceof ContractViolationError) {
    console.warn('[server] Contract violation:', err.message);
    res.status(409).json({ error: 'contract_violation', message: err.message });
    return;
  }
  if (err instanceof GenerationError) {
    console.error('[server] Generation failed', { hotelId: err.hotelId, message: err.message });
    res.status(502).json({ error: 'generation_failed', message: err.message });
    return;
  }

  console.error('[server] Unhandled error:', err.message);
  res.status(500).json({ error: 'Internal server error' });
}

/**
 * Create the Express application bound to one review session.
 *
 * Exported as a factory so tests can build fresh apps over fresh sessions.
 */
export function createApp(session: ReviewSession) {
  const app = express();
  app.use(express.json());

  app.get('/health', healthHandler);

  app.get('/hotels', asyncRoute(async (_req, res) => {
    res.json({ hotels: await session.listHotels() });
  }));

  app.post('/hotels/:hotelId/draft', asyncRoute(async (req, res) => {
    const state = await session.startReview(req.params.hotelId);
    res.status(201).json({
      hotelId: state.hotelId,
      hotel: state.hotel,
      draftSummary: state.draftSummary,
      critique: state.critique,
    });
  }));

  app.get('/hotels/:hotelId/review', asyncRoute(async (req, res) => {
    const { hotelId } = req.params;

    const pending = session.getPending(hotelId);
    if (pending) {
      res.json({ status: 'drafted', state: pending });
      return;
    }

    const record = await session.getStored(hotelId);
    if (record) {
      res.json({ status: record.status, record });
      return;
    }

    res.status(404).json({ error: 'not_reviewed', message: `Hotel ${hotelId} has no draft or stored review` });
  }));

  app.post('/hotels/:hotelId/decision', asyncRoute(async (req, res) => {
    const decision = ReviewDecisionSchema.parse(req.body);
    const outcome = await session.submitDecision(req.params.hotelId, decision);

    console.log('[server] Decision applied', {
      hotelId: req.params.hotelId,
      action: decision.action,
      learningUpdated: outcome.learningUpdated,
    });
    res.json(outcome);
  }));

  app.get('/reviews', asyncRoute(async (_req, res) => {
    res.json({ reviews: await session.listReviews() });
  }));

  app.get('/reviews/export', asyncRoute(async (_req, res) => {
    const csv = reviewsToCsv(await session.listReviews());
    res
      .type('text/csv')
      .set('Content-Disposition', 'attachment; filename="reviewed_summaries.csv"')
      .send(csv);
  }));

  app.get('/stats', asyncRoute(async (_req, res) => {
    res.json(await session.stats());
  }));

  app.get('/learning', (_req: Request, res: Response) => {
    res.json(session.learning());
  });

  app.post('/admin/reset', asyncRoute(async (req, res) => {
    ResetRequestSchema.parse(req.body);
    await session.reset();
    console.log('[admin] Review state reset');
    res.json({ reset: true });
  }));

  app.use(errorHandler);

  return app;
}
