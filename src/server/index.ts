/**
 * Server Module — Barrel Export
 */

export { createApp, errorHandler } from './server.js';
export { healthHandler } from './health.js';
