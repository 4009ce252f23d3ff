/**
 * Health Check Endpoint Handler
 *
 * Returns server status, environment, version, and timestamp.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    environment: appConfig.isDev ? 'development' : 'production',
    version: process.env.npm_package_version ?? 'dev',
  });
}
