import { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger.js';
import { AppError } from '../lib/errors.js';

const log = logger.child({ module: 'http' });

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof Error && 'type' in err && err.type === 'entity.too.large') {
    return res.status(413).json({ success: false, error: { message: 'Payload too large', type: 'PAYLOAD_TOO_LARGE' } });
  }
  if (err instanceof AppError && err.type !== 'CONFIGURATION') {
    return res.status(mapStatus(err.type)).json(err.toJSON());
  }
  // Logged at error level, so this also goes out as an alert email when those are enabled
  log.error({ err }, `Exception caught: (HTTP ${err instanceof AppError ? err.type : 'Unhandled'}) ${err instanceof Error ? err.message : String(err)}`);
  return res.status(500).json({ success: false, error: { message: 'Internal Server Error', type: 'INTERNAL_ERROR' } });
}

export function mapStatus(type: string): number {
  switch (type) {
  case 'DAILY_LIMIT': return 429;
  case 'INVALID_RECIPIENT':
  case 'INVALID_ADDRESS':
  case 'VALIDATION': return 400;
  case 'AUTH_BROWSER_INTERACTION_REQUIRED':
  case 'AUTH_FAILED': return 401;
  case 'SMTP_SYNTAX':
  case 'CONNECTION': return 502;
  default: return 500;
  }
}
