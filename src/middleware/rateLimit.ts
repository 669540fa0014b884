import rateLimit from 'express-rate-limit';
import type { ApiError } from '../types/email.js';

const tooManyRequests: ApiError = { success: false, error: { message: 'Too many mail requests, try again in a minute', type: 'RATE_LIMIT' } };

// Per-client HTTP limit; alert emails have their own limiter in alerts/rateLimiter.ts
export function createSendRateLimiter(limit = 50) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: tooManyRequests
  });
}
