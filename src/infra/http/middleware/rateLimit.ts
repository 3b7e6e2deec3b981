import rateLimit from 'express-rate-limit';
import type { ErrorResponse } from './errorHandler.js';

const tooManyRequests = (message: string): ErrorResponse => ({
  code: 'RATE_LIMITED',
  message,
});

/**
 * General API limiter: 120 requests per minute per client IP.
 * In-memory store, reset on restart. One instance per app.
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 120,
    message: tooManyRequests('Too many requests, please try again later.'),
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Login limiter: 10 attempts per minute per client IP.
 */
export function createLoginRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 10,
    message: tooManyRequests('Too many login attempts, please try again later.'),
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => req.ip || req.socket.remoteAddress || 'unknown',
  });
}
