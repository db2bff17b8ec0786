import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter (120 requests per minute per client).
 * Uses in-memory store, one per app instance.
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 120,
    message: 'Too many requests, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
  });
}
