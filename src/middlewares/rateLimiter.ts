/**
 * Rate Limiting Middleware
 *
 * express-rate-limit with the default in-memory store (single instance).
 * - Global: all endpoints except /api/health
 * - Mutations: portfolio, draft and quote writes
 * - Search: directory search (typed-ahead by the ticker field)
 *
 * Clients are keyed by req.ip, which honours 'trust proxy' (set in app.ts
 * from TRUST_PROXY_HOPS) so X-Forwarded-For is only believed from our proxies.
 */

import rateLimit from 'express-rate-limit';
import { RATE_LIMITS } from '@/config/businessRules';
import { logger } from '@/adapters/logging/LoggerFactory';

function tooManyRequests(message: string) {
  return {
    success: false,
    error: { message },
  };
}

/**
 * Global rate limiter for all endpoints
 */
export const globalRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
  limit: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  message: tooManyRequests(
    `Too many requests. Please try again later. Limit: ${RATE_LIMITS.GLOBAL.MAX_REQUESTS} requests per minute.`
  ),
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  skip: (req) => req.path === '/api/health',
});

/**
 * Stricter limiter for writes
 */
export const mutationRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.MUTATIONS.WINDOW_MS,
  limit: RATE_LIMITS.MUTATIONS.MAX_REQUESTS,
  message: tooManyRequests(
    `Too many changes. Please slow down. Limit: ${RATE_LIMITS.MUTATIONS.MAX_REQUESTS} per minute.`
  ),
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res, _next, options) => {
    logger.warn(
      {
        type: 'RATE_LIMIT_EXCEEDED',
        endpoint: `${req.method} ${req.baseUrl}${req.path}`,
        ip: req.ip,
        limit: RATE_LIMITS.MUTATIONS.MAX_REQUESTS,
      },
      'Rate limit exceeded'
    );
    res.status(options.statusCode).json(options.message);
  },
});

/**
 * Moderate limiter for directory search
 */
export const searchRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.SEARCH.WINDOW_MS,
  limit: RATE_LIMITS.SEARCH.MAX_REQUESTS,
  message: tooManyRequests(
    `Too many search requests. Please slow down. Limit: ${RATE_LIMITS.SEARCH.MAX_REQUESTS} searches per minute.`
  ),
  standardHeaders: true,
  legacyHeaders: false,
});
