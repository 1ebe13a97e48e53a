/**
 * Rate Limiting Middleware
 *
 * express-rate-limit, per client IP:
 * - Global: all endpoints except /api/health
 * - Analysis runs: each run reads ~15 months of history for the whole universe
 *
 * The default in-memory store only covers a single instance; multi-instance
 * deployments need a shared store (rate-limit-redis).
 */

import rateLimit from 'express-rate-limit';
import { Request } from 'express';
import { RATE_LIMITS } from '@/config/analysisRules';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Client IP for rate limiting
 * req.ip already honours X-Forwarded-For for the proxy hop trusted in app.ts
 */
function getClientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

export const globalRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
  limit: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      code: 'RATE_LIMITED',
      message: `Too many requests. Please try again later. Limit: ${RATE_LIMITS.GLOBAL.MAX_REQUESTS} requests per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  skip: (req) => req.path === '/api/health',
});

/**
 * Stricter rate limiter for triggering analysis runs
 */
export const analysisRunRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.ANALYSIS_RUNS.WINDOW_MS,
  limit: RATE_LIMITS.ANALYSIS_RUNS.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      code: 'RATE_LIMITED',
      message: `Too many analysis runs. Please slow down. Limit: ${RATE_LIMITS.ANALYSIS_RUNS.MAX_REQUESTS} runs per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  handler: (req, res, _next, options) => {
    logger.warn(
      {
        type: 'RATE_LIMIT_EXCEEDED',
        endpoint: 'analysis/runs',
        ip: getClientIp(req),
        limit: RATE_LIMITS.ANALYSIS_RUNS.MAX_REQUESTS,
      },
      'Rate limit exceeded'
    );
    res.status(options.statusCode).json(options.message);
  },
});
