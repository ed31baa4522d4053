// generalRateLimiter.ts

import { Request } from 'express';
import rateLimit from 'express-rate-limit';

/**
 * General rate limiter for the export routes.
 * A scraper or dashboard polls at most a few times per second.
 */
export const generalLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 5000,
  keyGenerator: (req: Request) => req.ip || 'unknown',
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    code: 'TOO_MANY_REQUESTS',
    message: 'Too many requests, please try again later.',
  },
});
