import rateLimit from 'express-rate-limit';

/**
 * Rate Limiting
 *
 * Per-IP limits. Read endpoints share the general limit; anything that runs
 * a cycle, places orders or edits cooldowns takes the stricter one as well.
 */

// 100 requests per 15 minutes
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: 100,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    success: false,
    error: 'Too many requests from this IP, please try again later.',
    code: 'RATE_LIMIT_EXCEEDED',
  },
});

// 10 control actions per 5 minutes
export const controlLimiter = rateLimit({
  windowMs: 5 * 60 * 1000,
  limit: 10,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    success: false,
    error: 'Too many control requests, please try again later.',
    code: 'CONTROL_RATE_LIMIT_EXCEEDED',
  },
});
