import cors from 'cors';
import { logger } from '../../utils/logger';

/**
 * CORS Configuration
 *
 * Only explicitly listed origins are allowed (CORS_ALLOWED_ORIGINS,
 * comma-separated). Local dev origins are added in development.
 */

const buildAllowedOrigins = (): Set<string> => {
  const origins = new Set<string>();

  if (process.env.NODE_ENV === 'development') {
    origins.add('http://localhost:3000');
    origins.add('http://localhost:5173');
  }

  if (process.env.CORS_ALLOWED_ORIGINS) {
    const envOrigins = process.env.CORS_ALLOWED_ORIGINS.split(',')
      .map(o => o.trim())
      .filter(o => o.length > 0);

    for (const origin of envOrigins) {
      try {
        new URL(origin);
        origins.add(origin);
      } catch {
        logger.warn(`Invalid CORS origin ignored: ${origin}`);
      }
    }
  }

  return origins;
};

const allowedOrigins = buildAllowedOrigins();

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Server-to-server calls carry no Origin; auth still applies
    if (!origin) {
      return callback(null, true);
    }

    if (allowedOrigins.has(origin)) {
      callback(null, true);
    } else {
      logger.warn(`CORS blocked origin: ${origin}`);
      callback(null, false);
    }
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
  maxAge: 3600,
});
