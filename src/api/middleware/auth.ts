import { Request, Response, NextFunction } from 'express';
import { createHash, timingSafeEqual } from 'crypto';
import { logger } from '../../utils/logger';

/**
 * Authentication Middleware
 *
 * API key authentication for endpoints that trade or change state.
 * Keys are compared as SHA-256 digests with a timing-safe comparison.
 */

export interface AuthenticatedRequest extends Request {
  apiKeyId?: string;
  isAuthenticated?: boolean;
}

/**
 * Digest a key so every comparison runs over equal-length buffers
 */
function hashApiKey(key: string): Buffer {
  return createHash('sha256').update(key).digest();
}

/**
 * Keys configured in the environment, read on every request
 * Supports API_KEY plus API_KEY_1..API_KEY_5 for rotation
 */
function getConfiguredApiKeys(): Map<string, Buffer> {
  const keys = new Map<string, Buffer>();

  // Primary key
  if (process.env.API_KEY) {
    keys.set('primary', hashApiKey(process.env.API_KEY));
  }

  // Rotation keys
  for (let i = 1; i <= 5; i++) {
    const key = process.env[`API_KEY_${i}`];
    if (key) {
      keys.set(`key_${i}`, hashApiKey(key));
    }
  }

  return keys;
}

/**
 * Extract the key from the request
 * Supports: Authorization header (Bearer) and X-API-Key header
 * SECURITY: keys in the query string are ignored
 */
function extractApiKey(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }

  const apiKeyHeader = req.headers['x-api-key'];
  if (typeof apiKeyHeader === 'string') {
    return apiKeyHeader;
  }

  return null;
}

/**
 * Return the id of the matching key, or null
 * SECURITY: no configured keys means nothing authenticates
 */
function validateApiKey(providedKey: string): string | null {
  const configuredKeys = getConfiguredApiKeys();

  if (configuredKeys.size === 0) {
    logger.warn('No API keys configured - authenticated endpoints are closed');
    return null;
  }

  const hashedProvided = hashApiKey(providedKey);
  for (const [keyId, hashedKey] of configuredKeys) {
    if (timingSafeEqual(hashedProvided, hashedKey)) {
      return keyId;
    }
  }

  return null;
}

/**
 * Authentication middleware for routes that trade or write state
 * Answers 401 with AUTH_REQUIRED or INVALID_API_KEY
 */
export const requireAuth = (
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): void => {
  const providedKey = extractApiKey(req);

  if (!providedKey) {
    logger.warn('Authentication failed - no API key provided', {
      path: req.path,
      method: req.method,
      ip: req.ip,
    });

    res.status(401).json({
      success: false,
      error: 'Authentication required',
      code: 'AUTH_REQUIRED',
    });
    return;
  }

  const keyId = validateApiKey(providedKey);

  if (!keyId) {
    logger.warn('Authentication failed - invalid API key', {
      path: req.path,
      method: req.method,
      ip: req.ip,
    });

    res.status(401).json({
      success: false,
      error: 'Invalid API key',
      code: 'INVALID_API_KEY',
    });
    return;
  }

  // Attach auth info to request
  req.apiKeyId = keyId;
  req.isAuthenticated = true;

  logger.debug('Authentication successful', { keyId, path: req.path, method: req.method });

  next();
};

/**
 * Whether at least one API key is set
 */
export function isAuthConfigured(): boolean {
  return getConfiguredApiKeys().size > 0;
}
