import { Request, Response, NextFunction } from 'express';
import type { AdminAuthConfig } from '../config/index.js';
import { secretsEqual } from '../utils/secret.js';
import { RelayError } from './error.js';

/**
 * Extract Bearer token from Authorization header
 */
function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    return null;
  }

  return parts[1];
}

/**
 * Guards the management surface with static bearer tokens
 */
export function createAdminAuthMiddleware(authConfig: AdminAuthConfig) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (authConfig.mode === 'none') {
      return next();
    }

    const token = extractBearerToken(req);
    if (!token) {
      return next(RelayError.unauthorized('Missing authentication token'));
    }

    const validTokens = authConfig.tokens ?? [];
    if (!validTokens.some(valid => secretsEqual(token, valid))) {
      return next(RelayError.unauthorized('Invalid authentication token'));
    }

    next();
  };
}
