// =============================================================================
// Auth Middleware — Bearer JWT on every operator API request
// =============================================================================
import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import logger from './logger';

// Extend Express Request with the verified operator identity
declare global {
  namespace Express {
    interface Request {
      operator?: string;
    }
  }
}

export type RequestHandler = (req: Request, res: Response, next: NextFunction) => void;

/**
 * Builds the middleware for one signing secret.
 * The token subject (or `operator` claim) becomes `req.operator`.
 */
export function createAuthMiddleware(secret: string): RequestHandler {
  return function authMiddleware(req: Request, res: Response, next: NextFunction): void {
    const token = req.headers.authorization?.replace(/^Bearer\s+/i, '');

    if (!token) {
      res.status(401).json({ error: 'Missing authentication token' });
      return;
    }
    if (!secret) {
      logger.error('JWT secret not configured; rejecting request');
      res.status(500).json({ error: 'Authentication not configured' });
      return;
    }

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, secret);
    } catch {
      res.status(401).json({ error: 'Invalid authentication token' });
      return;
    }

    if (typeof decoded === 'string') {
      req.operator = decoded;
    } else {
      const claim: unknown = decoded.operator;
      req.operator = typeof claim === 'string' ? claim : decoded.sub ?? 'operator';
    }
    next();
  };
}
