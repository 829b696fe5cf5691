import { Request, Response, NextFunction, RequestHandler } from 'express';
import { TokenLifecycle } from '../../security/tokenLifecycle';
import { AuthContext } from '../../shared/types';

// Extend Express Request to include auth context
declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}

export function readBearer(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token || null;
}

/**
 * Resolves the Bearer access token into an auth context. Every validation
 * failure (expired, revoked, wrong kind, bad signature) goes to the error
 * handler with its own kind.
 */
export function createAuthMiddleware(lifecycle: TokenLifecycle): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.headers.authorization) {
      res.status(401).json({ error: 'MissingToken', message: 'Missing authorization header' });
      return;
    }

    const token = readBearer(req);
    if (!token) {
      res.status(401).json({ error: 'MissingToken', message: 'Malformed authorization header' });
      return;
    }

    lifecycle
      .validate(token, 'access')
      .then(claims => {
        req.authContext = { claims, token };
        next();
      })
      .catch(next);
  };
}

export function requireAuthContext(req: Request): AuthContext {
  if (!req.authContext) {
    throw new Error('Auth middleware did not run for this route');
  }
  return req.authContext;
}
