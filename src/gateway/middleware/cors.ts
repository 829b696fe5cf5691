import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * CORS with an explicit origin allowlist. Credentials are allowed, so a
 * wildcard origin is never sent and the `null` origin is refused.
 */

const ALLOWED_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'];
const ALLOWED_HEADERS = ['Content-Type', 'Authorization'];
const PREFLIGHT_MAX_AGE = 600;

export function createCorsMiddleware(origins: string[]): RequestHandler {
  const allowedOrigins = new Set(origins);

  return (req: Request, res: Response, next: NextFunction): void => {
    res.setHeader('Vary', 'Origin');

    const origin = req.headers.origin;
    if (!origin) {
      next();
      return;
    }

    if (origin === 'null' || !allowedOrigins.has(origin)) {
      if (req.method === 'OPTIONS' || origin === 'null') {
        res.status(403).json({ error: 'OriginNotAllowed', message: `Origin not allowed: ${origin}` });
        return;
      }
      // Without CORS headers the browser drops the response
      next();
      return;
    }

    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Credentials', 'true');

    if (req.method === 'OPTIONS') {
      res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS.join(', '));
      res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS.join(', '));
      res.setHeader('Access-Control-Max-Age', String(PREFLIGHT_MAX_AGE));
      res.status(204).end();
      return;
    }

    next();
  };
}
