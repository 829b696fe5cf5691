import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { SecurityError } from '../../shared/errors';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

export function asyncRoute(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    route(req, res).catch(next);
  };
}

export function createErrorHandler(): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (error instanceof SecurityError) {
      if (error.retryable) {
        res.setHeader('Retry-After', '1');
      }
      res.status(error.status).json({ error: error.kind, message: error.message, ...error.details() });
      return;
    }

    if (error instanceof ZodError) {
      res.status(400).json({
        error: 'InvalidRequest',
        message: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
      });
      return;
    }

    // express.json() rejects unparseable bodies with a SyntaxError
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'InvalidRequest', message: 'Malformed request body' });
      return;
    }

    console.error(`[gateway] ${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: 'InternalError', message: 'Request failed' });
  };
}
