/**
 * Express plumbing shared by the gateway, auth service and resource service
 */

import type { NextFunction, Request, RequestHandler, Response, Application } from 'express';
import { createServer, type Server } from 'http';
import { SecurityError, createErrorResponse, sanitizeError } from './errors.js';
import { isRecord } from './guards.js';

/**
 * Route handler returning a promise. Express 4 does not observe rejected
 * promises, so they are forwarded to the error handler here.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Terminal JSON error handler. SecurityErrors keep their status and public
 * message; everything else becomes a bare 500.
 */
export function jsonErrorHandler(component: string) {
  return (err: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof SecurityError) {
      const { statusCode, body } = createErrorResponse(err);
      res.status(statusCode).json(body);
      return;
    }

    // express.json() rejects unparsable bodies with type 'entity.parse.failed'
    if (isRecord(err) && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body', code: 'MALFORMED_REQUEST' });
      return;
    }

    console.error(`[${component}] Error:`, sanitizeError(err));
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  };
}

/**
 * Bind an Express app to a port
 */
export function startHTTPServer(app: Application, port: number, component: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      console.log(`[${component}] Listening on port ${port}`);
      resolve(server);
    });
  });
}

export interface CorsOptions {
  /** Allowed origin, or '*' */
  origin: string;
  credentials?: boolean;
}

/**
 * Minimal CORS headers with preflight short-circuit
 */
export function corsHeaders(options: CorsOptions): RequestHandler {
  return (req, res, next) => {
    res.header('Access-Control-Allow-Origin', options.origin);
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (options.credentials) {
      res.header('Access-Control-Allow-Credentials', 'true');
    }

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  };
}
