/**
 * API Middleware: request ids, CORS, and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';
import { apiError, describeError, errorLogContext, internalError } from '../domain/errors';
import { Logger, logger } from '../logger';
import { PipelineError } from '../pipeline/radar-pipeline';

/** Request carrying a correlation id and a logger bound to it. */
export interface RadarRequest extends Request {
  requestId?: string;
  log?: Logger;
}

/** Assign a request id (honouring an incoming x-request-id) and a child logger. */
export function requestContext(baseLogger: Logger = logger) {
  return (req: RadarRequest, res: Response, next: NextFunction) => {
    const incoming = req.header('x-request-id');
    const requestId = incoming && incoming.length <= 128 ? incoming : uuid();
    req.requestId = requestId;
    req.log = baseLogger.child({ requestId, method: req.method, path: req.path });
    res.set('X-Request-Id', requestId);
    next();
  };
}

/**
 * Permissive CORS: every origin, method and header is allowed.
 *
 * A request with an Origin header gets that origin echoed back with
 * credentials allowed, since browsers refuse "*" for credentialed calls.
 * Preflight requests are answered here with 204.
 */
export function cors() {
  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.header('origin');
    if (origin) {
      res.set('Access-Control-Allow-Origin', origin);
      res.set('Access-Control-Allow-Credentials', 'true');
      res.vary('Origin');
    } else {
      res.set('Access-Control-Allow-Origin', '*');
    }

    if (req.method === 'OPTIONS') {
      const requestedMethod = req.header('access-control-request-method');
      const requestedHeaders = req.header('access-control-request-headers');
      res.set('Access-Control-Allow-Methods', requestedMethod ?? 'GET, HEAD, PUT, PATCH, POST, DELETE, OPTIONS');
      if (requestedHeaders) {
        res.set('Access-Control-Allow-Headers', requestedHeaders);
        res.vary('Access-Control-Request-Headers');
      }
      res.set('Access-Control-Max-Age', '600');
      res.status(204).end();
      return;
    }

    next();
  };
}

/** 404 for anything no route matched. */
export function notFound(_req: Request, res: Response) {
  res.status(404).json({ error: 'Not found' });
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: RadarRequest, res: Response, _next: NextFunction) {
  const log = req.log ?? logger;

  if (err instanceof PipelineError) {
    log.error('Radar pipeline failed', { ...errorLogContext(err.typedError), stage: err.stage });
    res.status(500).json(apiError(err.typedError));
    return;
  }

  const failure = internalError(describeError(err) || 'Internal server error');
  log.error('Unhandled request error', {
    ...errorLogContext(failure),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(failure));
}
