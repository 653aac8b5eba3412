/**
 * Express middleware for automap.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AutomapError, type DataEngine, type EngineScope } from '@automap/core';

/**
 * Context attached to Express requests.
 */
export interface AutomapContext {
  engine: DataEngine;
  /** Engine operations bound to the request's namespace */
  scope: EngineScope;
  namespace: string;
  /** Request metadata */
  metadata: Record<string, unknown>;
}

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      automap?: AutomapContext;
    }
  }
}

export const NAMESPACE_HEADER = 'x-namespace';

/**
 * Options for the automap context middleware.
 */
export interface ContextMiddlewareOptions {
  /** Extract the namespace; defaults to the x-namespace header, then the engine's active namespace */
  getNamespace?: (req: Request) => string | undefined;
  /** Extract additional metadata */
  getMetadata?: (req: Request) => Record<string, unknown>;
}

function namespaceHeader(req: Request): string | undefined {
  const value = req.headers[NAMESPACE_HEADER];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Create middleware that attaches the automap context to requests.
 * An invalid namespace fails the request with INVALID_NAMESPACE.
 */
export function createContextMiddleware(engine: DataEngine, options: ContextMiddlewareOptions = {}): RequestHandler {
  const getNamespace = options.getNamespace ?? namespaceHeader;

  return (req: Request, _res: Response, next: NextFunction) => {
    const namespace = getNamespace(req) ?? engine.namespace;
    req.automap = {
      engine,
      scope: engine.in(namespace),
      namespace,
      metadata: options.getMetadata?.(req) ?? {},
    };
    next();
  };
}

/**
 * Error response format.
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Malformed request: bad body, bad query string, bad id.
 */
export class RequestError extends AutomapError {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super('INVALID_REQUEST', message);
    this.name = 'RequestError';
  }
}

/** HTTP status per error code; anything else is a 500 */
export const STATUS_BY_CODE: Readonly<Record<string, number>> = {
  INVALID_REQUEST: 400,
  MISSING_FIELD: 400,
  TYPE_MISMATCH: 400,
  UNKNOWN_FIELD: 400,
  READ_ONLY_FIELD: 400,
  INVALID_NAMESPACE: 400,
  INVALID_QUERY: 400,
  UNKNOWN_MODEL: 404,
  NOT_FOUND: 404,
  DUPLICATE_KEY: 409,
};

/** Client errors raised by express.json() carry their own status */
function clientStatus(err: Error): number | undefined {
  if (!('status' in err) || typeof err.status !== 'number') return undefined;
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

/**
 * Create error handling middleware for automap routes.
 */
export function createErrorHandler(): (err: Error, req: Request, res: Response, next: NextFunction) => void {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AutomapError && STATUS_BY_CODE[err.code] !== undefined) {
      const body: ErrorResponse = { error: { code: err.code, message: err.message } };
      if (err instanceof RequestError && err.details !== undefined) body.error.details = err.details;
      res.status(STATUS_BY_CODE[err.code]).json(body);
      return;
    }

    const status = clientStatus(err);
    if (status !== undefined) {
      res.status(status).json({ error: { code: 'INVALID_REQUEST', message: err.message } });
      return;
    }

    console.error('automap error:', err);
    res.status(500).json({
      error: {
        code: err instanceof AutomapError ? err.code : 'INTERNAL_ERROR',
        message: err.message || 'An unexpected error occurred',
      },
    });
  };
}

/**
 * Request validation helpers.
 */
export function requireAutomapContext(req: Request): asserts req is Request & { automap: AutomapContext } {
  if (!req.automap) {
    const err = new Error('automap context not attached. Did you forget the middleware?');
    err.name = 'ConfigurationError';
    throw err;
  }
}

/**
 * Async handler wrapper to catch errors.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
