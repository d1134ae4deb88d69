// =============================================================================
// CASE EVALUATION — Request Hygiene & Error Mapping
//
// Covers:
//   - Request IDs for tracing
//   - Null-byte stripping on JSON bodies
//   - 404 for unknown routes
//   - EvaluationError → HTTP status (no stack traces in production)
// =============================================================================

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { isEvaluationError } from '../errors';
import '../types/express';

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing, honouring one sent by the client.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || `eval-${uuidv4()}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Input Sanitization ─────────────────────────────────────────────────

function stripNullBytes(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\0/g, '');
  }
  if (Array.isArray(value)) {
    return value.map(stripNullBytes);
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = stripNullBytes(inner);
    }
    return out;
  }
  return value;
}

/**
 * Strip null bytes from every string in a JSON body.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (req.body && typeof req.body === 'object') {
      req.body = stripNullBytes(req.body);
    }
    next();
  };
}

// ── 404 ────────────────────────────────────────────────────────────────

export function notFoundHandler(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

/**
 * Global error handler. Domain errors keep their message and code;
 * anything else is a 500 that never leaks a stack trace in production.
 */
export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isEvaluationError(err)) {
      console.warn(`[Server] ${req.requestId ?? '-'} ${req.method} ${req.path} → ${err.code}: ${err.message}`);
      res.status(err.httpStatus).json({ error: err.message, code: err.code });
      return;
    }

    // body-parser rejects malformed JSON with a status already set.
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_ARGUMENT' });
      return;
    }

    const isProd = config.nodeEnv === 'production';
    const message = err instanceof Error ? err.message : String(err);
    const stack = err instanceof Error ? err.stack : undefined;
    console.error(`[Server] ${req.requestId ?? '-'} Unhandled error: ${message}`, isProd ? '' : stack ?? '');

    res.status(500).json({
      error: isProd ? 'Internal server error' : message,
      code: 'INTERNAL',
      ...(isProd ? {} : { stack }),
    });
  };
}
