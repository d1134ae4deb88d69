// =============================================================================
// CASE EVALUATION — Identity Resolver
//
// Verifies the JWT bearer token issued by the identity provider and
// attaches the caller identity to the request. Roles are not carried
// in the token; they are looked up per operation.
// =============================================================================

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { EvaluationError } from '../errors';
import { Caller } from '../types/auth';
import '../types/express';

/**
 * Authenticate incoming requests via JWT Bearer token.
 * Responds 401 on a missing, malformed, expired or forged token.
 */
export function authenticate(req: Request, res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    res.status(401).json({ error: 'Authentication required', code: 'UNAUTHENTICATED' });
    return;
  }

  const token = authHeader.slice(7);

  try {
    const payload = jwt.verify(token, config.jwt.secret);
    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub.length === 0) {
      res.status(401).json({ error: 'Invalid token', code: 'UNAUTHENTICATED' });
      return;
    }

    req.caller = {
      id: payload.sub,
      tokenId: typeof payload.jti === 'string' ? payload.jti : '',
    };

    next();
  } catch (err: unknown) {
    if (err instanceof jwt.TokenExpiredError) {
      res.status(401).json({ error: 'Token expired', code: 'UNAUTHENTICATED' });
    } else if (err instanceof jwt.JsonWebTokenError) {
      res.status(401).json({ error: 'Invalid token', code: 'UNAUTHENTICATED' });
    } else {
      next(err);
    }
  }
}

/**
 * The authenticated caller. Routes mounted behind authenticate() always
 * have one; reaching this without it is a wiring error.
 */
export function requireCaller(req: Request): Caller {
  if (!req.caller) {
    throw new EvaluationError('UNAUTHENTICATED', 'Authentication required');
  }
  return req.caller;
}

/**
 * Issue an access token for a caller ID. Used by the token CLI and tests
 * in place of the external identity provider.
 */
export function signAccessToken(callerId: string, expirySeconds: number = config.jwt.expirySeconds): string {
  return jwt.sign({}, config.jwt.secret, {
    subject: callerId,
    jwtid: uuidv4(),
    expiresIn: expirySeconds,
  });
}
