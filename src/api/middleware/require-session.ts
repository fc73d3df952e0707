import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Session } from '../../domain/types.js';
import { verifySession, type SessionStore } from '../../services/session/index.js';
import { sendAppError } from './error-handler.js';

const boundSessions = new WeakMap<Request, Session>();

export function requireSession(store: SessionStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const verified = verifySession(store, req.get('authorization'));
    if (!verified.ok) return sendAppError(res, verified.error);

    boundSessions.set(req, verified.value);
    next();
  };
}

/** Session bound by {@link requireSession}; undefined on unprotected routes. */
export function getRequestSession(req: Request): Session | undefined {
  return boundSessions.get(req);
}
