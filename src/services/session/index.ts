import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { Session } from '../../domain/types.js';
import type { SessionStore } from './store.js';

export {
  InMemorySessionStore,
  DEFAULT_SESSION_TTL_MS,
  generateSessionToken,
  type Clock,
  type SessionLookup,
  type SessionStore,
} from './store.js';

const log = logger.child({ module: 'session' });

/** Accepts `Bearer <token>` or the bare token. */
export function extractSessionToken(authorization: string | undefined): string | null {
  if (!authorization) return null;
  const value = authorization.trim();
  const match = /^Bearer\s+(.+)$/i.exec(value);
  const token = (match?.[1] ?? value).trim();
  return token === '' ? null : token;
}

export function verifySession(store: SessionStore, authorization: string | undefined): Result<Session, AppError> {
  const token = extractSessionToken(authorization);
  if (token === null) {
    return err(createAppError(ErrorCode.UNAUTHORIZED, 'Unauthorized. Please log in.', false));
  }

  const found = store.lookup(token);
  switch (found.status) {
    case 'active':
      return ok(found.session);
    case 'expired':
      log.info({ errorCode: ErrorCode.SESSION_EXPIRED }, 'Expired session evicted');
      return err(createAppError(ErrorCode.SESSION_EXPIRED, 'Session expired. Please log in again.', false));
    case 'missing':
      return err(createAppError(ErrorCode.UNAUTHORIZED, 'Unauthorized. Please log in.', false));
  }
}
