import { randomBytes } from 'node:crypto';
import type { Session } from '../../domain/types.js';

export type Clock = () => Date;

export type SessionLookup =
  | { status: 'active'; session: Session }
  | { status: 'expired' }
  | { status: 'missing' };

export interface SessionStore {
  create(email: string, patientName: string): Session;
  /** Expired entries are evicted on lookup. */
  lookup(token: string): SessionLookup;
  invalidate(token: string): void;
}

export const DEFAULT_SESSION_TTL_MS = 8 * 60 * 60 * 1000;

export function generateSessionToken(): string {
  return randomBytes(32).toString('base64url');
}

/** Process-local sessions; nothing is persisted and nothing sweeps expired entries. */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly now: Clock;

  constructor(options: { ttlMs?: number; clock?: Clock } = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.clock ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  create(email: string, patientName: string): Session {
    const createdAt = this.now();
    const session: Session = {
      token: generateSessionToken(),
      email,
      patientName,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + this.ttlMs),
    };
    this.sessions.set(session.token, session);
    return session;
  }

  lookup(token: string): SessionLookup {
    const session = this.sessions.get(token);
    if (!session) return { status: 'missing' };

    if (this.now().getTime() > session.expiresAt.getTime()) {
      this.sessions.delete(token);
      return { status: 'expired' };
    }
    return { status: 'active', session };
  }

  invalidate(token: string): void {
    this.sessions.delete(token);
  }
}
