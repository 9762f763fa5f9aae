import { randomUUID } from 'crypto';
import type { SessionContext } from '../../interfaces/domain/SessionContext';
import { logger } from '../../utils/logger';

/**
 * In-memory holder for per-session matching state. Nothing is persisted;
 * sessions idle for longer than the TTL are dropped on the next access.
 * A context is only kept once something writes to it through `save`.
 */
export class SessionStore {
  private sessions = new Map<string, SessionContext>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): SessionContext | null {
    this.pruneExpired();
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    session.lastAccessedAt = this.now();
    return session;
  }

  /** Returns the stored session, or a fresh one that is not stored yet. */
  resolve(sessionId?: string): SessionContext {
    if (sessionId) {
      const existing = this.get(sessionId);
      if (existing) {
        return existing;
      }
    }

    return {
      id: sessionId || randomUUID(),
      analysis: null,
      profile: null,
      preferences: null,
      jobs: [],
      lastAccessedAt: this.now()
    };
  }

  save(session: SessionContext): void {
    session.lastAccessedAt = this.now();
    if (this.sessions.get(session.id) === session) {
      return;
    }
    this.pruneExpired();
    this.sessions.set(session.id, session);
    logger.info('Created new session', { sessionId: session.id });
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private pruneExpired(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, session] of this.sessions.entries()) {
      if (session.lastAccessedAt < cutoff) {
        this.sessions.delete(id);
        logger.debug('Expired session', { sessionId: id });
      }
    }
  }
}
