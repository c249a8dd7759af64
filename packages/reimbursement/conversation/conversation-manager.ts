// Conversation manager: session lifecycle, bounded turn history, TTL eviction
//
// Session map iteration order is least-recently-active first: every
// appendTurn re-inserts the session, so the capacity bound evicts from the front.
// A session with an exchange queued or running under withSession is pinned:
// neither expiry nor the capacity bound removes it until the exchange settles.

import { randomUUID } from 'node:crypto';
import { SessionNotFoundError } from '../errors.js';
import type {
  ConversationSession,
  ConversationTurn,
  SessionStats,
  TurnRole,
} from '../types/conversation.js';
import { KeyedMutex } from '../utils/mutex.js';
import { createLogger, type Logger } from '../utils/logger.js';

const HOUR_MS = 60 * 60 * 1000;

export interface ConversationManagerOptions {
  /** Turns kept per session, oldest dropped first. Default 10. */
  maxTurns?: number;
  /** Inactivity after which a session expires. Default 24h. */
  ttlMs?: number;
  /** Live session cap; the least recently active session is evicted past it. Default 1000. */
  maxSessions?: number;
  now?: () => Date;
  logger?: Logger;
}

export class ConversationManager {
  readonly maxTurns: number;
  readonly ttlMs: number;
  readonly maxSessions: number;
  private sessions = new Map<string, ConversationSession>();
  private exchangeLocks = new KeyedMutex();
  private pins = new Map<string, number>();
  private now: () => Date;
  private log: Logger;

  constructor(options: ConversationManagerOptions = {}) {
    this.maxTurns = options.maxTurns ?? 10;
    this.ttlMs = options.ttlMs ?? 24 * HOUR_MS;
    this.maxSessions = options.maxSessions ?? 1000;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('conversation');

    if (this.maxTurns < 1) throw new RangeError(`maxTurns must be at least 1, got ${this.maxTurns}`);
    if (this.maxSessions < 1) throw new RangeError(`maxSessions must be at least 1, got ${this.maxSessions}`);
  }

  /**
   * Return the id of a live session, or create a new one.
   * A known live id is returned as-is, without refreshing its activity time.
   * An unknown or expired id is never resurrected: a fresh id is issued.
   */
  getOrCreateSession(sessionId?: string): string {
    if (sessionId !== undefined) {
      const existing = this.sessions.get(sessionId);
      if (existing && !this.isExpired(existing)) return sessionId;

      if (existing) {
        this.sessions.delete(sessionId);
        this.log('info', 'Session expired, issuing a new one', { expiredSessionId: sessionId });
      } else {
        this.log('info', 'Unknown session id, issuing a new one', { unknownSessionId: sessionId });
      }
    }

    const now = this.now();
    const session: ConversationSession = {
      sessionId: randomUUID(),
      turns: [],
      createdAt: now,
      lastActiveAt: now,
    };
    this.enforceCapacity();
    this.sessions.set(session.sessionId, session);
    this.log('debug', 'Created conversation session', { sessionId: session.sessionId });
    return session.sessionId;
  }

  /**
   * Append a turn and refresh the session's activity time.
   *
   * @throws SessionNotFoundError when the id is unknown or expired
   */
  appendTurn(sessionId: string, role: TurnRole, text: string): ConversationTurn {
    const session = this.liveSession(sessionId);
    const turn: ConversationTurn = { role, text, timestamp: this.now() };

    session.turns.push(turn);
    if (session.turns.length > this.maxTurns) {
      session.turns.splice(0, session.turns.length - this.maxTurns);
    }
    session.lastActiveAt = turn.timestamp;

    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, session);
    return turn;
  }

  /**
   * The most recent `maxTurns` turns, oldest first.
   *
   * @throws SessionNotFoundError when the id is unknown or expired
   */
  buildContext(sessionId: string, maxTurns: number): ConversationTurn[] {
    const session = this.liveSession(sessionId);
    const count = Math.max(0, Math.floor(maxTurns));
    return count === 0 ? [] : session.turns.slice(-count);
  }

  /** Remove every session idle for longer than `ttlMs` as of `now`. Returns the evicted ids. */
  evictExpired(now: Date = this.now(), ttlMs: number = this.ttlMs): string[] {
    const cutoff = now.getTime() - ttlMs;
    const evicted: string[] = [];
    for (const [id, session] of this.sessions) {
      if (session.lastActiveAt.getTime() < cutoff && !this.pins.has(id)) evicted.push(id);
    }
    for (const id of evicted) this.sessions.delete(id);

    if (evicted.length > 0) {
      this.log('info', `Cleaned up ${evicted.length} expired sessions`);
    }
    return evicted;
  }

  /** Drop a session explicitly. Returns false when it did not exist. */
  resetSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) this.log('info', 'Cleared conversation session', { sessionId });
    return removed;
  }

  hasSession(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    return session !== undefined && !this.isExpired(session);
  }

  stats(): SessionStats {
    let totalTurns = 0;
    for (const session of this.sessions.values()) totalTurns += session.turns.length;
    return { activeSessions: this.sessions.size, totalTurns };
  }

  /**
   * Run a multi-step exchange with exclusive access to one session.
   * Exchanges on different sessions run concurrently.
   */
  withSession<T>(sessionId: string, fn: () => Promise<T> | T): Promise<T> {
    this.pins.set(sessionId, (this.pins.get(sessionId) ?? 0) + 1);
    return this.exchangeLocks.runExclusive(sessionId, fn).finally(() => this.unpin(sessionId));
  }

  isPinned(sessionId: string): boolean {
    return this.pins.has(sessionId);
  }

  private unpin(sessionId: string): void {
    const count = (this.pins.get(sessionId) ?? 0) - 1;
    if (count > 0) this.pins.set(sessionId, count);
    else this.pins.delete(sessionId);
  }

  private isExpired(session: ConversationSession): boolean {
    if (this.pins.has(session.sessionId)) return false;
    return session.lastActiveAt.getTime() < this.now().getTime() - this.ttlMs;
  }

  private liveSession(sessionId: string): ConversationSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    if (this.isExpired(session)) {
      this.sessions.delete(sessionId);
      this.log('info', 'Evicted expired session on access', { sessionId });
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private enforceCapacity(): void {
    if (this.sessions.size < this.maxSessions) return;
    const victims: string[] = [];
    let remaining = this.sessions.size;
    for (const id of this.sessions.keys()) {
      if (remaining < this.maxSessions) break;
      if (this.pins.has(id)) continue;
      victims.push(id);
      remaining--;
    }
    for (const id of victims) {
      this.sessions.delete(id);
      this.log('warn', 'Session capacity reached, evicted least recently active session', {
        sessionId: id,
        maxSessions: this.maxSessions,
      });
    }
    if (remaining >= this.maxSessions) {
      this.log('warn', 'Session capacity exceeded while every remaining session has an exchange in flight', {
        activeSessions: remaining,
        maxSessions: this.maxSessions,
      });
    }
  }
}
