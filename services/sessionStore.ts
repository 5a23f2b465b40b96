import { InvalidTransitionError } from '../errors.js';
import { KeyedMutex } from '../lib/keyedMutex.js';
import type { ConversationState, SessionStatus } from '../types.js';

const STATUS_RANK: Record<SessionStatus, number> = { ACTIVE: 0, COMPLETE: 1, REPORTED: 2 };

const NEXT_STATUS: Record<SessionStatus, SessionStatus | undefined> = {
  ACTIVE: 'COMPLETE',
  COMPLETE: 'REPORTED',
  REPORTED: undefined,
};

/** Moves `state` one step along ACTIVE -> COMPLETE -> REPORTED. */
export function transition(state: ConversationState, to: SessionStatus): void {
  if (NEXT_STATUS[state.status] !== to) {
    throw new InvalidTransitionError(state.status, to);
  }
  state.status = to;
}

/** True once the session holds anything worth reporting. */
export function hasIntelligence(state: ConversationState): boolean {
  return state.entities.length > 0 || state.bankAccounts.length > 0;
}

export function newConversationState(sessionId: string, now: Date = new Date()): ConversationState {
  const ts = now.toISOString();
  return {
    sessionId,
    history: [],
    entities: [],
    status: 'ACTIVE',
    createdAt: ts,
    lastUpdatedAt: ts,
    bankAccounts: [],
    suspiciousKeywords: [],
    agentNotes: '',
    metadata: {},
    dispatchAttempts: 0,
  };
}

/**
 * In-memory owner of every ConversationState. Created once at process start
 * and never torn down; contents are lost on restart.
 *
 * Readers always get a detached copy. Nothing changes in the store until
 * `save` is called, so a request that fails half way leaves no trace.
 */
export class SessionStore {
  private sessions = new Map<string, ConversationState>();
  private locks = new KeyedMutex();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  getOrCreate(sessionId: string): ConversationState {
    let state = this.sessions.get(sessionId);
    if (!state) {
      state = newConversationState(sessionId, this.clock());
      this.sessions.set(sessionId, state);
    }
    return structuredClone(state);
  }

  get(sessionId: string): ConversationState | undefined {
    const state = this.sessions.get(sessionId);
    return state ? structuredClone(state) : undefined;
  }

  save(state: ConversationState): void {
    const stored = this.sessions.get(state.sessionId);
    if (stored) {
      if (STATUS_RANK[state.status] < STATUS_RANK[stored.status]) {
        throw new InvalidTransitionError(stored.status, state.status);
      }
      if (state.history.length < stored.history.length) {
        throw new Error(`Refusing to save session ${state.sessionId}: history would shrink`);
      }
    }
    this.sessions.set(state.sessionId, structuredClone(state));
  }

  /** Serializes read-modify-write sequences for one session. */
  runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(sessionId, fn);
  }

  listByStatus(status: SessionStatus): string[] {
    const ids: string[] = [];
    for (const [id, state] of this.sessions) {
      if (state.status === status) ids.push(id);
    }
    return ids;
  }

  countByStatus(): Record<SessionStatus, number> {
    const counts: Record<SessionStatus, number> = { ACTIVE: 0, COMPLETE: 0, REPORTED: 0 };
    for (const state of this.sessions.values()) {
      counts[state.status]++;
    }
    return counts;
  }

  /** ACTIVE sessions not written to for longer than `maxIdleMs`. */
  listIdle(maxIdleMs: number, now: Date = this.clock()): ConversationState[] {
    const cutoff = now.getTime() - maxIdleMs;
    const idle: ConversationState[] = [];
    for (const state of this.sessions.values()) {
      if (state.status === 'ACTIVE' && Date.parse(state.lastUpdatedAt) < cutoff) {
        idle.push(structuredClone(state));
      }
    }
    return idle;
  }

  /**
   * Drops idle ACTIVE sessions that hold no intelligence. Anything with
   * entities or bank accounts stays until it has been reported.
   */
  evictIdle(maxIdleMs: number, now: Date = this.clock()): number {
    let evicted = 0;
    for (const state of this.listIdle(maxIdleMs, now)) {
      if (hasIntelligence(state) || this.locks.isLocked(state.sessionId)) continue;
      this.sessions.delete(state.sessionId);
      evicted++;
    }
    return evicted;
  }

  get size(): number {
    return this.sessions.size;
  }
}
