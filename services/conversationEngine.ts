import {
  GatewayTransientError,
  SessionAlreadyReportedError,
  errorMessage,
  type GatewayError,
} from '../errors.js';
import type { Logger } from '../lib/logger.js';
import type {
  ConversationState,
  EngineResponse,
  HandleOptions,
  Message,
  ModelHints,
  ModelResult,
  PromptPayload,
  Result,
} from '../types.js';
import { extract, extractFromHints, mergeEntities } from './entityExtractor.js';
import type { ModelGateway } from './modelGateway.js';
import { compose } from './promptComposer.js';
import type { ReportDispatcher } from './reportDispatcher.js';
import { hasIntelligence, transition, type SessionStore } from './sessionStore.js';

const STALLING_REPLIES = [
  'Sorry, my network is very slow right now. Can you say that again?',
  'Wait, the app is loading. What should I do next?',
  'One minute, someone is at the door. Please stay online.',
  'My phone just restarted. What were you saying?',
];

const CONTINUATION_REPLIES = [
  "I'm sorry, I don't understand. Could you explain more?",
  'Okay. Can you explain the next step?',
  'I am a bit confused. How does this work exactly?',
];

export interface EngineOptions {
  store: SessionStore;
  gateway: ModelGateway;
  dispatcher: ReportDispatcher;
  logger: Logger;
  /** Messages after which a session is closed even if the model keeps going. */
  maxMessages?: number;
  clock?: () => Date;
}

function union(existing: string[], incoming: string[]): string[] {
  return [...new Set([...existing, ...incoming])];
}

export class ConversationEngine {
  private readonly store: SessionStore;
  private readonly gateway: ModelGateway;
  private readonly dispatcher: ReportDispatcher;
  private readonly log: Logger;
  private readonly maxMessages: number;
  private readonly clock: () => Date;

  constructor(options: EngineOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.dispatcher = options.dispatcher;
    this.log = options.logger;
    this.maxMessages = options.maxMessages ?? Number.POSITIVE_INFINITY;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Runs one turn for `sessionId`. The whole read-modify-write happens under
   * the session's lock, so duplicate deliveries queue instead of interleaving.
   *
   * @throws SessionAlreadyReportedError when the session has already been reported.
   */
  handle(sessionId: string, incoming: Message, options: HandleOptions = {}): Promise<EngineResponse> {
    return this.store.runExclusive(sessionId, async () => {
      const state = this.store.getOrCreate(sessionId);
      if (state.status === 'REPORTED') {
        throw new SessionAlreadyReportedError(sessionId);
      }

      if (state.history.length === 0 && options.conversationHistory?.length) {
        this.seedHistory(state, options.conversationHistory);
      }
      if (options.metadata) {
        state.metadata = { ...state.metadata, ...options.metadata };
      }

      const known = state.entities.length;
      const payload = compose(state, incoming);
      state.history.push(incoming);
      state.entities = mergeEntities(state.entities, extract(incoming.text));

      const outcome = await this.converse(payload);
      let replyText: string;
      if (outcome.ok) {
        replyText = outcome.value.replyText;
        this.absorbReply(state, outcome.value);
      } else {
        replyText = this.fallbackReply(outcome.error, state.history.length);
        this.log.warn('degraded reply', {
          sessionId,
          kind: outcome.error.kind,
          reason: outcome.error.message,
        });
      }

      if (state.entities.length > known) {
        this.log.info('new intelligence', {
          sessionId,
          added: state.entities.length - known,
          entities: state.entities.map((e) => `${e.kind}:${e.value}`),
        });
      }

      const now = this.clock().toISOString();
      state.history.push({ sender: 'agent', text: replyText, timestamp: now });
      state.lastUpdatedAt = now;

      // A failed model call never moves the session forward.
      if (outcome.ok) {
        if (state.status === 'ACTIVE' && (outcome.value.isComplete || state.history.length >= this.maxMessages)) {
          transition(state, 'COMPLETE');
          this.log.info('conversation complete', {
            sessionId,
            messages: state.history.length,
            entities: state.entities.length,
          });
        }
        if (state.status === 'COMPLETE') {
          await this.report(state);
        }
      }

      this.store.save(state);
      return { sessionId, replyText, status: state.status, degraded: !outcome.ok };
    });
  }

  /**
   * Re-dispatches every COMPLETE session whose earlier report failed.
   * Returns how many reached REPORTED.
   */
  async retryPendingReports(): Promise<number> {
    let reported = 0;
    for (const sessionId of this.store.listByStatus('COMPLETE')) {
      const done = await this.store.runExclusive(sessionId, async () => {
        const state = this.store.get(sessionId);
        if (!state || state.status !== 'COMPLETE') return false;
        await this.report(state);
        this.store.save(state);
        return state.status === 'REPORTED';
      });
      if (done) reported++;
    }
    return reported;
  }

  /**
   * Closes and reports idle ACTIVE sessions that hold intelligence. Returns
   * how many were closed; a failed report leaves the session COMPLETE for
   * `retryPendingReports`.
   */
  async closeIdleSessions(maxIdleMs: number): Promise<number> {
    let closed = 0;
    for (const idle of this.store.listIdle(maxIdleMs, this.clock())) {
      if (!hasIntelligence(idle)) continue;
      const done = await this.store.runExclusive(idle.sessionId, async () => {
        const state = this.store.get(idle.sessionId);
        // A turn may have landed while we waited for the lock.
        if (!state || state.status !== 'ACTIVE' || state.lastUpdatedAt !== idle.lastUpdatedAt) return false;
        transition(state, 'COMPLETE');
        this.log.info('idle conversation closed', {
          sessionId: state.sessionId,
          lastUpdatedAt: state.lastUpdatedAt,
          entities: state.entities.length,
        });
        await this.report(state);
        this.store.save(state);
        return true;
      });
      if (done) closed++;
    }
    return closed;
  }

  private seedHistory(state: ConversationState, prior: Message[]): void {
    state.history.push(...prior);
    for (const message of prior) {
      state.entities = mergeEntities(state.entities, extract(message.text));
    }
  }

  private async converse(payload: PromptPayload): Promise<Result<ModelResult, GatewayError>> {
    try {
      return await this.gateway.converse(payload);
    } catch (err) {
      // Gateways return their failures; anything thrown is a bug, but the turn still gets a reply.
      this.log.error('model gateway threw', { reason: errorMessage(err) });
      return { ok: false, error: new GatewayTransientError(errorMessage(err), false) };
    }
  }

  private absorbReply(state: ConversationState, result: ModelResult): void {
    const hints: ModelHints = result.rawHints;
    state.entities = mergeEntities(state.entities, [...extract(result.replyText), ...extractFromHints(hints)]);
    state.bankAccounts = union(state.bankAccounts, hints.bankAccounts.map((a) => a.replace(/[\s-]/g, '')));
    state.suspiciousKeywords = union(
      state.suspiciousKeywords,
      hints.suspiciousKeywords.map((k) => k.toLowerCase()),
    );
    if (hints.agentNotes) state.agentNotes = hints.agentNotes;
  }

  private fallbackReply(error: GatewayError, turn: number): string {
    const lines = error.kind === 'parse' ? CONTINUATION_REPLIES : STALLING_REPLIES;
    return lines[turn % lines.length];
  }

  private async report(state: ConversationState): Promise<void> {
    state.dispatchAttempts++;
    try {
      const result = await this.dispatcher.dispatch(state);
      if (result.ok) {
        transition(state, 'REPORTED');
        state.lastDispatchError = undefined;
        return;
      }
      state.lastDispatchError = result.error.message;
    } catch (err) {
      state.lastDispatchError = errorMessage(err);
    }
    this.log.warn('report pending, session stays COMPLETE', {
      sessionId: state.sessionId,
      attempts: state.dispatchAttempts,
      reason: state.lastDispatchError,
    });
  }
}
