import { DispatchError, errorMessage } from '../errors.js';
import { fetchWithTimeout } from '../lib/fetchWithTimeout.js';
import type { Logger } from '../lib/logger.js';
import type { ConversationState, EntityKind, ReportPayload, Result } from '../types.js';
import { compareEntities } from './entityExtractor.js';

export type DispatchResult = Result<{ status: number }, DispatchError>;

export interface ReportDispatcher {
  dispatch(state: ConversationState): Promise<DispatchResult>;
}

export function buildReportPayload(state: ConversationState): ReportPayload {
  const entities = [...state.entities].sort(compareEntities);
  const valuesOf = (kind: EntityKind) => entities.filter((e) => e.kind === kind).map((e) => e.value);

  return {
    sessionId: state.sessionId,
    scamDetected: true,
    totalMessagesExchanged: state.history.length,
    entities,
    extractedIntelligence: {
      upiIds: valuesOf('payment_handle'),
      phoneNumbers: valuesOf('phone_number'),
      phishingLinks: valuesOf('url'),
      bankAccounts: [...state.bankAccounts],
      suspiciousKeywords: [...state.suspiciousKeywords],
    },
    agentNotes: state.agentNotes,
    createdAt: state.createdAt,
    lastUpdatedAt: state.lastUpdatedAt,
  };
}

/**
 * POSTs the final summary to the evaluation sink. Any 2xx is success.
 * Repeat submissions for one session are updates on the sink side, so this
 * is safe to call again after a failure.
 */
export class HttpReportDispatcher implements ReportDispatcher {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly log: Logger,
  ) {}

  async dispatch(state: ConversationState): Promise<DispatchResult> {
    const payload = buildReportPayload(state);
    try {
      const response = await fetchWithTimeout(
        this.url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
        },
        this.timeoutMs,
      );

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        this.log.error('report sink rejected summary', {
          sessionId: state.sessionId,
          status: response.status,
          body: body.slice(0, 200),
        });
        return { ok: false, error: new DispatchError(`Report sink returned ${response.status}`, response.status) };
      }

      this.log.info('reported session', {
        sessionId: state.sessionId,
        entities: payload.entities.length,
        turns: payload.totalMessagesExchanged,
      });
      return { ok: true, value: { status: response.status } };
    } catch (err) {
      const reason = err instanceof Error && err.name === 'AbortError' ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
      this.log.error('report dispatch failed', { sessionId: state.sessionId, reason });
      return { ok: false, error: new DispatchError(`Report dispatch failed: ${reason}`) };
    }
  }
}
