import { setTimeout as sleep } from 'node:timers/promises';
import { DispatchError, type GatewayError } from '../errors.js';
import type { ModelGateway } from '../services/modelGateway.js';
import type { DispatchResult, ReportDispatcher } from '../services/reportDispatcher.js';
import type { ConversationState, Message, ModelHints, ModelResult, PromptPayload, Result } from '../types.js';

export function emptyHints(): ModelHints {
  return { paymentHandles: [], phoneNumbers: [], urls: [], bankAccounts: [], suspiciousKeywords: [], agentNotes: '' };
}

export function modelReply(
  replyText: string,
  isComplete = false,
  hints: Partial<ModelHints> = {},
): Result<ModelResult, GatewayError> {
  return { ok: true, value: { replyText, isComplete, rawHints: { ...emptyHints(), ...hints } } };
}

export function counterparty(text: string, timestamp = '2026-01-01T00:00:00.000Z'): Message {
  return { sender: 'counterparty', text, timestamp };
}

/** Answers from a queue, then with `fallback` forever. */
export class FakeGateway implements ModelGateway {
  readonly calls: PromptPayload[] = [];
  private queue: Result<ModelResult, GatewayError>[] = [];

  constructor(
    private readonly fallback: Result<ModelResult, GatewayError> = modelReply('Okay, tell me more.'),
    private readonly delayMs = 0,
  ) {}

  enqueue(...results: Result<ModelResult, GatewayError>[]): this {
    this.queue.push(...results);
    return this;
  }

  async converse(payload: PromptPayload): Promise<Result<ModelResult, GatewayError>> {
    this.calls.push(payload);
    if (this.delayMs > 0) await sleep(this.delayMs);
    return this.queue.shift() ?? this.fallback;
  }
}

/** Succeeds unless told to fail the next N dispatches. */
export class FakeDispatcher implements ReportDispatcher {
  readonly calls: ConversationState[] = [];
  private failures = 0;

  failNext(times = 1): this {
    this.failures += times;
    return this;
  }

  async dispatch(state: ConversationState): Promise<DispatchResult> {
    this.calls.push(structuredClone(state));
    if (this.failures > 0) {
      this.failures--;
      return { ok: false, error: new DispatchError('Report sink returned 503', 503) };
    }
    return { ok: true, value: { status: 200 } };
  }
}
