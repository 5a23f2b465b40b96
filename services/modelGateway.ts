import {
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
  Type,
  type GenerateContentParameters,
  type SafetySetting,
  type Schema,
} from '@google/genai';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  GatewayParseError,
  GatewayRefusalError,
  GatewayTransientError,
  errorMessage,
  type GatewayError,
} from '../errors.js';
import type { Logger } from '../lib/logger.js';
import type { ModelHints, ModelResult, PromptPayload, Result } from '../types.js';

const MIN_RETRY_DELAY_MS = 200;

const RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    agentResponseText: { type: Type.STRING },
    isConversationOver: { type: Type.BOOLEAN },
    extractedIntelligence: {
      type: Type.OBJECT,
      properties: {
        upiIds: { type: Type.ARRAY, items: { type: Type.STRING } },
        phoneNumbers: { type: Type.ARRAY, items: { type: Type.STRING } },
        phishingLinks: { type: Type.ARRAY, items: { type: Type.STRING } },
        bankAccounts: { type: Type.ARRAY, items: { type: Type.STRING } },
        suspiciousKeywords: { type: Type.ARRAY, items: { type: Type.STRING } },
      },
    },
    agentNotes: { type: Type.STRING },
  },
  required: ['agentResponseText', 'isConversationOver'],
};

// The persona has to be able to talk to abusive counterparties.
const SAFETY_SETTINGS: SafetySetting[] = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_NONE }));

const REFUSAL_FINISH_REASONS = new Set(['SAFETY', 'PROHIBITED_CONTENT', 'BLOCKLIST', 'SPII', 'RECITATION']);

/** The slice of a generateContent response the gateway reads. */
export interface ModelResponseLike {
  text?: string;
  promptFeedback?: { blockReason?: string };
  candidates?: { finishReason?: string }[];
}

export interface GenerativeClient {
  generateContent(params: GenerateContentParameters): Promise<ModelResponseLike>;
}

export interface ModelGateway {
  converse(payload: PromptPayload): Promise<Result<ModelResult, GatewayError>>;
}

export interface GeminiGatewayOptions {
  client: GenerativeClient;
  model: string;
  timeoutMs: number;
  retryDelayMs?: number;
  logger: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function strings(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((v): v is string => typeof v === 'string')
    .map((v) => v.trim())
    .filter((v) => v !== '' && v.toLowerCase() !== 'none');
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function toTransient(err: unknown): GatewayTransientError {
  if (err instanceof GatewayTransientError) return err;
  const status = statusOf(err);
  if (status === undefined) {
    // No HTTP status: the request never got an answer (DNS, reset, abort).
    return new GatewayTransientError(`Model backend unreachable: ${errorMessage(err)}`, true);
  }
  const retryable = status === 408 || status === 429 || status >= 500;
  return new GatewayTransientError(`Model backend error [${status}]: ${errorMessage(err)}`, retryable, status);
}

/** Every balanced `{...}` span in `text`, in order of their opening brace. */
function balancedObjects(text: string): string[] {
  const spans: string[] = [];
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
      } else if (ch === '"') {
        inString = true;
      } else if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth === 0) {
          spans.push(text.slice(start, i + 1));
          break;
        }
      }
    }
  }
  return spans;
}

/**
 * Reads the model's JSON answer: the first balanced object in the output that
 * parses. Code fences and chatter around it are ignored; a missing completion
 * flag means "not complete".
 */
export function parseModelOutput(text: string): Result<ModelResult, GatewayParseError> {
  const candidates = balancedObjects(text.replace(/```(?:json)?/gi, ''));
  if (candidates.length === 0) {
    return { ok: false, error: new GatewayParseError('No JSON object in model output', text) };
  }

  let parsed: Record<string, unknown> | undefined;
  let firstError: unknown;
  for (const candidate of candidates) {
    try {
      const value: unknown = JSON.parse(candidate);
      if (isRecord(value)) {
        parsed = value;
        break;
      }
    } catch (err) {
      if (firstError === undefined) firstError = err;
    }
  }
  if (!parsed) {
    return { ok: false, error: new GatewayParseError(`Invalid JSON from model: ${errorMessage(firstError)}`, text) };
  }

  const reply = parsed.agentResponseText ?? parsed.reply;
  if (typeof reply !== 'string' || reply.trim() === '') {
    return { ok: false, error: new GatewayParseError('Model output has no reply text', text) };
  }

  const intel = isRecord(parsed.extractedIntelligence) ? parsed.extractedIntelligence : {};
  const rawHints: ModelHints = {
    paymentHandles: strings(intel.upiIds),
    phoneNumbers: strings(intel.phoneNumbers),
    urls: strings(intel.phishingLinks),
    bankAccounts: strings(intel.bankAccounts),
    suspiciousKeywords: strings(intel.suspiciousKeywords),
    agentNotes: typeof parsed.agentNotes === 'string' ? parsed.agentNotes.trim() : '',
  };

  return {
    ok: true,
    value: {
      replyText: reply.trim(),
      isComplete: parsed.isConversationOver === true || parsed.isConversationOver === 'true',
      rawHints,
    },
  };
}

export function interpretResponse(response: ModelResponseLike): Result<ModelResult, GatewayError> {
  const blockReason = response.promptFeedback?.blockReason;
  if (blockReason) {
    return { ok: false, error: new GatewayRefusalError(blockReason) };
  }
  const finishReason = response.candidates?.[0]?.finishReason;
  if (finishReason && REFUSAL_FINISH_REASONS.has(finishReason)) {
    return { ok: false, error: new GatewayRefusalError(finishReason) };
  }
  const text = response.text;
  if (!text || text.trim() === '') {
    return { ok: false, error: new GatewayParseError('Model returned no text') };
  }
  return parseModelOutput(text);
}

export class GeminiGateway implements ModelGateway {
  private readonly retryDelayMs: number;

  constructor(private readonly options: GeminiGatewayOptions) {
    this.retryDelayMs = Math.max(MIN_RETRY_DELAY_MS, options.retryDelayMs ?? MIN_RETRY_DELAY_MS);
  }

  async converse(payload: PromptPayload): Promise<Result<ModelResult, GatewayError>> {
    const params: GenerateContentParameters = {
      model: this.options.model,
      contents: payload.contents,
      config: {
        systemInstruction: payload.systemInstruction,
        temperature: 0.7,
        topP: 1,
        topK: 40,
        maxOutputTokens: 2048,
        responseMimeType: 'application/json',
        responseSchema: RESPONSE_SCHEMA,
        safetySettings: SAFETY_SETTINGS,
      },
    };

    const response = await this.callWithRetry(params);
    if (!response.ok) return response;

    const result = interpretResponse(response.value);
    if (!result.ok) {
      this.options.logger.warn('model output rejected', { kind: result.error.kind, reason: result.error.message });
    }
    return result;
  }

  private async callWithRetry(
    params: GenerateContentParameters,
  ): Promise<Result<ModelResponseLike, GatewayTransientError>> {
    try {
      return { ok: true, value: await this.callOnce(params) };
    } catch (first) {
      const error = toTransient(first);
      if (!error.retryable) return { ok: false, error };
      this.options.logger.warn('model call failed, retrying once', {
        reason: error.message,
        delayMs: this.retryDelayMs,
      });
    }

    await sleep(this.retryDelayMs);
    try {
      return { ok: true, value: await this.callOnce(params) };
    } catch (second) {
      return { ok: false, error: toTransient(second) };
    }
  }

  private async callOnce(params: GenerateContentParameters): Promise<ModelResponseLike> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GatewayTransientError(`Model call timed out after ${timeoutMs}ms`, true));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.options.client.generateContent({
          ...params,
          config: { ...params.config, abortSignal: controller.signal },
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createGeminiGateway(
  apiKey: string,
  model: string,
  timeoutMs: number,
  retryDelayMs: number,
  logger: Logger,
): GeminiGateway {
  const ai = new GoogleGenAI({ apiKey });
  return new GeminiGateway({ client: ai.models, model, timeoutMs, retryDelayMs, logger });
}
