import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { SessionAlreadyReportedError, errorMessage } from './errors.js';
import type { Logger } from './lib/logger.js';
import { createRateLimiter } from './lib/rateLimit.js';
import type { ConversationEngine } from './services/conversationEngine.js';
import type { SessionStore } from './services/sessionStore.js';
import type { Message, Result, Sender, SessionMetadata } from './types.js';

export interface AppDeps {
  engine: ConversationEngine;
  store: SessionStore;
  logger: Logger;
  authKey: string;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

export interface HoneypotRequest {
  sessionId: string;
  message: Message;
  conversationHistory: Message[];
  metadata?: SessionMetadata;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSender(raw: unknown): Sender {
  if (raw === 'user' || raw === 'agent') return raw;
  return 'counterparty';
}

function toTimestamp(raw: unknown, now: Date): string {
  if (typeof raw === 'number' || typeof raw === 'string') {
    const parsed = new Date(raw);
    if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
  }
  return now.toISOString();
}

function toMessage(raw: unknown, now: Date): Message | undefined {
  if (typeof raw === 'string') {
    return { sender: 'counterparty', text: raw, timestamp: now.toISOString() };
  }
  if (!isRecord(raw) || typeof raw.text !== 'string') return undefined;
  return { sender: toSender(raw.sender), text: raw.text, timestamp: toTimestamp(raw.timestamp, now) };
}

function toMetadata(raw: unknown): SessionMetadata | undefined {
  if (!isRecord(raw)) return undefined;
  const metadata: SessionMetadata = {};
  if (typeof raw.channel === 'string') metadata.channel = raw.channel;
  if (typeof raw.language === 'string') metadata.language = raw.language;
  if (typeof raw.locale === 'string') metadata.locale = raw.locale;
  return metadata;
}

/** Checks the inbound body and lifts it into engine types. */
export function parseHoneypotRequest(body: unknown, now: Date = new Date()): Result<HoneypotRequest, string[]> {
  if (!isRecord(body)) return { ok: false, error: ['Body must be a JSON object'] };

  const errors: string[] = [];
  const sessionId = typeof body.sessionId === 'string' ? body.sessionId.trim() : '';
  if (!sessionId) errors.push('Missing sessionId');

  const message = toMessage(body.message, now);
  if (body.message === undefined) errors.push('Missing message');
  else if (!message) errors.push('message must be a string or an object with a text field');

  const history: Message[] = [];
  if (body.conversationHistory !== undefined) {
    if (!Array.isArray(body.conversationHistory)) {
      errors.push('conversationHistory must be an array');
    } else {
      body.conversationHistory.forEach((item: unknown, i: number) => {
        const parsed = toMessage(item, now);
        if (parsed) history.push(parsed);
        else errors.push(`conversationHistory[${i}] has no text`);
      });
    }
  }

  if (errors.length > 0 || !message) return { ok: false, error: errors };
  return {
    ok: true,
    value: { sessionId, message, conversationHistory: history, metadata: toMetadata(body.metadata) },
  };
}

function keyMatches(provided: string | string[] | undefined, expected: string): boolean {
  if (typeof provided !== 'string') return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createApp(deps: AppDeps): express.Express {
  const { engine, store, logger } = deps;
  const limiter = createRateLimiter(deps.rateLimitMax, deps.rateLimitWindowMs);

  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(cors());

  app.post('/honeypot', async (req: Request, res: Response, next: NextFunction) => {
    const clientIp = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    if (limiter.isRateLimited(clientIp)) {
      res.status(429).json({ status: 'error', message: 'Too many requests. Please slow down.' });
      return;
    }

    if (!keyMatches(req.headers['x-api-key'], deps.authKey)) {
      res.status(401).json({ status: 'error', message: 'Unauthorized' });
      return;
    }

    const parsed = parseHoneypotRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ status: 'error', message: 'Validation failed', details: parsed.error });
      return;
    }

    const { sessionId, message, conversationHistory, metadata } = parsed.value;
    try {
      const result = await engine.handle(sessionId, message, { conversationHistory, metadata });
      res.json({
        status: 'success',
        reply: result.replyText,
        sessionId,
        sessionStatus: result.status,
        conversationIsOver: result.status !== 'ACTIVE',
      });
    } catch (err) {
      if (err instanceof SessionAlreadyReportedError) {
        res.status(409).json({ status: 'error', message: err.message });
        return;
      }
      next(err);
    }
  });

  app.get('/health', (_req: Request, res: Response) => {
    const counts = store.countByStatus();
    res.json({
      status: 'ok',
      uptime: Math.floor(process.uptime()),
      sessions: store.size,
      sessions_reported: counts.REPORTED,
      sessions_pending_report: counts.COMPLETE,
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isRecord(err) && err.type === 'entity.parse.failed') {
      res.status(400).json({ status: 'error', message: 'Invalid JSON body' });
      return;
    }
    logger.error('request failed', { reason: errorMessage(err) });
    res.status(500).json({ status: 'error', message: 'Internal error. Please retry.' });
  });

  return app;
}
