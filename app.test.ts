import { once } from 'node:events';
import type { Server } from 'node:http';
import { afterEach, describe, expect, test } from 'vitest';
import { createApp, parseHoneypotRequest } from './app.js';
import { silentLogger } from './lib/logger.js';
import { ConversationEngine } from './services/conversationEngine.js';
import { SessionStore } from './services/sessionStore.js';
import { FakeDispatcher, FakeGateway, modelReply } from './testing/fakes.js';

const AUTH = 'test-secret';
let server: Server | undefined;

afterEach(async () => {
  if (server) {
    const closed = once(server, 'close');
    server.close();
    server.closeAllConnections();
    await closed;
    server = undefined;
  }
});

async function startApp(gateway = new FakeGateway(modelReply('Hello? Who is this?')), rateLimitMax = 20) {
  const store = new SessionStore();
  const engine = new ConversationEngine({ store, gateway, dispatcher: new FakeDispatcher(), logger: silentLogger });
  const app = createApp({
    engine,
    store,
    logger: silentLogger,
    authKey: AUTH,
    rateLimitMax,
    rateLimitWindowMs: 60000,
  });
  server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  return `http://127.0.0.1:${address.port}`;
}

function post(base: string, body: unknown, key: string | undefined = AUTH) {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (key !== undefined) headers['x-api-key'] = key;
  return fetch(`${base}/honeypot`, {
    method: 'POST',
    headers,
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

const VALID = {
  sessionId: 's-1',
  message: { sender: 'scammer', text: 'Your account is blocked. Pay to scammer@upi', timestamp: 1767225600000 },
  conversationHistory: [],
  metadata: { channel: 'SMS', language: 'English', locale: 'IN' },
};

describe('POST /honeypot', () => {
  test('answers with the agent reply', async () => {
    const base = await startApp();

    const res = await post(base, VALID);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'success',
      reply: 'Hello? Who is this?',
      sessionId: 's-1',
      sessionStatus: 'ACTIVE',
      conversationIsOver: false,
    });
  });

  test('rejects a missing or wrong key', async () => {
    const base = await startApp();

    expect((await post(base, VALID, undefined)).status).toBe(401);
    expect((await post(base, VALID, 'wrong')).status).toBe(401);
  });

  test('lists validation problems', async () => {
    const base = await startApp();

    const res = await post(base, { message: 'hi', conversationHistory: 'nope' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      status: 'error',
      message: 'Validation failed',
      details: ['Missing sessionId', 'conversationHistory must be an array'],
    });
  });

  test('rejects malformed JSON', async () => {
    const base = await startApp();

    const res = await post(base, '{"sessionId": ');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ status: 'error', message: 'Invalid JSON body' });
  });

  test('answers 409 once the session has been reported', async () => {
    const base = await startApp(new FakeGateway(modelReply('Going to the office now.', true)));

    const first = await post(base, VALID);
    const second = await post(base, VALID);

    expect(await first.json()).toMatchObject({ sessionStatus: 'REPORTED' });
    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({ status: 'error', message: 'Session s-1 has already been reported' });
  });

  test('rate limits a noisy client', async () => {
    const base = await startApp(undefined, 2);

    await post(base, VALID);
    await post(base, VALID);
    const third = await post(base, VALID);

    expect(third.status).toBe(429);
  });
});

describe('GET /health', () => {
  test('reports session counts', async () => {
    const base = await startApp();
    await post(base, VALID);

    const res = await fetch(`${base}/health`);
    const body: unknown = await res.json();

    expect(body).toMatchObject({
      status: 'ok',
      sessions: 1,
      sessions_reported: 0,
      sessions_pending_report: 0,
    });
    expect(body).not.toHaveProperty('api_configured');
  });
});

describe('parseHoneypotRequest', () => {
  const NOW = new Date('2026-03-01T10:00:00.000Z');

  test('maps platform senders and epoch timestamps', () => {
    const result = parseHoneypotRequest(
      {
        sessionId: ' s-1 ',
        message: { sender: 'scammer', text: 'hi', timestamp: 1767225600000 },
        conversationHistory: [{ sender: 'user', text: 'hello', timestamp: '2026-01-01T00:00:00Z' }],
      },
      NOW,
    );

    expect(result).toEqual({
      ok: true,
      value: {
        sessionId: 's-1',
        message: { sender: 'counterparty', text: 'hi', timestamp: '2026-01-01T00:00:00.000Z' },
        conversationHistory: [{ sender: 'user', text: 'hello', timestamp: '2026-01-01T00:00:00.000Z' }],
        metadata: undefined,
      },
    });
  });

  test('accepts a bare string message', () => {
    const result = parseHoneypotRequest({ sessionId: 's-1', message: 'pay now' }, NOW);

    expect(result.ok && result.value.message).toEqual({
      sender: 'counterparty',
      text: 'pay now',
      timestamp: '2026-03-01T10:00:00.000Z',
    });
  });

  test('rejects a message without text', () => {
    expect(parseHoneypotRequest({ sessionId: 's-1', message: { sender: 'scammer' } }, NOW)).toEqual({
      ok: false,
      error: ['message must be a string or an object with a text field'],
    });
  });
});
