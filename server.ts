import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import { ConversationEngine } from './services/conversationEngine.js';
import { createGeminiGateway } from './services/modelGateway.js';
import { HttpReportDispatcher } from './services/reportDispatcher.js';
import { ReportRetrySweeper } from './services/retrySweeper.js';
import { SessionStore } from './services/sessionStore.js';

dotenv.config();

const log = createLogger('server');
const config = loadConfig();

const store = new SessionStore();
const engine = new ConversationEngine({
  store,
  gateway: createGeminiGateway(
    config.apiKey,
    config.aiModel,
    config.modelTimeoutMs,
    config.modelRetryDelayMs,
    createLogger('gateway'),
  ),
  dispatcher: new HttpReportDispatcher(config.reportUrl, config.reportTimeoutMs, createLogger('report')),
  logger: createLogger('engine'),
  maxMessages: config.maxMessages,
});
const sweeper = new ReportRetrySweeper({
  engine,
  store,
  logger: createLogger('sweeper'),
  intervalMs: config.sweepIntervalMs,
  sessionTtlMs: config.sessionTtlMs,
});

const app = createApp({
  engine,
  store,
  logger: createLogger('http'),
  authKey: config.authKey,
  rateLimitMax: config.rateLimitMax,
  rateLimitWindowMs: config.rateLimitWindowMs,
});

const server = app.listen(config.port, '0.0.0.0', () => {
  log.info('listening', { port: config.port, model: config.aiModel, maxMessages: config.maxMessages });
});
sweeper.start();

function shutdown(signal: string): void {
  log.info('shutting down', { signal });
  server.close();
  sweeper
    .stop()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log.error('shutdown failed', { reason: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
