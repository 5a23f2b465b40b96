import { ConfigError } from './errors.js';

export interface AppConfig {
  port: number;
  authKey: string;
  apiKey: string;
  aiModel: string;
  modelTimeoutMs: number;
  modelRetryDelayMs: number;
  reportUrl: string;
  reportTimeoutMs: number;
  maxMessages: number;
  sessionTtlMs: number;
  sweepIntervalMs: number;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

type Env = Record<string, string | undefined>;

function required(env: Env, ...names: string[]): string {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  throw new ConfigError(`${names.join(' or ')} not found. Set it in your environment or .env file.`);
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: positiveInt(env, 'PORT', 8080),
    authKey: required(env, 'AUTH_KEY'),
    apiKey: required(env, 'GEMINI_API_KEY', 'API_KEY'),
    aiModel: env.AI_MODEL?.trim() || 'gemini-2.5-flash',
    modelTimeoutMs: positiveInt(env, 'MODEL_TIMEOUT_MS', 20000),
    modelRetryDelayMs: Math.max(200, positiveInt(env, 'MODEL_RETRY_DELAY_MS', 250)),
    reportUrl: required(env, 'REPORT_URL'),
    reportTimeoutMs: positiveInt(env, 'REPORT_TIMEOUT_MS', 15000),
    maxMessages: positiveInt(env, 'MAX_MESSAGES', 40),
    sessionTtlMs: positiveInt(env, 'SESSION_TTL_MS', 3600000),
    sweepIntervalMs: positiveInt(env, 'SWEEP_INTERVAL_MS', 1800000),
    rateLimitMax: positiveInt(env, 'RATE_LIMIT_MAX', 20),
    rateLimitWindowMs: positiveInt(env, 'RATE_LIMIT_WINDOW_MS', 60000),
  };
}
