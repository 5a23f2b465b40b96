/**
 * JSON-line console logger.
 *
 *   const log = createLogger("engine");
 *   log.info("reply sent", { sessionId: "s-1" });
 *   // => {"ts":"...","level":"info","service":"engine","msg":"reply sent","extra":{"sessionId":"s-1"}}
 *
 * LOG_LEVEL=debug|info|warn|error picks the floor (default info); DEBUG=1 means debug.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function getMinLevel(): LogLevel {
  if (process.env.DEBUG === '1') return 'debug';
  const raw = process.env.LOG_LEVEL;
  if (raw && isLogLevel(raw)) return raw;
  return 'info';
}

function emit(level: LogLevel, service: string, msg: string, extra?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getMinLevel()]) return;
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    service,
    msg,
  };
  if (extra !== undefined && Object.keys(extra).length > 0) {
    entry.extra = extra;
  }
  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(service: string): Logger {
  return {
    debug: (msg, extra) => emit('debug', service, msg, extra),
    info: (msg, extra) => emit('info', service, msg, extra),
    warn: (msg, extra) => emit('warn', service, msg, extra),
    error: (msg, extra) => emit('error', service, msg, extra),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
