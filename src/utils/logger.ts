/**
 * Process log for the assistant. One JSON object per line: level, message,
 * the turn it belongs to (session, request, tool, attempt), extra fields, ts.
 *
 * LOG_LEVEL picks the quietest level still printed (DEBUG, INFO, WARN, ERROR);
 * INFO when unset. It is read on every call so tests can change it.
 */

export interface LogContext {
  sessionId?: string;
  requestId?: string;
  tool?: string;
  attempt?: number;
}

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const RANK: Record<Level, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

const SINK: Record<Level, (line: string) => void> = {
  DEBUG: (line) => console.debug(line),
  INFO: (line) => console.log(line),
  WARN: (line) => console.warn(line),
  ERROR: (line) => console.error(line),
};

function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(RANK, value);
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? '').trim().toUpperCase();
  return isLevel(configured) ? RANK[configured] : RANK.INFO;
}

export function formatRecord(level: Level, message: string, ctx: LogContext, extra?: Record<string, unknown>): string {
  return JSON.stringify({ level, message, ...ctx, ...extra, ts: new Date().toISOString() });
}

function write(level: Level, message: string, ctx: LogContext, extra?: Record<string, unknown>): void {
  if (RANK[level] >= threshold()) {
    SINK[level](formatRecord(level, message, ctx, extra));
  }
}

export const logger = {
  debug: (message: string, ctx: LogContext = {}, extra?: Record<string, unknown>) => write('DEBUG', message, ctx, extra),
  info: (message: string, ctx: LogContext = {}, extra?: Record<string, unknown>) => write('INFO', message, ctx, extra),
  warn: (message: string, ctx: LogContext = {}, extra?: Record<string, unknown>) => write('WARN', message, ctx, extra),
  error: (message: string, ctx: LogContext = {}, extra?: Record<string, unknown>) => write('ERROR', message, ctx, extra),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
