import { randomUUID } from 'node:crypto';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type LogLevel = 'info' | 'warn' | 'error';

export interface Logger {
  info: (message: string, meta?: Record<string, JsonValue>) => void;
  warn: (message: string, meta?: Record<string, JsonValue>) => void;
  error: (message: string, meta?: Record<string, JsonValue>) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  info: 10,
  warn: 20,
  error: 30
};

const emit = (level: LogLevel, message: string, meta?: Record<string, JsonValue>) => {
  const payload = {
    ts: new Date().toISOString(),
    level,
    message,
    ...(meta ? { meta } : {})
  };
  process.stdout.write(`${JSON.stringify(payload)}\n`);
};

export const createJsonLogger = (minLevel: LogLevel = 'info'): Logger => {
  const log = (level: LogLevel) => (message: string, meta?: Record<string, JsonValue>) => {
    if (LEVEL_RANK[level] >= LEVEL_RANK[minLevel]) {
      emit(level, message, meta);
    }
  };

  return {
    info: log('info'),
    warn: log('warn'),
    error: log('error')
  };
};

export const ensureRequestId = (value?: string): string => value && value.length > 0 ? value : randomUUID();

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** Calendar day of `value` in the process time zone (`TZ`), as `YYYY-MM-DD`. */
export const toDateOnly = (value: Date = new Date()): string =>
  `${pad(value.getFullYear(), 4)}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;

/**
 * Half-open `[start, end)` range of `YYYY-MM-DD` strings covering a `YYYY-MM` month.
 */
export const monthRange = (month: string): { start: string; end: string } => {
  const [yearPart, monthPart] = month.split('-');
  const y = Number(yearPart);
  const m = Number(monthPart);
  if (!Number.isInteger(y) || !Number.isInteger(m) || m < 1 || m > 12) {
    throw new Error(`invalid month ${month}`);
  }

  const ny = m === 12 ? y + 1 : y;
  const nm = m === 12 ? 1 : m + 1;
  return {
    start: `${pad(y, 4)}-${pad(m)}-01`,
    end: `${pad(ny, 4)}-${pad(nm)}-01`
  };
};

export * from './workflows.js';
