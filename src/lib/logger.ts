import type { LogLevel } from '../types';

const PREFIX = '[reader]';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return data.message;
  if (typeof data === 'object') {
    try {
      return JSON.stringify(data);
    } catch {
      return String(data);
    }
  }
  return String(data);
}

function log(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, data?: unknown) {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const prefix = `${PREFIX}[${scope}]`;
  const formatted = data !== undefined ? `${message} ${formatData(data)}` : message;

  switch (level) {
    case 'debug':
      console.debug(`${prefix} ${formatted}`);
      break;
    case 'info':
      console.log(`${prefix} ${formatted}`);
      break;
    case 'warn':
      console.warn(`${prefix} ${formatted}`);
      break;
    case 'error':
      console.error(`${prefix} ${formatted}`);
      break;
  }
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => log('debug', scope, message, data),
    info: (message, data) => log('info', scope, message, data),
    warn: (message, data) => log('warn', scope, message, data),
    error: (message, data) => log('error', scope, message, data),
  };
}
