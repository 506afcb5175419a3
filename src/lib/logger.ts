/**
 * Structured console logging, scoped per module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let activeLevel: LogLevel = 'info';
let activeFormat: LogFormat = 'text';

export function configureLogging(options: { level?: LogLevel; format?: LogFormat }): void {
  if (options.level) activeLevel = options.level;
  if (options.format) activeFormat = options.format;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}

function emit(level: LogLevel, scope: string, msg: string, meta?: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) return;

  const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

  if (activeFormat === 'json') {
    write(JSON.stringify({ time: new Date().toISOString(), level, scope, msg, ...meta }));
    return;
  }

  write(`[${level.toUpperCase()}] [${scope}] ${msg}`, meta ? JSON.stringify(meta) : '');
}

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg, meta) => emit('debug', scope, msg, meta),
    info: (msg, meta) => emit('info', scope, msg, meta),
    warn: (msg, meta) => emit('warn', scope, msg, meta),
    error: (msg, error) => emit('error', scope, msg, error === undefined ? undefined : describeError(error)),
  };
}
