export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.ROOTFINDER_LOG_LEVEL?.trim().toLowerCase();
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  // stdout carries the root path (or --json output); logs stay on stderr.
  if (context && Object.keys(context).length > 0) {
    console.error(message, context);
    return;
  }
  console.error(message);
};

export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
