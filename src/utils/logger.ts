// src/utils/logger.ts
// Console-backed logger with `[Namespace] message` prefixes and one process-wide level.

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

let currentLevel: LogLevel = 'warn';

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/** `-v` → info, `-vv` → debug, `-vvv` and more → trace, none → warn. */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return 'warn';
  if (verbosity === 1) return 'info';
  if (verbosity === 2) return 'debug';
  return 'trace';
}

const enabled = (level: LogLevel): boolean =>
  LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);

function write(
  level: LogLevel,
  namespace: string,
  message: string,
  args: unknown[],
): void {
  if (!enabled(level)) return;
  const line = `${new Date().toISOString()} [${namespace}] ${message}`;
  switch (level) {
    case 'error':
      console.error(line, ...args);
      break;
    case 'warn':
      console.warn(line, ...args);
      break;
    case 'info':
      console.info(line, ...args);
      break;
    default:
      console.debug(line, ...args);
  }
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  trace(message: string, ...args: unknown[]): void;
}

export function createLogger(namespace: string): Logger {
  return {
    error: (message, ...args) => write('error', namespace, message, args),
    warn: (message, ...args) => write('warn', namespace, message, args),
    info: (message, ...args) => write('info', namespace, message, args),
    debug: (message, ...args) => write('debug', namespace, message, args),
    trace: (message, ...args) => write('trace', namespace, message, args),
  };
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
