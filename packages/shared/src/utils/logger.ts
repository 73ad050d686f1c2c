import { formatDate, formatTime } from './date';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
  debug: (message: string) => void;
}

// One line per entry: UTC timestamp, level, source
export function formatLog(level: LogLevel, source: string, message: string, now = new Date()): string {
  const timestamp = `${formatDate(now)} ${formatTime(now)}`;
  return `[${timestamp}] [${level.toUpperCase()}] [${source}] ${message}`;
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.stack ?? error.message;
  return String(error);
}

// Each module names its own source
export function createLogger(source: string): Logger {
  return {
    info: (message: string) => {
      console.log(formatLog('info', source, message));
    },
    warn: (message: string) => {
      console.warn(formatLog('warn', source, message));
    },
    error: (message: string, error?: unknown) => {
      const suffix = error === undefined ? '' : `\n${describeError(error)}`;
      console.error(`${formatLog('error', source, message)}${suffix}`);
    },
    debug: (message: string) => {
      if (process.env.NODE_ENV !== 'production') {
        console.debug(formatLog('debug', source, message));
      }
    },
  };
}
