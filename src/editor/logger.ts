import { LOG_PREFIX } from './constants';

// Levels, quietest first; warn and error always print.
export type LogLevel = 'off' | 'error' | 'warn' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['off', 'error', 'warn', 'debug', 'trace'];

export type Logger = {
  trace: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Console logger that prefixes every message with [termpix].
export function createLogger(level: LogLevel = 'off'): Logger {
  const withPrefix = (args: unknown[]): unknown[] => {
    const [first, ...rest] = args;
    return typeof first === 'string' ? [`${LOG_PREFIX} ${first}`, ...rest] : [LOG_PREFIX, ...args];
  };

  const isTraceEnabled = level === 'trace';
  const isDebugEnabled = level === 'debug' || isTraceEnabled;

  return {
    trace: (...args: unknown[]) => {
      if (!isTraceEnabled) return;
      console.debug(...withPrefix(args));
    },
    debug: (...args: unknown[]) => {
      if (!isDebugEnabled) return;
      console.debug(...withPrefix(args));
    },
    warn: (...args: unknown[]) => {
      console.warn(...withPrefix(args));
    },
    error: (...args: unknown[]) => {
      console.error(...withPrefix(args));
    }
  };
}
