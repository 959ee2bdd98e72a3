/** Severity levels understood by the console logger. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Logger interface injected into discovery operations. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

/** Logger that drops every message. */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

/**
 * Create a logger writing to the console.
 *
 *   const log = createConsoleLogger({ level: 'info', prefix: 'skills' });
 *   log.warn('Skill "deploy" failed to load');
 *   // → [WARN] [skills] Skill "deploy" failed to load
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info';
  const prefix = options.prefix ? ` [${options.prefix}]` : '';
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return {
    debug: (msg: string, ...args: unknown[]) => {
      if (enabled('debug')) console.debug(`[DEBUG]${prefix} ${msg}`, ...args);
    },
    info: (msg: string, ...args: unknown[]) => {
      if (enabled('info')) console.log(`[INFO]${prefix} ${msg}`, ...args);
    },
    warn: (msg: string, ...args: unknown[]) => {
      if (enabled('warn')) console.warn(`[WARN]${prefix} ${msg}`, ...args);
    },
    error: (msg: string, ...args: unknown[]) => {
      if (enabled('error')) console.error(`[ERROR]${prefix} ${msg}`, ...args);
    },
  };
}
