import { LOG_LEVEL, LogLevel } from '../config/settings';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  isEnabled(level: LogLevel): boolean;
}

/**
 * Console logger bound to a component tag, printed as `[Tag] message`.
 * Messages below `level` are dropped.
 */
export function createLogger(tag: string, level: LogLevel = LOG_LEVEL): Logger {
  const isEnabled = (wanted: LogLevel) => level !== 'silent' && SEVERITY[wanted] >= SEVERITY[level];

  return {
    debug: (message, ...details) => {
      if (isEnabled('debug')) console.debug(`[${tag}] ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (isEnabled('info')) console.log(`[${tag}] ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (isEnabled('warn')) console.warn(`[${tag}] ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (isEnabled('error')) console.error(`[${tag}] ${message}`, ...details);
    },
    isEnabled,
  };
}
