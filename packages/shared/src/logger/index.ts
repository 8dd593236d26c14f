/**
 * Level-gated console logger.
 * The initial level comes from SONAR_LOG_LEVEL, falling back to 'warn'.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function parseLogLevel(value?: string): LogLevel | null {
  if (!value) return null;
  const normalized = value.toLowerCase();
  switch (normalized) {
    case 'silent':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
      return normalized;
    default:
      return null;
  }
}

let currentLevel: LogLevel = parseLogLevel(process.env.SONAR_LOG_LEVEL) ?? 'warn';

const shouldLog = (level: LogLevel) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];

const logWithLevel =
  (level: Exclude<LogLevel, 'silent'>, method: 'error' | 'warn' | 'info' | 'debug') =>
  (...args: unknown[]) => {
    if (shouldLog(level)) {
      console[method]('[sonar-snr]', ...args);
    }
  };

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export const logger = {
  error: logWithLevel('error', 'error'),
  warn: logWithLevel('warn', 'warn'),
  info: logWithLevel('info', 'info'),
  debug: logWithLevel('debug', 'debug'),
};
