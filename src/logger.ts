/**
 * Leveled Logger
 *
 * Set log level via PYENV_LOCATOR_LOG_LEVEL or `--verbose`.
 * Every level writes to stderr; stdout carries report output only.
 *
 * Levels: debug < info < warn < error < silent
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Parse a level name, falling back to 'warn'
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'warn';
}

let currentLevel: LogLevel = parseLogLevel(process.env.PYENV_LOCATOR_LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

/**
 * Format a log line with timestamp, level and optional scope
 */
export function formatMessage(level: LogLevel, message: string, scope?: string): string {
  const timestamp = new Date().toISOString();
  const prefix = level.toUpperCase().padEnd(5);
  const where = scope ? ` [${scope}]` : '';
  return `[${timestamp}] [${prefix}]${where} ${message}`;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  isDebugEnabled(): boolean;
}

/**
 * Create a logger whose lines are tagged with `scope`
 */
export function createLogger(scope?: string): Logger {
  const log = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!shouldLog(level)) {
      return;
    }
    const line = formatMessage(level, message, scope);
    if (level === 'warn') {
      console.warn(line, ...args);
    } else {
      console.error(line, ...args);
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    isDebugEnabled: () => shouldLog('debug'),
  };
}

export const logger: Logger = createLogger();

export default logger;
