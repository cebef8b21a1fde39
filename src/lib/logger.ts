/**
 * Scoped logger
 *
 * Writes `[time] LEVEL [scope] message {context}` lines to stderr.
 * The threshold comes from LOG_LEVEL and is read on every call so tests
 * and the entry point can change it at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function currentThreshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';
  return LEVEL_WEIGHT[isLogLevel(configured) ? configured : 'info'];
}

/**
 * Create a logger tagged with a module scope
 */
export function createLogger(scope: string): Logger {
  function write(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LEVEL_WEIGHT[level] < currentThreshold()) {
      return;
    }
    const suffix =
      context !== undefined && Object.keys(context).length > 0
        ? ` ${JSON.stringify(context)}`
        : '';
    console.error(
      `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} [${scope}] ${message}${suffix}`
    );
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
