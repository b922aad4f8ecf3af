export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minLevel: LogLevel = 'info';

/** Sets the lowest level that is written. Lines below it are dropped. */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...data,
  });

  if (level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

/**
 * Structured JSON-lines logger with debug/info/warn/error levels.
 * Errors go to stderr, everything else to stdout.
 */
export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    write('debug', message, data);
  },

  info(message: string, data?: Record<string, unknown>): void {
    write('info', message, data);
  },

  warn(message: string, data?: Record<string, unknown>): void {
    write('warn', message, data);
  },

  error(message: string, data?: Record<string, unknown>): void {
    write('error', message, data);
  },
};

/** Renders an unknown thrown value as a log-friendly message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
