/**
 * logger.ts — Leveled logging to stderr.
 *
 * stdout is reserved for command output, so every level goes through
 * console.error.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = SEVERITY[level];
  const write = (messageLevel: Exclude<LogLevel, 'silent'>) => (message: string, meta?: LogMeta) => {
    if (SEVERITY[messageLevel] < threshold) return;
    const line = `[maas] ${messageLevel.toUpperCase()} ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      console.error(line, JSON.stringify(meta));
    } else {
      console.error(line);
    }
  };
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
