import pino from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  level: string;
  /** Pretty-print through pino-pretty instead of emitting JSON lines */
  pretty?: boolean;
}

/**
 * Create the process logger. Logs go to stderr; stdout carries only the
 * command result.
 */
export function createLogger(options: LoggerOptions): Logger {
  if (options.pretty) {
    return pino({
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
        },
      },
    });
  }

  return pino({ level: options.level }, pino.destination(2));
}

/** A logger that discards everything */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
