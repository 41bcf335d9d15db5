import pino, { type Logger } from 'pino';
import type { LoggingConfig } from '@tempora/shared';

export type { Logger };

/**
 * Root logger. Writes to stderr so CLI output on stdout stays machine-readable.
 */
export function createLogger(config: LoggingConfig, name = 'tempora'): Logger {
  if (config.pretty) {
    return pino({
      name,
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: 2, colorize: true } },
    });
  }
  return pino({ name, level: config.level }, pino.destination(2));
}

/** Logger that drops everything; the default for library callers that pass none. */
export function silentLogger(): Logger {
  return pino({ enabled: false });
}
