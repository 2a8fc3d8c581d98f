import pino, { type Logger } from 'pino';

// stdout belongs to the menu; the CLI raises or lowers the level from config
export const logger: Logger = pino({ name: 'golden-min', level: 'warn' }, pino.destination(2));

/**
 * Children copy the root level when created, so create them after the
 * level is set.
 */
export function childLogger(module: string): Logger {
  return logger.child({ module });
}
