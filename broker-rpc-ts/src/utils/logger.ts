/**
 * Structured logging
 *
 * Every component takes an optional pino logger; this creates the default
 * one, named after the component, at the level given by LOG_LEVEL.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(name: string, level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({ name, level });
}

/**
 * Logger that discards everything (tests, embedding without output)
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
