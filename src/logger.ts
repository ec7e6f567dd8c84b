/**
 * Logging surface used by the session. `console` satisfies it, and so does
 * any structured logger exposing the same two methods.
 */
export type Logger = Pick<Console, 'debug' | 'error'>;

export const defaultLogger: Logger = console;

/** Prefix of every line the session logs. */
export const LOG_PREFIX = '[output-session]';
