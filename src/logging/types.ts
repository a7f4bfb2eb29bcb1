/**
 * Structured metadata attached to a log line
 */
export type LogMeta = Record<string, unknown>;

/**
 * Logger interface
 *
 * Satisfied by the winston logger; components take it through their
 * constructors so tests can hand in jest.fn() doubles.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
