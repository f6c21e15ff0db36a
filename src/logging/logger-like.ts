/**
 * Minimal logger surface shared by modules that log. pino's Logger satisfies it,
 * and tests pass plain `vi.fn()` stubs.
 */
export type LoggerLike = {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug?(...args: unknown[]): void;
};
