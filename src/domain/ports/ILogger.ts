export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Accepted values of LOG_LEVEL, most verbose first */
export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Structured logger handed to every component at construction. Components
 * bind their name once through `child({ component })`; `data` carries the
 * fields of a single line (generation, endpoint host, retry delay).
 *
 * Never pass the session token or cookie in `data`.
 */
export interface ILogger {
  /** Per-frame detail */
  trace(message: string, data?: Record<string, unknown>): void;

  /** State changes, pongs, cache misses */
  debug(message: string, data?: Record<string, unknown>): void;

  /** Connects, disconnects, window transitions */
  info(message: string, data?: Record<string, unknown>): void;

  /** Recoverable trouble: fallback dials, keepalive send failures, pong mismatches */
  warn(message: string, data?: Record<string, unknown>): void;

  /** A failure the supervisor will retry; `error` is logged under `err` when it is an Error */
  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /** Startup failure right before the process exits */
  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  child(bindings: Record<string, unknown>): ILogger;
}
