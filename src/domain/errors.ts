/**
 * Base class for every error raised by the agent itself
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigError extends AppError {}

/**
 * Startup session check rejected or unreachable. Fatal at startup.
 */
export class AuthError extends AppError {}

/**
 * Dial, handshake, read or write failure on the session transport.
 * Recoverable: the supervisor retries after a backoff.
 */
export class TransportError extends AppError {}

/**
 * Inbound frame that does not match any known message shape.
 */
export class ProtocolError extends AppError {}

/**
 * The endpoint cache file could not be written or read.
 * The in-memory value stays usable.
 */
export class PersistenceError extends AppError {}
