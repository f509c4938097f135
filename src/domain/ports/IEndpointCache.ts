/**
 * Last reconnect endpoint handed out by the server
 */
export interface CachedEndpoint {
  url: string;
}

/**
 * Port for the durable reconnect endpoint store
 */
export interface IEndpointCache {
  /**
   * Read the persisted record into memory. A missing record is `null`, not an error.
   */
  load(): CachedEndpoint | null;

  /**
   * Current in-memory value, empty string when nothing is cached
   */
  get(): string;

  /**
   * Replace the value and persist it synchronously.
   * Throws PersistenceError when the write fails; the in-memory value is kept.
   */
  set(url: string): void;
}
