/**
 * Connection state of the session
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export type ConnectionStateHandler = (state: ConnectionState) => void;

/**
 * Keepalive bookkeeping for the current connection generation
 */
export interface PingRecord {
  id: number;
  sentAt: Date;
}

/**
 * Port consumed by the Supervisor to drive the session
 */
export interface IConnectionManager {
  readonly state: ConnectionState;

  /** Non-blocking snapshot of the state */
  isConnected(): boolean;

  /** Dial the endpoint and start a new generation */
  connect(): Promise<void>;

  /**
   * Serve the current generation until it fails (rejects with TransportError)
   * or is closed by `disconnect()` (resolves).
   */
  readLoop(): Promise<void>;

  /** Idempotent; safe in any state */
  disconnect(): Promise<void>;
}
