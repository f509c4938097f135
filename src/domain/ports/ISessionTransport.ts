/**
 * Options used when dialing the session endpoint
 */
export interface TransportOpenOptions {
  protocols: string[];
  headers: Record<string, string>;
  handshakeTimeoutMs: number;
}

/**
 * A single open text-frame connection. Owned by ConnectionManager only.
 */
export interface ISessionTransport {
  /**
   * Send one text frame. Rejects with TransportError when the socket is not writable.
   */
  send(frame: string): Promise<void>;

  /**
   * Wait for the next inbound text frame.
   * Rejects with TransportError on read deadline, socket error or close.
   */
  receive(timeoutMs: number): Promise<string>;

  /**
   * Close gracefully. Pending and future receives reject.
   */
  close(code: number, reason: string): void;
}

export interface ISessionTransportFactory {
  open(url: string, options: TransportOpenOptions): Promise<ISessionTransport>;
}
