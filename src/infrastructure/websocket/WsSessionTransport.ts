import WebSocket from 'ws';
import type {
  ISessionTransport,
  ISessionTransportFactory,
  TransportOpenOptions,
} from '../../domain/ports/ISessionTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { TransportError } from '../../domain/errors.js';

interface PendingReceive {
  resolve: (frame: string) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

/**
 * Pull-style wrapper over a `ws` socket: inbound frames are queued until
 * `receive()` asks for them
 */
export class WsSessionTransport implements ISessionTransport {
  private readonly inbox: string[] = [];
  private pending: PendingReceive | null = null;
  private failure: TransportError | null = null;

  constructor(
    private readonly socket: WebSocket,
    private readonly logger: ILogger
  ) {
    this.socket.on('message', (data, isBinary) => {
      if (isBinary) {
        this.logger.debug('Ignoring binary frame');
        return;
      }
      this.deliver(data.toString());
    });

    this.socket.on('close', (code, reason) => {
      this.logger.debug('WebSocket closed', { code, reason: reason.toString() });
      this.fail(new TransportError(`Connection closed (${code})`));
    });

    this.socket.on('error', (error) => {
      this.logger.debug('WebSocket error', { error: error.message });
      this.fail(new TransportError(`WebSocket error: ${error.message}`, { cause: error }));
    });
  }

  private deliver(frame: string): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      clearTimeout(pending.timeout);
      pending.resolve(frame);
    } else {
      this.inbox.push(frame);
    }
  }

  private fail(error: TransportError): void {
    this.failure ??= error;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      clearTimeout(pending.timeout);
      pending.reject(this.failure);
    }
  }

  receive(timeoutMs: number): Promise<string> {
    const queued = this.inbox.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.pending) {
      return Promise.reject(new TransportError('A receive is already pending'));
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending = null;
        reject(new TransportError(`Read deadline of ${timeoutMs}ms exceeded`));
      }, timeoutMs);
      this.pending = { resolve, reject, timeout };
    });
  }

  send(frame: string): Promise<void> {
    if (this.failure || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('WebSocket is not connected'));
    }

    return new Promise((resolve, reject) => {
      this.socket.send(frame, (error) => {
        if (error) {
          reject(new TransportError(`Failed to send frame: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  close(code: number, reason: string): void {
    this.fail(new TransportError(`Connection closed locally (${reason})`));
    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(code, reason);
    }
  }
}

/**
 * Dials session endpoints with the `ws` client
 */
export class WsSessionTransportFactory implements ISessionTransportFactory {
  constructor(private readonly logger: ILogger) {}

  open(url: string, options: TransportOpenOptions): Promise<ISessionTransport> {
    return new Promise((resolve, reject) => {
      let socket: WebSocket;
      try {
        socket = new WebSocket(url, options.protocols, {
          headers: options.headers,
          handshakeTimeout: options.handshakeTimeoutMs,
          perMessageDeflate: true,
        });
      } catch (error) {
        reject(new TransportError('Failed to create WebSocket', { cause: error }));
        return;
      }

      // Wrap before the handshake completes so no early frame is lost
      const transport = new WsSessionTransport(socket, this.logger);

      const onOpen = (): void => {
        socket.off('error', onError);
        this.logger.debug('WebSocket connection opened', { protocol: socket.protocol });
        resolve(transport);
      };
      const onError = (error: Error): void => {
        socket.off('open', onOpen);
        reject(new TransportError(`Handshake failed: ${error.message}`, { cause: error }));
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
    });
  }
}
