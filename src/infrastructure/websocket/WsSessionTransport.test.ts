import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import WebSocket, { WebSocketServer } from 'ws';
import type { IncomingMessage } from 'http';
import { WsSessionTransportFactory } from './WsSessionTransport.js';
import { TransportError } from '../../domain/errors.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { ISessionTransport, TransportOpenOptions } from '../../domain/ports/ISessionTransport.js';

function listeningPort(server: WebSocketServer): number {
  const address = server.address();
  if (typeof address === 'string') {
    throw new Error(`Unexpected server address: ${address}`);
  }
  return address.port;
}

describe('WsSessionTransportFactory', () => {
  let server: WebSocketServer;
  let url: string;
  let logger: ILogger;
  let transport: ISessionTransport | null;
  const options: TransportOpenOptions = {
    protocols: ['slack'],
    headers: { Cookie: 'd=test-cookie' },
    handshakeTimeoutMs: 2_000,
  };

  const nextConnection = (): Promise<[WebSocket, IncomingMessage]> =>
    new Promise((resolve) => {
      server.once('connection', (socket, request) => resolve([socket, request]));
    });

  beforeEach(async () => {
    server = new WebSocketServer({
      port: 0,
      handleProtocols: (protocols) => (protocols.has('slack') ? 'slack' : false),
    });
    await once(server, 'listening');
    url = `ws://127.0.0.1:${listeningPort(server)}/?token=test-token`;
    transport = null;
    logger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
  });

  afterEach(async () => {
    transport?.close(1000, 'test done');
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should open with the sub-protocol and cookie header', async () => {
    const connection = nextConnection();
    transport = await new WsSessionTransportFactory(logger).open(url, options);
    const [socket, request] = await connection;

    expect(socket.protocol).toBe('slack');
    expect(request.headers.cookie).toBe('d=test-cookie');
  });

  it('should exchange text frames in both directions', async () => {
    const connection = nextConnection();
    transport = await new WsSessionTransportFactory(logger).open(url, options);
    const [socket] = await connection;

    const received = once(socket, 'message');
    await transport.send('{"type":"ping","id":1}');
    const [data] = await received;
    expect(String(data)).toBe('{"type":"ping","id":1}');

    socket.send('{"type":"pong","reply_to":1}');
    socket.send('{"type":"hello"}');
    await expect(transport.receive(1_000)).resolves.toBe('{"type":"pong","reply_to":1}');
    await expect(transport.receive(1_000)).resolves.toBe('{"type":"hello"}');
  });

  it('should reject a receive that exceeds the read deadline', async () => {
    transport = await new WsSessionTransportFactory(logger).open(url, options);

    await expect(transport.receive(50)).rejects.toThrow('Read deadline of 50ms exceeded');
  });

  it('should reject a pending receive and send a close frame on close', async () => {
    const connection = nextConnection();
    transport = await new WsSessionTransportFactory(logger).open(url, options);
    const [socket] = await connection;
    const closed = once(socket, 'close');

    const pending = transport.receive(5_000);
    transport.close(1000, 'refresh');

    await expect(pending).rejects.toBeInstanceOf(TransportError);
    const [code] = await closed;
    expect(code).toBe(1000);
    await expect(transport.send('{}')).rejects.toThrow('WebSocket is not connected');
  });

  it('should reject receives once the server goes away', async () => {
    const connection = nextConnection();
    transport = await new WsSessionTransportFactory(logger).open(url, options);
    const [socket] = await connection;

    const pending = transport.receive(5_000);
    socket.close(1001, 'going away');

    await expect(pending).rejects.toThrow('Connection closed (1001)');
  });

  it('should reject with TransportError when nothing listens', async () => {
    const port = listeningPort(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = new WebSocketServer({ noServer: true });

    await expect(
      new WsSessionTransportFactory(logger).open(`ws://127.0.0.1:${port}/`, options)
    ).rejects.toBeInstanceOf(TransportError);
  });
});
