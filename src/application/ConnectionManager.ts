import type {
  ConnectionState,
  ConnectionStateHandler,
  IConnectionManager,
  PingRecord,
} from "../domain/ports/IConnectionManager.js";
import type { IEndpointCache } from "../domain/ports/IEndpointCache.js";
import type { ILogger } from "../domain/ports/ILogger.js";
import type {
  ISessionTransport,
  ISessionTransportFactory,
} from "../domain/ports/ISessionTransport.js";
import {
  decodeInboundMessage,
  encodePing,
  type InboundMessage,
} from "../domain/entities/SessionMessage.js";
import { ProtocolError, TransportError } from "../domain/errors.js";

/** RFC 6455 normal closure */
const NORMAL_CLOSURE = 1000;

export interface ConnectionManagerConfig {
  token: string;
  cookie: string;
  /** Base URL of the default endpoint; the token is appended as a query parameter */
  endpointUrl: string;
  /** Try the server-supplied reconnect hint before the default endpoint */
  preferCachedEndpoint?: boolean;
  subprotocols?: string[];
  handshakeTimeoutMs?: number;
  keepaliveIntervalMs?: number;
  refreshIntervalMs?: number;
  readTimeoutMs?: number;
}

type RetireReason = "refresh" | "disconnect" | "failure";

/**
 * One connection epoch: the transport plus the tasks serving it.
 * Tasks hold a reference to their generation and stop acting once it is
 * no longer current.
 */
interface Generation {
  readonly id: number;
  readonly transport: ISessionTransport;
  readonly endpoint: string;
  nextPingId: number;
  lastPing: PingRecord | null;
  retiredBy: RetireReason | null;
  tasksStarted: boolean;
  keepaliveTimer: NodeJS.Timeout | null;
  refreshTimer: NodeJS.Timeout | null;
}

/**
 * Default session endpoint for a token
 */
export function buildDefaultEndpoint(baseUrl: string, token: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set("token", token);
  url.searchParams.set("sync_desync", "1");
  url.searchParams.set("slack_client", "desktop");
  url.searchParams.set("no_query_on_subscribe", "1");
  url.searchParams.set("flannel", "3");
  url.searchParams.set("lazy_channels", "1");
  url.searchParams.set("batch_presence_aware", "1");
  return url.toString();
}

/**
 * Host part of an endpoint for logs; the query carries credentials
 */
function describeEndpoint(endpoint: string): string {
  try {
    return new URL(endpoint).host;
  } catch {
    return "<invalid url>";
  }
}

/**
 * Single authority over the session transport.
 *
 * disconnected → connecting → connected → disconnected. Every successful
 * connect starts a new generation; the keepalive and forced-refresh tasks
 * are bound to it and exit as soon as it is retired.
 */
export class ConnectionManager implements IConnectionManager {
  private readonly logger: ILogger;
  private readonly settings: Required<ConnectionManagerConfig>;
  private readonly stateHandlers = new Set<ConnectionStateHandler>();

  private _state: ConnectionState = "disconnected";
  private generation: Generation | null = null;
  private generationCounter = 0;
  private connecting: Promise<void> | null = null;
  /** Bumped by disconnect() so an in-flight handshake is abandoned */
  private connectEpoch = 0;
  private closedByCaller = false;
  private reading = false;

  constructor(
    config: ConnectionManagerConfig,
    private readonly transports: ISessionTransportFactory,
    private readonly cache: IEndpointCache,
    logger: ILogger
  ) {
    this.settings = {
      preferCachedEndpoint: true,
      subprotocols: ["slack"],
      handshakeTimeoutMs: 10_000,
      keepaliveIntervalMs: 5_000,
      refreshIntervalMs: 5 * 60_000,
      readTimeoutMs: 30_000,
      ...config,
    };
    this.logger = logger.child({ component: "ConnectionManager" });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get generationId(): number | null {
    return this.generation?.id ?? null;
  }

  get lastPing(): PingRecord | null {
    return this.generation?.lastPing ?? null;
  }

  isConnected(): boolean {
    return this._state === "connected";
  }

  onStateChange(handler: ConnectionStateHandler): void {
    this.stateHandlers.add(handler);
  }

  offStateChange(handler: ConnectionStateHandler): void {
    this.stateHandlers.delete(handler);
  }

  private setState(state: ConnectionState): void {
    const previous = this._state;
    this._state = state;
    if (previous !== state) {
      this.logger.debug("Connection state changed", { from: previous, to: state });
      this.stateHandlers.forEach((handler) => handler(state));
    }
  }

  connect(): Promise<void> {
    this.closedByCaller = false;
    if (this._state === "connected") {
      this.logger.debug("Already connected");
      return Promise.resolve();
    }
    if (this.connecting) {
      return this.connecting;
    }

    const attempt = this.dial().finally(() => {
      if (this.connecting === attempt) {
        this.connecting = null;
      }
    });
    this.connecting = attempt;
    return attempt;
  }

  private async dial(): Promise<void> {
    const epoch = this.connectEpoch;
    this.setState("connecting");

    let opened: { transport: ISessionTransport; endpoint: string };
    try {
      opened = await this.openFirstReachable();
    } catch (error) {
      if (epoch === this.connectEpoch) {
        this.setState("disconnected");
      }
      throw error;
    }

    if (epoch !== this.connectEpoch) {
      opened.transport.close(NORMAL_CLOSURE, "connect abandoned");
      throw new TransportError("Connect abandoned: disconnect requested during handshake");
    }

    this.startGeneration(opened.transport, opened.endpoint);
  }

  private async openFirstReachable(): Promise<{
    transport: ISessionTransport;
    endpoint: string;
  }> {
    const cached = this.settings.preferCachedEndpoint ? this.cache.get() : "";
    if (cached) {
      try {
        return { transport: await this.open(cached), endpoint: cached };
      } catch (error) {
        this.logger.warn("Cached endpoint unreachable, falling back to default", {
          endpoint: describeEndpoint(cached),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const fallback = buildDefaultEndpoint(this.settings.endpointUrl, this.settings.token);
    return { transport: await this.open(fallback), endpoint: fallback };
  }

  private async open(endpoint: string): Promise<ISessionTransport> {
    this.logger.info("Connecting to session endpoint", {
      endpoint: describeEndpoint(endpoint),
    });
    try {
      return await this.transports.open(endpoint, {
        protocols: this.settings.subprotocols,
        headers: { Cookie: this.settings.cookie },
        handshakeTimeoutMs: this.settings.handshakeTimeoutMs,
      });
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError("Failed to open session transport", { cause: error });
    }
  }

  private startGeneration(transport: ISessionTransport, endpoint: string): void {
    const generation: Generation = {
      id: ++this.generationCounter,
      transport,
      endpoint,
      nextPingId: 1,
      lastPing: null,
      retiredBy: null,
      tasksStarted: false,
      keepaliveTimer: null,
      refreshTimer: null,
    };
    this.generation = generation;
    this.setState("connected");
    this.logger.info("Session connected", {
      generation: generation.id,
      endpoint: describeEndpoint(endpoint),
    });
  }

  private isCurrent(generation: Generation): boolean {
    return this.generation === generation && generation.retiredBy === null;
  }

  /**
   * Stop the generation's tasks and release its transport. Idempotent.
   */
  private retire(generation: Generation, reason: RetireReason): void {
    if (generation.retiredBy !== null) return;
    generation.retiredBy = reason;

    this.stopKeepalive(generation);
    if (generation.refreshTimer) {
      clearTimeout(generation.refreshTimer);
      generation.refreshTimer = null;
    }
    generation.transport.close(NORMAL_CLOSURE, reason);

    if (this.generation === generation) {
      this.generation = null;
      this.setState("disconnected");
    }
    this.logger.debug("Generation retired", { generation: generation.id, reason });
  }

  async readLoop(): Promise<void> {
    if (this.reading) {
      throw new Error("readLoop is already running");
    }
    let generation = this.generation;
    if (!generation) {
      throw new TransportError("Cannot read: session is not connected");
    }

    this.reading = true;
    try {
      for (;;) {
        this.startBackgroundTasks(generation);
        await this.pump(generation);

        // pump only returns once the generation was retired on purpose
        if (generation.retiredBy !== "refresh") {
          return;
        }
        if (this.connecting) {
          try {
            await this.connecting;
          } catch (error) {
            if (this.closedByCaller) return;
            throw error;
          }
        }

        const next = this.generation;
        if (!next) {
          if (this.closedByCaller) return;
          throw new TransportError("Session refresh did not produce a new connection");
        }
        generation = next;
      }
    } finally {
      this.reading = false;
    }
  }

  private async pump(generation: Generation): Promise<void> {
    while (generation.retiredBy === null) {
      let frame: string;
      try {
        frame = await generation.transport.receive(this.settings.readTimeoutMs);
      } catch (error) {
        if (generation.retiredBy !== null) {
          return;
        }
        this.retire(generation, "failure");
        this.logger.warn("Session read failed", {
          generation: generation.id,
          error: error instanceof Error ? error.message : String(error),
        });
        if (error instanceof TransportError) {
          throw error;
        }
        throw new TransportError("Session read failed", { cause: error });
      }

      if (generation.retiredBy !== null) {
        return;
      }
      this.handleFrame(generation, frame);
    }
  }

  private startBackgroundTasks(generation: Generation): void {
    if (generation.tasksStarted || !this.isCurrent(generation)) return;
    generation.tasksStarted = true;

    generation.keepaliveTimer = setInterval(
      () => this.keepalive(generation),
      this.settings.keepaliveIntervalMs
    );
    generation.refreshTimer = setTimeout(() => {
      generation.refreshTimer = null;
      this.refresh(generation).catch((error) => {
        // readLoop surfaces the failure to its caller
        this.logger.debug("Session refresh failed", {
          generation: generation.id,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.settings.refreshIntervalMs);
  }

  private keepalive(generation: Generation): void {
    if (!this.isCurrent(generation)) {
      this.stopKeepalive(generation);
      return;
    }

    const ping: PingRecord = { id: generation.nextPingId, sentAt: new Date() };
    generation.lastPing = ping;
    generation.nextPingId += 1;

    generation.transport.send(encodePing(ping.id)).then(
      () => {
        this.logger.trace("Ping sent", { generation: generation.id, id: ping.id });
      },
      (error: unknown) => {
        // The read path notices the broken transport and reports the failure
        this.stopKeepalive(generation);
        if (this.isCurrent(generation)) {
          this.logger.warn("Keepalive send failed, stopping keepalive", {
            generation: generation.id,
            id: ping.id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    );
  }

  private stopKeepalive(generation: Generation): void {
    if (generation.keepaliveTimer) {
      clearInterval(generation.keepaliveTimer);
      generation.keepaliveTimer = null;
    }
  }

  private async refresh(generation: Generation): Promise<void> {
    if (!this.isCurrent(generation)) return;

    this.logger.info("Refreshing session", { generation: generation.id });
    this.retire(generation, "refresh");
    await this.connect();
  }

  private handleFrame(generation: Generation, frame: string): void {
    let message: InboundMessage;
    try {
      message = decodeInboundMessage(frame);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.logger.info("Received unclassified message", {
        reason: error.message,
        frame: frame.slice(0, 500),
      });
      return;
    }

    switch (message.kind) {
      case "pong":
        this.handlePong(generation, message.replyTo);
        break;

      case "reconnect_url":
        this.handleReconnectHint(message.url);
        break;

      case "hello":
        this.logger.info("Session established", {
          generation: generation.id,
          region: message.region,
          hostId: message.hostId,
        });
        break;

      case "other":
        this.logger.info("Received message", {
          type: message.type,
          frame: frame.slice(0, 500),
        });
        break;
    }
  }

  private handlePong(generation: Generation, replyTo: number): void {
    const expected = generation.lastPing;
    if (expected && expected.id === replyTo) {
      this.logger.debug("Pong received", {
        id: replyTo,
        roundTripMs: Date.now() - expected.sentAt.getTime(),
      });
      return;
    }
    this.logger.warn("Pong id mismatch", {
      expected: expected?.id ?? null,
      received: replyTo,
    });
  }

  private handleReconnectHint(url: string): void {
    try {
      this.cache.set(url);
      this.logger.info("Stored reconnect endpoint", { endpoint: describeEndpoint(url) });
    } catch (error) {
      this.logger.error("Failed to persist reconnect endpoint, keeping it in memory", error);
    }
  }

  async disconnect(): Promise<void> {
    this.closedByCaller = true;
    this.connectEpoch++;

    const generation = this.generation;
    if (generation) {
      this.logger.info("Disconnecting session", { generation: generation.id });
      this.retire(generation, "disconnect");
      return;
    }
    if (this._state !== "disconnected") {
      this.setState("disconnected");
    }
  }
}
