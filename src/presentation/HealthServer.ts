import { createServer, IncomingMessage, ServerResponse } from 'http';
import type { ConnectionState, PingRecord } from '../domain/ports/IConnectionManager.js';
import type { ILogger } from '../domain/ports/ILogger.js';

export interface HealthServerConfig {
  /** 0 picks an ephemeral port */
  port: number;
  host?: string;
}

export interface StatusInfo {
  uptime: number;
  connection: {
    state: ConnectionState;
    connected: boolean;
    generation: number | null;
    lastPing: PingRecord | null;
  };
  schedule: {
    active: boolean;
    nextTransition: string;
  };
}

/**
 * Read-only HTTP surface for process supervisors (container health checks,
 * systemd watchdogs)
 */
export class HealthServer {
  private server: ReturnType<typeof createServer> | null = null;

  constructor(
    private readonly statusProvider: () => StatusInfo,
    private readonly logger: ILogger,
    private readonly config: HealthServerConfig
  ) {}

  /**
   * Bound port once started
   */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res);
      });
      this.server = server;

      server.once('error', reject);
      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        server.off('error', reject);
        this.logger.info('Health server started', {
          port: this.port,
          host: this.config.host ?? '0.0.0.0',
        });
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Health server stopped');
        resolve();
      });
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const method = req.method ?? 'GET';

    this.logger.debug('HTTP Request', { method, path });

    try {
      if (path === '/health' && method === 'GET') {
        return this.handleHealth(res);
      }

      if (path === '/status' && method === 'GET') {
        return this.sendJson(res, 200, this.statusProvider());
      }

      return this.sendJson(res, 404, { error: 'Not Found' });
    } catch (error) {
      this.logger.error('HTTP Request error', error);
      return this.sendJson(res, 500, {
        error: 'Internal Server Error',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private handleHealth(res: ServerResponse): void {
    const status = this.statusProvider();
    // Outside the window a closed session is the expected state
    const healthy = status.connection.connected || !status.schedule.active;

    this.sendJson(res, healthy ? 200 : 503, {
      status: healthy ? 'healthy' : 'unhealthy',
      connection: status.connection.state,
      windowActive: status.schedule.active,
    });
  }

  private sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }
}
