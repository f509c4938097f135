import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

/**
 * Errors go under `err` so pino's serializer keeps the stack and `cause`
 * chain; anything else thrown is logged as-is
 */
function errorFields(error: unknown, data?: Record<string, unknown>): Record<string, unknown> {
  return error instanceof Error ? { err: error, ...data } : { error, ...data };
}

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private logger: pino.Logger;

  constructor(options?: {
    name?: string;
    level?: LogLevel;
    pretty?: boolean;
    /** Also append JSON lines to this file */
    file?: string;
  }) {
    const level = options?.level ?? 'info';
    const targets: pino.TransportTargetOptions[] = [
      options?.pretty
        ? {
            target: 'pino-pretty',
            level,
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : { target: 'pino/file', level, options: { destination: 1 } },
    ];
    if (options?.file) {
      targets.push({
        target: 'pino/file',
        level,
        options: { destination: options.file, mkdir: true },
      });
    }

    this.logger = pino(
      {
        name: options?.name ?? 'presence-keeper',
        level,
      },
      pino.transport({ targets })
    );
  }

  trace(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.trace(data, message);
    } else {
      this.logger.trace(message);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.debug(data, message);
    } else {
      this.logger.debug(message);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.info(data, message);
    } else {
      this.logger.info(message);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.warn(data, message);
    } else {
      this.logger.warn(message);
    }
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.logger.error(errorFields(error, data), message);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.logger.fatal(errorFields(error, data), message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    const instance = Object.create(PinoLogger.prototype) as PinoLogger;
    instance.logger = this.logger.child(bindings);
    return instance;
  }

  /**
   * Wait until buffered lines reach their destinations
   */
  flush(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.flush(() => resolve());
    });
  }
}
