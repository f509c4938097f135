import type { IConnectionManager } from "../domain/ports/IConnectionManager.js";
import type { ILogger } from "../domain/ports/ILogger.js";
import type { ScheduleGate } from "./ScheduleGate.js";

export interface SupervisorOptions {
  /** Upper bound of a sleep outside the active window (ms) */
  idlePollIntervalMs?: number;
  /** Wait after a failed connect or read loop (ms) */
  retryBackoffMs?: number;
  now?: () => Date;
}

/**
 * Top-level control loop: keeps the session open while the schedule is
 * active and closed otherwise, retrying transport failures after a fixed
 * backoff.
 */
export class Supervisor {
  private readonly logger: ILogger;
  private readonly idlePollIntervalMs: number;
  private readonly retryBackoffMs: number;
  private readonly now: () => Date;

  private running = false;
  private stopping = false;
  private wakeUp: (() => void) | null = null;

  constructor(
    private readonly gate: ScheduleGate,
    private readonly connection: IConnectionManager,
    logger: ILogger,
    options: SupervisorOptions = {}
  ) {
    this.logger = logger.child({ component: "Supervisor" });
    this.idlePollIntervalMs = options.idlePollIntervalMs ?? 60_000;
    this.retryBackoffMs = options.retryBackoffMs ?? 5_000;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Resolves once `stop()` has been called and the current step finished
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error("Supervisor is already running");
    }
    this.running = true;
    this.stopping = false;
    this.logger.info("Supervisor started");

    try {
      while (!this.stopping) {
        await this.tick();
      }
    } finally {
      this.running = false;
      this.logger.info("Supervisor stopped");
    }
  }

  async stop(): Promise<void> {
    this.stopping = true;
    this.wakeUp?.();
    await this.connection.disconnect();
  }

  private async tick(): Promise<void> {
    const now = this.now();

    if (!this.gate.isActive(now)) {
      await this.idle(now);
      return;
    }

    if (!this.connection.isConnected()) {
      this.logger.info("Inside active window, connecting");
      try {
        await this.connection.connect();
      } catch (error) {
        if (this.stopping) return;
        this.logger.error("Failed to connect, will retry", error, {
          retryInMs: this.retryBackoffMs,
        });
        await this.sleep(this.retryBackoffMs);
        return;
      }
    }

    if (this.stopping) return;
    await this.drive(now);
  }

  private async idle(now: Date): Promise<void> {
    if (this.connection.isConnected()) {
      this.logger.info("Outside active window, disconnecting");
      await this.connection.disconnect();
    }

    const next = this.gate.nextTransition(now);
    const untilNext = Math.max(next.getTime() - now.getTime(), 0);
    this.logger.info("Outside active window", {
      nextActiveAt: this.gate.format(next),
    });
    // +1s because the window start itself is not yet active
    await this.sleep(Math.min(this.idlePollIntervalMs, untilNext + 1_000));
  }

  /**
   * Block on the read loop until it fails, or until the window closes and
   * the session is disconnected
   */
  private async drive(now: Date): Promise<void> {
    const windowEnd = this.gate.nextTransition(now);
    const closeTimer = setTimeout(() => {
      this.logger.info("Active window ended, disconnecting", {
        nextActiveAt: this.gate.format(this.gate.nextTransition(this.now())),
      });
      this.connection.disconnect().catch((error) => {
        this.logger.error("Failed to disconnect at window end", error);
      });
    }, Math.max(windowEnd.getTime() - now.getTime(), 0));

    let failure: unknown = null;
    try {
      await this.connection.readLoop();
    } catch (error) {
      failure = error;
    } finally {
      clearTimeout(closeTimer);
    }

    if (failure === null || this.stopping) {
      return;
    }
    this.logger.error("Session read loop failed, reconnecting", failure, {
      retryInMs: this.retryBackoffMs,
    });
    await this.sleep(this.retryBackoffMs);
  }

  private sleep(ms: number): Promise<void> {
    if (this.stopping) return Promise.resolve();

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, ms);
      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
    });
  }
}
