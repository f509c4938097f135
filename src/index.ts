#!/usr/bin/env node
import { loadConfig, validateConfig } from "./infrastructure/config/Config.js";
import { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
import { FileEndpointCache } from "./infrastructure/cache/FileEndpointCache.js";
import { WsSessionTransportFactory } from "./infrastructure/websocket/WsSessionTransport.js";
import { SessionAuthClient } from "./infrastructure/http/SessionAuthClient.js";
import { ScheduleGate } from "./application/ScheduleGate.js";
import { ConnectionManager } from "./application/ConnectionManager.js";
import { Supervisor } from "./application/Supervisor.js";
import { VerifySession } from "./application/use-cases/VerifySession.js";
import { HealthServer } from "./presentation/HealthServer.js";
import { formatTimeOfDay, WEEKDAYS } from "./domain/entities/ScheduleWindow.js";
import { AuthError, ConfigError } from "./domain/errors.js";

/**
 * Main entry point for presence-keeper
 */
async function main(): Promise<void> {
  // Load and validate configuration
  const config = loadConfig();
  validateConfig(config);

  // Initialize logger
  const logger = new PinoLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    file: config.logging.file,
  });

  // Start time for uptime calculation
  const startTime = Date.now();

  const gate = new ScheduleGate(config.schedule);
  logger.info("presence-keeper starting", {
    workDays: WEEKDAYS.filter((day) => config.schedule.workDays.has(day)),
    workStart: formatTimeOfDay(config.schedule.start),
    workEnd: formatTimeOfDay(config.schedule.end),
    gmtOffset: config.schedule.offsetHours,
  });

  try {
    if (config.session.verifyOnStartup) {
      const authClient = new SessionAuthClient(
        {
          url: config.session.authUrl,
          token: config.session.token,
          cookie: config.session.cookie,
        },
        logger.child({ component: "SessionAuthClient" })
      );
      await new VerifySession(authClient, logger).execute();
    }
  } catch (error) {
    logger.fatal("Failed to verify session", error);
    await logger.flush();
    process.exit(1);
  }

  const cache = new FileEndpointCache(
    config.cache.path,
    logger.child({ component: "EndpointCache" })
  );
  cache.load();

  const connection = new ConnectionManager(
    {
      token: config.session.token,
      cookie: config.session.cookie,
      endpointUrl: config.session.endpointUrl,
      preferCachedEndpoint: config.session.preferCachedEndpoint,
    },
    new WsSessionTransportFactory(logger.child({ component: "WsSessionTransport" })),
    cache,
    logger
  );
  connection.onStateChange((state) => {
    logger.info("Connection state changed", { state });
  });

  const supervisor = new Supervisor(gate, connection, logger, {
    idlePollIntervalMs: config.supervisor.idlePollIntervalMs,
    retryBackoffMs: config.supervisor.retryBackoffMs,
  });

  const healthServer =
    config.health.port === null
      ? null
      : new HealthServer(
          () => {
            const now = new Date();
            return {
              uptime: Math.floor((Date.now() - startTime) / 1000),
              connection: {
                state: connection.state,
                connected: connection.isConnected(),
                generation: connection.generationId,
                lastPing: connection.lastPing,
              },
              schedule: {
                active: gate.isActive(now),
                nextTransition: gate.format(gate.nextTransition(now)),
              },
            };
          },
          logger.child({ component: "HealthServer" }),
          { port: config.health.port }
        );

  // Handle graceful shutdown: run() resolves once the supervisor has stopped
  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...", { signal });
    supervisor.stop().catch((error) => {
      logger.error("Failed to stop supervisor", error);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await healthServer?.start();
  logger.info("Press Ctrl+C to stop.");

  await supervisor.run();

  await healthServer?.stop();
  await logger.flush();
  process.exit(0);
}

// Run the main function
main().catch((error) => {
  if (error instanceof ConfigError || error instanceof AuthError) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error("Unhandled error:", error);
  }
  process.exit(1);
});

// Export for programmatic use
export { HealthServer } from "./presentation/HealthServer.js";
export { FileEndpointCache } from "./infrastructure/cache/FileEndpointCache.js";
export { WsSessionTransport, WsSessionTransportFactory } from "./infrastructure/websocket/WsSessionTransport.js";
export { SessionAuthClient } from "./infrastructure/http/SessionAuthClient.js";
export { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
export { loadConfig, validateConfig } from "./infrastructure/config/Config.js";
export * from "./domain/index.js";
export * from "./application/index.js";
