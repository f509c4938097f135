import dotenv from "dotenv";
import { LOG_LEVELS, type LogLevel } from "../../domain/ports/ILogger.js";
import {
  createScheduleWindow,
  parseGmtOffset,
  parseTimeOfDay,
  parseWorkDays,
  type ScheduleWindow,
} from "../../domain/entities/ScheduleWindow.js";
import { ConfigError } from "../../domain/errors.js";

// Load environment variables from .env when present
dotenv.config();

export interface AppConfig {
  session: {
    token: string;
    cookie: string;
    /** Base URL of the default WebSocket endpoint */
    endpointUrl: string;
    preferCachedEndpoint: boolean;
    /** REST endpoint of the startup session check */
    authUrl: string;
    verifyOnStartup: boolean;
  };
  schedule: ScheduleWindow;
  cache: {
    path: string;
  };
  supervisor: {
    idlePollIntervalMs: number;
    retryBackoffMs: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
    file?: string;
  };
  health: {
    port: number | null;
  };
}

type Env = Record<string, string | undefined>;

function getEnvOrThrow(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value.trim() === "" ? defaultValue : value.trim();
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();
  if (!value) return defaultValue;
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigError(`${key} must be a boolean, got "${env[key]}"`);
}

function getLogLevel(env: Env): LogLevel {
  const value = getEnvOrDefault(env, "LOG_LEVEL", "info").toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  }
  return level;
}

function getSchedule(env: Env): ScheduleWindow {
  return createScheduleWindow({
    workDays: parseWorkDays(env.WORK_DAYS),
    start: parseTimeOfDay(getEnvOrDefault(env, "WORK_START", "09:00")),
    end: parseTimeOfDay(getEnvOrDefault(env, "WORK_END", "17:00")),
    offsetHours: parseGmtOffset(env.GMT_OFFSET),
  });
}

/**
 * Load configuration from the environment (and .env)
 *
 * @throws ConfigError on missing credentials or malformed values
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const healthPort = getEnvNumber(env, "HEALTH_PORT", 0);
  const logFile = env.LOG_FILE?.trim() || undefined;

  return {
    session: {
      token: getEnvOrThrow(env, "SLACK_TOKEN"),
      cookie: getEnvOrThrow(env, "SLACK_COOKIE"),
      endpointUrl: getEnvOrDefault(env, "SESSION_URL", "wss://wss-primary.slack.com/"),
      preferCachedEndpoint: getEnvBoolean(env, "PREFER_CACHED_ENDPOINT", true),
      authUrl: getEnvOrDefault(env, "AUTH_URL", "https://slack.com/api/client.userBoot"),
      verifyOnStartup: getEnvBoolean(env, "VERIFY_SESSION", true),
    },
    schedule: getSchedule(env),
    cache: {
      path: getEnvOrDefault(env, "CACHE_FILE", "cache/websocket_cache.json"),
    },
    supervisor: {
      idlePollIntervalMs: getEnvNumber(env, "IDLE_POLL_INTERVAL", 60_000),
      retryBackoffMs: getEnvNumber(env, "RETRY_BACKOFF", 5_000),
    },
    logging: {
      level: getLogLevel(env),
      pretty: env.NODE_ENV !== "production",
      ...(logFile ? { file: logFile } : {}),
    },
    health: {
      port: healthPort > 0 ? healthPort : null,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  const endpoint = config.session.endpointUrl;
  if (!endpoint.startsWith("ws://") && !endpoint.startsWith("wss://")) {
    throw new ConfigError("SESSION_URL must start with ws:// or wss://");
  }

  const authUrl = config.session.authUrl;
  if (!authUrl.startsWith("http://") && !authUrl.startsWith("https://")) {
    throw new ConfigError("AUTH_URL must start with http:// or https://");
  }

  if (config.supervisor.idlePollIntervalMs < 1_000) {
    throw new ConfigError("IDLE_POLL_INTERVAL must be at least 1000 ms");
  }

  if (config.health.port !== null && config.health.port > 65_535) {
    throw new ConfigError(`HEALTH_PORT out of range: ${config.health.port}`);
  }
}
