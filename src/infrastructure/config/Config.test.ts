import { describe, it, expect } from "vitest";
import { loadConfig, validateConfig } from "./Config.js";
import { ConfigError } from "../../domain/errors.js";

const baseEnv = {
  SLACK_TOKEN: "test-token",
  SLACK_COOKIE: "d=test-cookie",
};

describe("loadConfig", () => {
  it("should apply defaults", () => {
    const config = loadConfig({ ...baseEnv });

    expect(config.session).toEqual({
      token: "test-token",
      cookie: "d=test-cookie",
      endpointUrl: "wss://wss-primary.slack.com/",
      preferCachedEndpoint: true,
      authUrl: "https://slack.com/api/client.userBoot",
      verifyOnStartup: true,
    });
    expect([...config.schedule.workDays]).toEqual([
      "monday",
      "tuesday",
      "wednesday",
      "thursday",
      "friday",
    ]);
    expect(config.schedule.start).toEqual({ hours: 9, minutes: 0 });
    expect(config.schedule.end).toEqual({ hours: 17, minutes: 0 });
    expect(config.schedule.offsetHours).toBe(0);
    expect(config.cache.path).toBe("cache/websocket_cache.json");
    expect(config.supervisor).toEqual({ idlePollIntervalMs: 60_000, retryBackoffMs: 5_000 });
    expect(config.logging).toEqual({ level: "info", pretty: true });
    expect(config.health.port).toBeNull();
  });

  it("should read the schedule and overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      WORK_DAYS: "monday",
      WORK_START: "10:00",
      WORK_END: "11:00",
      GMT_OFFSET: "-3",
      PREFER_CACHED_ENDPOINT: "false",
      VERIFY_SESSION: "no",
      LOG_LEVEL: "DEBUG",
      LOG_FILE: "logs/agent.log",
      NODE_ENV: "production",
      HEALTH_PORT: "8099",
      RETRY_BACKOFF: "2000",
    });

    expect([...config.schedule.workDays]).toEqual(["monday"]);
    expect(config.schedule.start).toEqual({ hours: 10, minutes: 0 });
    expect(config.schedule.end).toEqual({ hours: 11, minutes: 0 });
    expect(config.schedule.offsetHours).toBe(-3);
    expect(config.session.preferCachedEndpoint).toBe(false);
    expect(config.session.verifyOnStartup).toBe(false);
    expect(config.logging).toEqual({ level: "debug", pretty: false, file: "logs/agent.log" });
    expect(config.health.port).toBe(8099);
    expect(config.supervisor.retryBackoffMs).toBe(2000);
  });

  it("should require the credentials", () => {
    expect(() => loadConfig({ SLACK_COOKIE: "d=test-cookie" })).toThrow(
      "Missing required environment variable: SLACK_TOKEN"
    );
    expect(() => loadConfig({ SLACK_TOKEN: "test-token" })).toThrow(ConfigError);
  });

  it("should surface schedule errors as ConfigError", () => {
    expect(() => loadConfig({ ...baseEnv, WORK_DAYS: "caturday" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...baseEnv, WORK_DAYS: "," })).toThrow(
      "At least one work day must be configured"
    );
    expect(() => loadConfig({ ...baseEnv, WORK_START: "9am" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...baseEnv, WORK_START: "18:00" })).toThrow(
      "Work start (18:00) must be before work end (17:00)"
    );
    expect(() => loadConfig({ ...baseEnv, GMT_OFFSET: "+30" })).toThrow(ConfigError);
  });

  it("should reject malformed scalars", () => {
    expect(() => loadConfig({ ...baseEnv, LOG_LEVEL: "verbose" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...baseEnv, VERIFY_SESSION: "maybe" })).toThrow(
      'VERIFY_SESSION must be a boolean, got "maybe"'
    );
    expect(() => loadConfig({ ...baseEnv, RETRY_BACKOFF: "soon" })).toThrow(ConfigError);
  });
});

describe("validateConfig", () => {
  it("should accept the defaults", () => {
    expect(() => validateConfig(loadConfig({ ...baseEnv }))).not.toThrow();
  });

  it("should reject non websocket session urls", () => {
    const config = loadConfig({ ...baseEnv, SESSION_URL: "https://example.test/" });

    expect(() => validateConfig(config)).toThrow("SESSION_URL must start with ws:// or wss://");
  });

  it("should reject non http auth urls", () => {
    const config = loadConfig({ ...baseEnv, AUTH_URL: "ftp://example.test/" });

    expect(() => validateConfig(config)).toThrow(ConfigError);
  });

  it("should reject a too short idle poll interval", () => {
    const config = loadConfig({ ...baseEnv, IDLE_POLL_INTERVAL: "10" });

    expect(() => validateConfig(config)).toThrow("IDLE_POLL_INTERVAL must be at least 1000 ms");
  });
});
