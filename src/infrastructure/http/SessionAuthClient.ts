import type { ISessionAuthClient, SessionIdentity } from "../../domain/ports/ISessionAuthClient.js";
import type { ILogger } from "../../domain/ports/ILogger.js";
import { AuthError } from "../../domain/errors.js";

export interface SessionAuthClientConfig {
  url: string;
  token: string;
  cookie: string;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: unknown, key: string): string | null {
  if (!isRecord(record)) return null;
  const value = record[key];
  return typeof value === "string" ? value : null;
}

/**
 * Parse the `{ok, error?, self?, team?}` body of the session check
 */
export function parseSessionCheckResponse(body: unknown): SessionIdentity {
  if (!isRecord(body) || typeof body.ok !== "boolean") {
    throw new AuthError("Session check returned an unexpected body");
  }
  if (!body.ok) {
    throw new AuthError(`Session check rejected: ${stringField(body, "error") ?? "unknown error"}`);
  }

  return {
    userId: stringField(body.self, "id"),
    userName: stringField(body.self, "name"),
    realName: stringField(body.self, "real_name"),
    teamId: stringField(body.team, "id"),
    teamName: stringField(body.team, "name"),
  };
}

/**
 * Form-encoded POST against the REST API to confirm the credentials
 * before any WebSocket is opened
 */
export class SessionAuthClient implements ISessionAuthClient {
  constructor(
    private readonly config: SessionAuthClientConfig,
    private readonly logger: ILogger
  ) {}

  async verify(): Promise<SessionIdentity> {
    this.logger.debug("Checking session", { url: this.config.url });

    let response: Response;
    try {
      response = await fetch(this.config.url, {
        method: "POST",
        headers: {
          Cookie: this.config.cookie,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ token: this.config.token }).toString(),
        signal: AbortSignal.timeout(this.config.timeoutMs ?? 10_000),
      });
    } catch (error) {
      throw new AuthError("Session check request failed", { cause: error });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AuthError(`Session check returned invalid JSON (HTTP ${response.status})`, {
        cause: error,
      });
    }

    return parseSessionCheckResponse(body);
  }
}
