/**
 * Identity reported by the startup session check
 */
export interface SessionIdentity {
  userId: string | null;
  userName: string | null;
  realName: string | null;
  teamId: string | null;
  teamName: string | null;
}

/**
 * Port for the one-shot startup session check
 */
export interface ISessionAuthClient {
  /**
   * Resolves with the identity when the credentials are accepted.
   * Rejects with AuthError otherwise.
   */
  verify(): Promise<SessionIdentity>;
}
