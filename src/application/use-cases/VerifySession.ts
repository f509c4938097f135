import type { ISessionAuthClient, SessionIdentity } from '../../domain/ports/ISessionAuthClient.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

/**
 * Use case for the one-shot credential check run before the supervisor starts
 */
export class VerifySession {
  constructor(
    private readonly authClient: ISessionAuthClient,
    private readonly logger: ILogger
  ) {}

  async execute(): Promise<SessionIdentity> {
    this.logger.info('Executing VerifySession use case');

    try {
      const identity = await this.authClient.verify();
      this.logger.info('Session verified', {
        user: identity.realName ?? identity.userName ?? identity.userId,
        team: identity.teamName,
      });
      return identity;
    } catch (error) {
      this.logger.error('Session verification failed', error);
      throw error;
    }
  }
}
