import { ExternalIdentity } from '@/modules/users/types/user.type';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OAuth2Client } from 'google-auth-library';

/**
 * Verifies Google ID tokens issued to this application's OAuth client.
 */
@Injectable()
export class GoogleIdentityService {
  private readonly logger = new Logger(GoogleIdentityService.name);
  private readonly client: OAuth2Client;
  private readonly clientId: string;

  constructor(config: ConfigService) {
    this.clientId = config.get<string>('google.clientId', '');
    this.client = new OAuth2Client(this.clientId);
  }

  /**
   * @returns the verified identity, or null when the token is rejected.
   */
  async verify(credential: string): Promise<ExternalIdentity | null> {
    if (!this.clientId) {
      this.logger.warn('Google sign-in attempted but GOOGLE_CLIENT_ID is not set');
      return null;
    }

    try {
      const ticket = await this.client.verifyIdToken({
        idToken: credential,
        audience: this.clientId,
      });
      const payload = ticket.getPayload();

      if (!payload?.email || payload.email_verified === false) {
        this.logger.warn('Google token without a verified email rejected');
        return null;
      }

      return {
        email: payload.email,
        firstName: payload.given_name ?? '',
        lastName: payload.family_name ?? '',
      };
    } catch (error) {
      this.logger.warn(
        `Google token verification failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
