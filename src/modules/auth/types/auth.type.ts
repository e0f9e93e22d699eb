import { User } from '@/database/entities';

export type AuthTokens = {
  accessToken: string;
  accessTokenExpiresAt: string;
  refreshToken: string;
  refreshTokenExpiresAt: string;
};

/**
 * Result of the password check, decided inside the login transaction and
 * acted on after it commits, so lockout writes survive the rejection.
 */
export type LoginOutcome =
  | { kind: 'rejected' }
  | { kind: 'locked' }
  | { kind: 'authenticated'; user: User };
