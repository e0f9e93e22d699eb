import {
  AccountLockedException,
  InvalidParameterException,
  NotAuthenticatedException,
} from '@/common/exceptions/domain.exception';
import { JwtPayload, TokenType } from '@/common/types/jwt.type';
import { normalizeEmail } from '@/common/utils/email';
import { User } from '@/database/entities';
import { lockRowForUpdate } from '@/database/locking';
import { UsersService } from '@/modules/users/users.service';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { InjectRepository } from '@nestjs/typeorm';
import { verify } from 'argon2';
import ms, { StringValue } from 'ms';
import { I18nService } from 'nestjs-i18n';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { AccountLockoutService, LockState } from './account-lockout.service';
import { GoogleLoginDto, LoginDto, RefreshTokenDto } from './dto/auth.dto';
import { GoogleIdentityService } from './google-identity.service';
import { AuthTokens, LoginOutcome } from './types/auth.type';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(User) private readonly users: Repository<User>,
    private readonly dataSource: DataSource,
    private readonly jwtService: JwtService,
    private readonly config: ConfigService,
    private readonly lockout: AccountLockoutService,
    private readonly googleIdentity: GoogleIdentityService,
    private readonly usersService: UsersService,
    private readonly i18n: I18nService,
  ) {}

  // ============================================================================
  // PASSWORD LOGIN (POST /auth/token)
  // ============================================================================

  /**
   * Exchanges email + password for a token pair.
   *
   * Flow (one transaction, user row locked):
   *  1. Unknown or inactive account → rejected, nothing counted.
   *  2. Lock still running → locked, counters untouched.
   *  3. Lock expired → counters reset, attempt continues.
   *  4. Wrong password → counter +1; reaching the max locks the account.
   *  5. Right password → counters reset.
   *
   * @throws NotAuthenticatedException  Bad credentials.
   * @throws AccountLockedException     Account locked, now or by this attempt.
   */
  async login(dto: LoginDto): Promise<AuthTokens> {
    const email = normalizeEmail(dto.email);
    const outcome = await this.dataSource.transaction((manager) =>
      this.checkPassword(manager, email, dto.password),
    );

    switch (outcome.kind) {
      case 'rejected':
        this.logger.warn(`Failed login for ${email}`);
        throw new NotAuthenticatedException(
          this.i18n.translate('auth.errors.invalidCredentials'),
        );
      case 'locked':
        this.logger.warn(`Login refused for locked account ${email}`);
        throw this.accountLocked();
      case 'authenticated':
        this.logger.log(`User ${outcome.user.id} logged in`);
        return this.issueTokens(outcome.user);
    }
  }

  // ============================================================================
  // REFRESH (POST /auth/token/refresh)
  // ============================================================================

  /**
   * @throws NotAuthenticatedException  Token invalid, expired, not a refresh
   *                                    token, or its user is gone or inactive.
   */
  async refresh(dto: RefreshTokenDto): Promise<AuthTokens> {
    let payload: JwtPayload;
    try {
      payload = await this.jwtService.verifyAsync<JwtPayload>(dto.refreshToken);
    } catch (error) {
      this.logger.debug(
        `Refresh token rejected: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw this.invalidRefreshToken();
    }

    if (payload.type !== TokenType.REFRESH) throw this.invalidRefreshToken();

    const user = await this.users.findOneBy({
      id: Number(payload.sub),
      isActive: true,
    });
    if (!user) throw this.invalidRefreshToken();

    return this.issueTokens(user);
  }

  // ============================================================================
  // GOOGLE SIGN-IN (POST /auth/google)
  // ============================================================================

  /**
   * Signs in (creating the account on first use) with a Google ID token.
   * Lockout applies as for password logins.
   *
   * @throws InvalidParameterException  Google rejected the credential.
   * @throws NotAuthenticatedException  Account inactive.
   * @throws AccountLockedException
   */
  async loginWithGoogle(dto: GoogleLoginDto): Promise<AuthTokens> {
    const identity = await this.googleIdentity.verify(dto.credential);
    if (!identity) {
      throw new InvalidParameterException(
        this.i18n.translate('auth.errors.invalidGoogleCredential'),
      );
    }

    const user = await this.usersService.findOrCreateFromIdentity(identity);

    const outcome = await this.dataSource.transaction(
      async (manager): Promise<LoginOutcome> => {
        const current = await lockRowForUpdate(manager, User, user.id);
        if (!current || !current.isActive) return { kind: 'rejected' };

        const state = this.lockout.state(current);
        if (state === LockState.LOCKED) return { kind: 'locked' };
        if (state === LockState.EXPIRED || current.failedLoginAttempts > 0) {
          await this.lockout.reset(manager, current.id);
        }
        return { kind: 'authenticated', user: current };
      },
    );

    if (outcome.kind === 'rejected') {
      throw new NotAuthenticatedException(
        this.i18n.translate('auth.errors.invalidCredentials'),
      );
    }
    if (outcome.kind === 'locked') throw this.accountLocked();

    this.logger.log(`User ${outcome.user.id} signed in with Google`);
    return this.issueTokens(outcome.user);
  }

  // ============================================================================
  // PRIVATE
  // ============================================================================

  private async checkPassword(
    manager: EntityManager,
    email: string,
    password: string,
  ): Promise<LoginOutcome> {
    const found = await manager.getRepository(User).findOneBy({ email });
    if (!found || !found.isActive) return { kind: 'rejected' };

    const user = await lockRowForUpdate(manager, User, found.id);
    if (!user) return { kind: 'rejected' };

    const now = new Date();
    const state = this.lockout.state(user, now);
    if (state === LockState.LOCKED) return { kind: 'locked' };
    if (state === LockState.EXPIRED) {
      await this.lockout.reset(manager, user.id);
      user.failedLoginAttempts = 0;
      user.isLocked = false;
      user.lockUntil = null;
    }

    if (!(await verify(user.password, password))) {
      const locked = await this.lockout.recordFailure(manager, user.id, now);
      return locked ? { kind: 'locked' } : { kind: 'rejected' };
    }

    if (user.failedLoginAttempts > 0) {
      await this.lockout.reset(manager, user.id);
    }
    return { kind: 'authenticated', user };
  }

  private issueTokens(user: User): AuthTokens {
    const claims = {
      sub: String(user.id),
      email: user.email,
      username: user.username,
      isStaff: user.isStaff,
    };

    const access = this.signTokenWithExpiry(
      { ...claims, type: TokenType.ACCESS },
      this.config.get<StringValue>('jwt.expiresIn', '15m'),
    );
    const refresh = this.signTokenWithExpiry(
      { ...claims, type: TokenType.REFRESH },
      this.config.get<StringValue>('jwt.refreshExpiresIn', '7d'),
    );

    return {
      accessToken: access.token,
      accessTokenExpiresAt: access.expiresAt,
      refreshToken: refresh.token,
      refreshTokenExpiresAt: refresh.expiresAt,
    };
  }

  /**
   * Signs a JWT and returns both the token string and the exact ISO 8601 expiry
   * timestamp read back from the token's own `exp` claim.
   */
  private signTokenWithExpiry(
    payload: JwtPayload,
    expiresIn: StringValue,
  ): { token: string; expiresAt: string } {
    let validExpiry = expiresIn;
    const expiryMs = ms(expiresIn);

    if (!expiryMs || expiryMs <= 0) {
      this.logger.debug(`Invalid JWT expiry "${expiresIn}", falling back to 1d`);
      validExpiry = '1d';
    }

    const token = this.jwtService.sign(payload, { expiresIn: validExpiry });
    const decoded = this.jwtService.decode<JwtPayload>(token);
    const expiresAt = new Date((decoded?.exp ?? 0) * 1000).toISOString();

    return { token, expiresAt };
  }

  private accountLocked(): AccountLockedException {
    return new AccountLockedException(
      this.i18n.translate('auth.errors.accountLocked'),
    );
  }

  private invalidRefreshToken(): NotAuthenticatedException {
    return new NotAuthenticatedException(
      this.i18n.translate('auth.errors.invalidRefreshToken'),
    );
  }
}
