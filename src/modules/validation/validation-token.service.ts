import { AUTH_CONSTANTS } from '@/common/constants/auth.constants';
import { InvalidOrExpiredTokenException } from '@/common/exceptions/domain.exception';
import { normalizeEmail } from '@/common/utils/email';
import { ValidationToken } from '@/database/entities';
import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { randomBytes } from 'crypto';
import { I18nService } from 'nestjs-i18n';
import { EntityManager, Repository } from 'typeorm';

/**
 * True while `now` is within the freshness window of a token created at `createdAt`.
 */
export const isTokenFresh = (createdAt: Date, now: Date): boolean =>
  now.getTime() - createdAt.getTime() <= AUTH_CONSTANTS.VALIDATION_TOKEN_TTL_MS;

/**
 * Single-use, time-boxed proof that the caller controls an email address.
 *
 * Every method takes an optional EntityManager so callers can run a redeem
 * in the same transaction as the user write it unlocks; a rollback there
 * puts the token back.
 */
@Injectable()
export class ValidationTokenService {
  private readonly logger = new Logger(ValidationTokenService.name);

  constructor(
    @InjectRepository(ValidationToken)
    private readonly tokens: Repository<ValidationToken>,
    private readonly i18n: I18nService,
  ) {}

  /**
   * Stores a fresh random token for `email` and returns it for delivery.
   */
  async issue(email: string, manager?: EntityManager): Promise<string> {
    const token = randomBytes(AUTH_CONSTANTS.VALIDATION_TOKEN_BYTES).toString(
      'base64url',
    );

    await this.repository(manager).insert({
      email: normalizeEmail(email),
      token,
      createdAt: new Date(),
    });

    this.logger.log(`Validation token issued for ${normalizeEmail(email)}`);
    return token;
  }

  /**
   * Resolves the matching row when `token` belongs to `email` and is still fresh.
   *
   * @throws InvalidOrExpiredTokenException
   */
  async verify(
    email: string,
    token: string,
    manager?: EntityManager,
  ): Promise<ValidationToken> {
    const row = await this.repository(manager).findOneBy({
      email: normalizeEmail(email),
      token,
    });

    if (!row || !isTokenFresh(row.createdAt, new Date())) {
      throw this.invalidToken();
    }

    return row;
  }

  /**
   * Deletes every row carrying `token`. Returns how many were removed.
   */
  async consume(token: string, manager?: EntityManager): Promise<number> {
    const result = await this.repository(manager).delete({ token });
    return result.affected ?? 0;
  }

  /**
   * verify + consume as one step. The delete targets the verified row by id
   * and must remove exactly that row, so of two concurrent redeems of the
   * same token only one can succeed.
   *
   * @throws InvalidOrExpiredTokenException
   */
  async redeem(
    email: string,
    token: string,
    manager?: EntityManager,
  ): Promise<void> {
    const row = await this.verify(email, token, manager);
    const result = await this.repository(manager).delete({ id: row.id });

    if (result.affected !== 1) {
      throw this.invalidToken();
    }

    this.logger.log(`Validation token redeemed for ${row.email}`);
  }

  private repository(manager?: EntityManager): Repository<ValidationToken> {
    return manager ? manager.getRepository(ValidationToken) : this.tokens;
  }

  private invalidToken(): InvalidOrExpiredTokenException {
    return new InvalidOrExpiredTokenException(
      this.i18n.translate('auth.errors.invalidOrExpiredToken'),
    );
  }
}
