import {
  ConflictException,
  EmailAlreadyRegisteredException,
  EmailNotFoundException,
  ResourceNotFoundException,
} from '@/common/exceptions/domain.exception';
import { isUniqueViolation } from '@/common/exceptions/database-errors';
import { PaginationService } from '@/common/pagination/pagination.service';
import {
  Paginated,
  PaginationQuery,
} from '@/common/pagination/pagination.type';
import { AuthUser } from '@/common/types/jwt.type';
import { normalizeEmail } from '@/common/utils/email';
import { User } from '@/database/entities';
import { PolicyService } from '@/modules/policy/policy.service';
import { ReviewInvariantsService } from '@/modules/reviews/review-invariants.service';
import { ValidationTokenService } from '@/modules/validation/validation-token.service';
import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { hash } from 'argon2';
import { randomBytes } from 'crypto';
import { I18nService } from 'nestjs-i18n';
import { DataSource, Repository } from 'typeorm';
import { RegisterDto, ResetPasswordDto, UpdateUserDto } from './dto/user.dto';
import {
  ExternalIdentity,
  toUserResponse,
  UserResponse,
} from './types/user.type';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User) private readonly users: Repository<User>,
    private readonly dataSource: DataSource,
    private readonly tokens: ValidationTokenService,
    private readonly reviewInvariants: ReviewInvariantsService,
    private readonly policy: PolicyService,
    private readonly pagination: PaginationService,
    private readonly i18n: I18nService,
  ) {}

  // ============================================================================
  // REGISTRATION
  // ============================================================================

  /**
   * Creates an account for an email address proven by a validation token.
   *
   * Steps:
   *  1. Fail fast when the email or username is already taken.
   *  2. Hash the password outside the transaction.
   *  3. Redeem the token and insert the user in one transaction, so a failed
   *     insert leaves the token usable.
   *
   * @throws EmailAlreadyRegisteredException
   * @throws ConflictException                Username taken.
   * @throws InvalidOrExpiredTokenException
   */
  async register(dto: RegisterDto): Promise<UserResponse> {
    const email = normalizeEmail(dto.email);

    if (await this.users.existsBy({ email })) throw this.emailTaken();
    await this.assertUsernameAvailable(dto.username);

    const password = await hash(dto.password);

    try {
      const user = await this.dataSource.transaction(async (manager) => {
        await this.tokens.redeem(email, dto.token, manager);

        const repo = manager.getRepository(User);
        return repo.save(
          repo.create({
            email,
            username: dto.username,
            password,
            firstName: dto.firstName ?? '',
            lastName: dto.lastName ?? '',
          }),
        );
      });

      this.logger.log(`User ${user.id} registered (${email})`);
      return toUserResponse(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        // A concurrent registration took the email or the username.
        if (await this.users.existsBy({ email })) throw this.emailTaken();
        throw new ConflictException(
          this.i18n.translate('auth.errors.usernameExists'),
        );
      }
      throw error;
    }
  }

  // ============================================================================
  // PASSWORD RESET
  // ============================================================================

  /**
   * Replaces the password of the account that owns `dto.email`.
   *
   * @throws EmailNotFoundException
   * @throws InvalidOrExpiredTokenException
   */
  async resetPassword(dto: ResetPasswordDto): Promise<{ message: string }> {
    const email = normalizeEmail(dto.email);
    const user = await this.users.findOneBy({ email });

    if (!user) {
      throw new EmailNotFoundException(
        this.i18n.translate('auth.errors.emailNotFound'),
      );
    }

    const password = await hash(dto.newPassword);

    await this.dataSource.transaction(async (manager) => {
      await this.tokens.redeem(email, dto.token, manager);
      await manager.getRepository(User).update(user.id, { password });
    });

    this.logger.log(`Password reset for user ${user.id}`);
    return { message: this.i18n.translate('auth.success.passwordReset') };
  }

  // ============================================================================
  // CRUD
  // ============================================================================

  async findAll(
    actor: AuthUser,
    query: PaginationQuery,
  ): Promise<Paginated<UserResponse>> {
    this.policy.assert(actor, 'user:list');

    const request = this.pagination.resolve(query);
    const window = this.pagination.window(request);

    const [users, count] = await this.users.findAndCount({
      order: { id: 'ASC' },
      skip: window?.skip,
      take: window?.take,
    });

    return this.pagination.build(request, count, users.map(toUserResponse));
  }

  async findOne(actor: AuthUser, id: number): Promise<UserResponse> {
    const user = await this.getOrFail(id);
    this.policy.assert(actor, 'user:read', { ownerId: user.id });

    return toUserResponse(user);
  }

  /**
   * Updates profile fields. Email, staff flag and lockout state are not
   * writable here.
   *
   * @throws PermissionDeniedException
   * @throws ConflictException          Username taken.
   */
  async update(
    actor: AuthUser,
    id: number,
    dto: UpdateUserDto,
  ): Promise<UserResponse> {
    const user = await this.getOrFail(id);
    this.policy.assert(actor, 'user:update', { ownerId: user.id });

    if (dto.username !== undefined && dto.username !== user.username) {
      await this.assertUsernameAvailable(dto.username);
      user.username = dto.username;
    }
    if (dto.firstName !== undefined) user.firstName = dto.firstName;
    if (dto.lastName !== undefined) user.lastName = dto.lastName;
    if (dto.password !== undefined) user.password = await hash(dto.password);

    try {
      return toUserResponse(await this.users.save(user));
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException(
          this.i18n.translate('auth.errors.usernameExists'),
        );
      }
      throw error;
    }
  }

  /**
   * Deletes the account and its reviews, recomputing the rating of every
   * title the user had reviewed.
   */
  async remove(actor: AuthUser, id: number): Promise<void> {
    const user = await this.getOrFail(id);
    this.policy.assert(actor, 'user:delete', { ownerId: user.id });

    await this.dataSource.transaction(async (manager) => {
      await this.reviewInvariants.removeAllByAuthor(manager, user.id);
      await manager.getRepository(User).delete(user.id);
    });
    this.logger.log(`User ${user.id} deleted by ${actor.id}`);
  }

  // ============================================================================
  // EXTERNAL IDENTITIES
  // ============================================================================

  /**
   * Returns the account for a provider-verified email, creating it on first
   * sign-in with a derived username and an unusable random password.
   */
  async findOrCreateFromIdentity(identity: ExternalIdentity): Promise<User> {
    const email = normalizeEmail(identity.email);
    const existing = await this.users.findOneBy({ email });
    if (existing) return existing;

    const username = await this.deriveUniqueUsername(email);
    const password = await hash(randomBytes(32).toString('hex'));

    try {
      const user = await this.users.save(
        this.users.create({
          email,
          username,
          password,
          firstName: identity.firstName,
          lastName: identity.lastName,
        }),
      );
      this.logger.log(`User ${user.id} created from external identity`);
      return user;
    } catch (error) {
      // A concurrent first sign-in for the same email won the insert.
      if (isUniqueViolation(error)) {
        const winner = await this.users.findOneBy({ email });
        if (winner) return winner;
      }
      throw error;
    }
  }

  async deriveUniqueUsername(email: string): Promise<string> {
    let base = email.split('@')[0] ?? '';
    base = base.replace(/[^a-zA-Z0-9_.]/g, '_').replace(/^\.+|\.+$/g, '');
    if (base.length < 3) base = base + '_user';

    let candidate = base;
    let counter = 1;
    while (await this.users.existsBy({ username: candidate })) {
      candidate = `${base}${counter++}`;
    }
    return candidate;
  }

  // ============================================================================
  // PRIVATE
  // ============================================================================

  private async getOrFail(id: number): Promise<User> {
    const user = await this.users.findOneBy({ id });
    if (!user) {
      throw new ResourceNotFoundException(
        this.i18n.translate('auth.errors.userNotFound'),
      );
    }
    return user;
  }

  private emailTaken(): EmailAlreadyRegisteredException {
    return new EmailAlreadyRegisteredException(
      this.i18n.translate('auth.errors.emailExists'),
    );
  }

  private async assertUsernameAvailable(username: string): Promise<void> {
    if (await this.users.existsBy({ username })) {
      throw new ConflictException(
        this.i18n.translate('auth.errors.usernameExists'),
      );
    }
  }
}
