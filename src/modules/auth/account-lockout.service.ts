import { AUTH_CONSTANTS } from '@/common/constants/auth.constants';
import { User } from '@/database/entities';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityManager } from 'typeorm';

export enum LockState {
  OPEN = 'open',
  LOCKED = 'locked',
  /** Locked, but `lockUntil` has passed; the next attempt unlocks. */
  EXPIRED = 'expired',
}

type LockFields = Pick<User, 'isLocked' | 'lockUntil'>;

export const resolveLockState = (user: LockFields, now: Date): LockState => {
  if (!user.isLocked) return LockState.OPEN;
  if (user.lockUntil !== null && user.lockUntil.getTime() > now.getTime()) {
    return LockState.LOCKED;
  }
  return LockState.EXPIRED;
};

/**
 * Counts consecutive failed logins per account and locks the account for
 * LOCKOUT_DURATION_MS once `auth.maxFailedLoginAttempts` is reached.
 *
 * All writes take the caller's EntityManager so they commit or roll back with
 * the login attempt that caused them.
 */
@Injectable()
export class AccountLockoutService {
  private readonly logger = new Logger(AccountLockoutService.name);
  readonly maxAttempts: number;

  constructor(config: ConfigService) {
    this.maxAttempts = config.get<number>(
      'auth.maxFailedLoginAttempts',
      AUTH_CONSTANTS.DEFAULT_MAX_FAILED_LOGIN_ATTEMPTS,
    );
  }

  state(user: LockFields, now: Date = new Date()): LockState {
    return resolveLockState(user, now);
  }

  /**
   * Atomically bumps the counter and locks the account when it reaches the
   * maximum.
   *
   * @returns true when this failure locked the account.
   */
  async recordFailure(
    manager: EntityManager,
    userId: number,
    now: Date = new Date(),
  ): Promise<boolean> {
    const users = manager.getRepository(User);
    await users.increment({ id: userId }, 'failedLoginAttempts', 1);

    const user = await users.findOneBy({ id: userId });
    if (!user || user.failedLoginAttempts < this.maxAttempts) return false;

    const lockUntil = new Date(now.getTime() + AUTH_CONSTANTS.LOCKOUT_DURATION_MS);
    await users.update(userId, { isLocked: true, lockUntil });

    this.logger.warn(
      `User ${userId} locked until ${lockUntil.toISOString()} after ${user.failedLoginAttempts} failed attempts`,
    );
    return true;
  }

  async reset(manager: EntityManager, userId: number): Promise<void> {
    await manager.getRepository(User).update(userId, {
      failedLoginAttempts: 0,
      isLocked: false,
      lockUntil: null,
    });
  }
}
