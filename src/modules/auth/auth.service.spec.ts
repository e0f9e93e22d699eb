import {
  AccountLockedException,
  InvalidParameterException,
  NotAuthenticatedException,
} from '@/common/exceptions/domain.exception';
import { JwtPayload, TokenType } from '@/common/types/jwt.type';
import { User } from '@/database/entities';
import { UsersService } from '@/modules/users/users.service';
import { JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { freezeDate, restoreDate } from '../../../test/helpers/clock';
import { configProvider } from '../../../test/helpers/config';
import { sqliteTestingModules } from '../../../test/helpers/database';
import { createUser, TEST_PASSWORD } from '../../../test/helpers/fixtures';
import { i18nStub } from '../../../test/helpers/i18n';
import { AccountLockoutService } from './account-lockout.service';
import { AuthService } from './auth.service';
import { GoogleIdentityService } from './google-identity.service';

const NOW = new Date('2024-03-01T12:00:00.000Z');
const THIRTY_MINUTES = 30 * 60 * 1000;

describe('AuthService', () => {
  let module: TestingModule;
  let service: AuthService;
  let dataSource: DataSource;
  let jwtService: JwtService;
  const verifyGoogle = jest.fn();
  const findOrCreateFromIdentity = jest.fn();

  const reload = (id: number): Promise<User> =>
    dataSource.getRepository(User).findOneByOrFail({ id });

  beforeEach(async () => {
    freezeDate(NOW);
    verifyGoogle.mockReset();
    findOrCreateFromIdentity.mockReset();

    module = await Test.createTestingModule({
      imports: [...sqliteTestingModules()],
      providers: [
        AuthService,
        AccountLockoutService,
        {
          provide: JwtService,
          useValue: new JwtService({ secret: 'test-secret' }),
        },
        { provide: GoogleIdentityService, useValue: { verify: verifyGoogle } },
        { provide: UsersService, useValue: { findOrCreateFromIdentity } },
        configProvider(),
        i18nStub(),
      ],
    }).compile();

    service = module.get(AuthService);
    dataSource = module.get(DataSource);
    jwtService = module.get(JwtService);
  });

  afterEach(async () => {
    await module.close();
    restoreDate();
  });

  describe('login', () => {
    it('issues an access and a refresh token with their expiries', async () => {
      const user = await createUser(dataSource, { email: 'ann@example.com' });

      const tokens = await service.login({
        email: 'ann@example.com',
        password: TEST_PASSWORD,
      });

      expect(tokens.accessTokenExpiresAt).toBe('2024-03-01T12:15:00.000Z');
      expect(tokens.refreshTokenExpiresAt).toBe('2024-03-08T12:00:00.000Z');

      const access = jwtService.decode<JwtPayload>(tokens.accessToken);
      expect(access).toMatchObject({
        sub: String(user.id),
        email: 'ann@example.com',
        type: TokenType.ACCESS,
        isStaff: false,
      });
      expect(jwtService.decode<JwtPayload>(tokens.refreshToken).type).toBe(
        TokenType.REFRESH,
      );
    });

    it('rejects an unknown email', async () => {
      await expect(
        service.login({ email: 'nobody@example.com', password: TEST_PASSWORD }),
      ).rejects.toThrow(
        new NotAuthenticatedException('auth.errors.invalidCredentials'),
      );
    });

    it('rejects an inactive account without counting the attempt', async () => {
      const user = await createUser(dataSource, { isActive: false });

      await expect(
        service.login({ email: user.email, password: TEST_PASSWORD }),
      ).rejects.toBeInstanceOf(NotAuthenticatedException);
      expect((await reload(user.id)).failedLoginAttempts).toBe(0);
    });

    it('locks the account on the fifth wrong password', async () => {
      const user = await createUser(dataSource);
      const attempt = () =>
        service.login({ email: user.email, password: 'wrong-password' });

      for (let i = 0; i < 4; i++) {
        await expect(attempt()).rejects.toBeInstanceOf(
          NotAuthenticatedException,
        );
      }
      expect((await reload(user.id)).failedLoginAttempts).toBe(4);

      await expect(attempt()).rejects.toThrow(
        new AccountLockedException('auth.errors.accountLocked'),
      );

      const locked = await reload(user.id);
      expect(locked.isLocked).toBe(true);
      expect(locked.failedLoginAttempts).toBe(5);
      expect(locked.lockUntil?.getTime()).toBe(NOW.getTime() + THIRTY_MINUTES);
    });

    it('refuses the right password while locked and leaves the counters', async () => {
      const user = await createUser(dataSource, {
        isLocked: true,
        failedLoginAttempts: 5,
        lockUntil: new Date(NOW.getTime() + THIRTY_MINUTES),
      });

      await expect(
        service.login({ email: user.email, password: TEST_PASSWORD }),
      ).rejects.toBeInstanceOf(AccountLockedException);
      expect((await reload(user.id)).failedLoginAttempts).toBe(5);
    });

    it('unlocks once the lock has run out', async () => {
      const user = await createUser(dataSource, {
        isLocked: true,
        failedLoginAttempts: 5,
        lockUntil: new Date(NOW.getTime() + THIRTY_MINUTES),
      });

      jest.setSystemTime(NOW.getTime() + THIRTY_MINUTES + 1000);

      await expect(
        service.login({ email: user.email, password: TEST_PASSWORD }),
      ).resolves.toHaveProperty('accessToken');

      const unlocked = await reload(user.id);
      expect(unlocked.isLocked).toBe(false);
      expect(unlocked.failedLoginAttempts).toBe(0);
      expect(unlocked.lockUntil).toBeNull();
    });

    it('starts counting afresh after an expired lock', async () => {
      const user = await createUser(dataSource, {
        isLocked: true,
        failedLoginAttempts: 5,
        lockUntil: new Date(NOW.getTime() - 1000),
      });

      await expect(
        service.login({ email: user.email, password: 'wrong-password' }),
      ).rejects.toBeInstanceOf(NotAuthenticatedException);

      const after = await reload(user.id);
      expect(after.isLocked).toBe(false);
      expect(after.failedLoginAttempts).toBe(1);
    });

    it('clears earlier failures on success', async () => {
      const user = await createUser(dataSource, { failedLoginAttempts: 3 });

      await service.login({ email: user.email, password: TEST_PASSWORD });

      expect((await reload(user.id)).failedLoginAttempts).toBe(0);
    });
  });

  describe('refresh', () => {
    it('exchanges a refresh token for a new pair', async () => {
      const user = await createUser(dataSource);
      const { refreshToken } = await service.login({
        email: user.email,
        password: TEST_PASSWORD,
      });

      const tokens = await service.refresh({ refreshToken });

      expect(jwtService.decode<JwtPayload>(tokens.accessToken).sub).toBe(
        String(user.id),
      );
    });

    it('refuses an access token', async () => {
      const user = await createUser(dataSource);
      const { accessToken } = await service.login({
        email: user.email,
        password: TEST_PASSWORD,
      });

      await expect(
        service.refresh({ refreshToken: accessToken }),
      ).rejects.toThrow(
        new NotAuthenticatedException('auth.errors.invalidRefreshToken'),
      );
    });

    it('refuses a malformed token', async () => {
      await expect(
        service.refresh({ refreshToken: 'not-a-jwt' }),
      ).rejects.toBeInstanceOf(NotAuthenticatedException);
    });

    it('refuses a token whose user has been deactivated', async () => {
      const user = await createUser(dataSource);
      const { refreshToken } = await service.login({
        email: user.email,
        password: TEST_PASSWORD,
      });
      await dataSource.getRepository(User).update(user.id, { isActive: false });

      await expect(service.refresh({ refreshToken })).rejects.toBeInstanceOf(
        NotAuthenticatedException,
      );
    });
  });

  describe('loginWithGoogle', () => {
    it('rejects a credential Google does not accept', async () => {
      verifyGoogle.mockResolvedValue(null);

      await expect(
        service.loginWithGoogle({ credential: 'bad' }),
      ).rejects.toThrow(
        new InvalidParameterException('auth.errors.invalidGoogleCredential'),
      );
      expect(findOrCreateFromIdentity).not.toHaveBeenCalled();
    });

    it('signs in the account behind a verified identity', async () => {
      const user = await createUser(dataSource, { email: 'g@example.com' });
      const identity = { email: 'g@example.com', firstName: 'G', lastName: '' };
      verifyGoogle.mockResolvedValue(identity);
      findOrCreateFromIdentity.mockResolvedValue(user);

      const tokens = await service.loginWithGoogle({ credential: 'good' });

      expect(findOrCreateFromIdentity).toHaveBeenCalledWith(identity);
      expect(jwtService.decode<JwtPayload>(tokens.accessToken).sub).toBe(
        String(user.id),
      );
    });

    it('honours an active lock', async () => {
      const user = await createUser(dataSource, {
        isLocked: true,
        failedLoginAttempts: 5,
        lockUntil: new Date(NOW.getTime() + THIRTY_MINUTES),
      });
      verifyGoogle.mockResolvedValue({
        email: user.email,
        firstName: '',
        lastName: '',
      });
      findOrCreateFromIdentity.mockResolvedValue(user);

      await expect(
        service.loginWithGoogle({ credential: 'good' }),
      ).rejects.toBeInstanceOf(AccountLockedException);
    });
  });
});
