import {
  ConflictException,
  EmailAlreadyRegisteredException,
  InvalidOrExpiredTokenException,
  PermissionDeniedException,
} from '@/common/exceptions/domain.exception';
import { PaginationService } from '@/common/pagination/pagination.service';
import { Review, Title, User, ValidationToken } from '@/database/entities';
import { PolicyService } from '@/modules/policy/policy.service';
import { ReviewInvariantsService } from '@/modules/reviews/review-invariants.service';
import { ValidationTokenService } from '@/modules/validation/validation-token.service';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { verify } from 'argon2';
import { DataSource, Repository } from 'typeorm';
import { configProvider } from '../../../test/helpers/config';
import { sqliteTestingModules } from '../../../test/helpers/database';
import {
  actorOf,
  createReview,
  createTitle,
  createUser,
} from '../../../test/helpers/fixtures';
import { i18nStub } from '../../../test/helpers/i18n';
import { UsersService } from './users.service';

describe('UsersService', () => {
  let module: TestingModule;
  let service: UsersService;
  let tokens: ValidationTokenService;
  let dataSource: DataSource;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [...sqliteTestingModules()],
      providers: [
        UsersService,
        ValidationTokenService,
        ReviewInvariantsService,
        PolicyService,
        PaginationService,
        configProvider(),
        i18nStub(),
      ],
    }).compile();

    service = module.get(UsersService);
    tokens = module.get(ValidationTokenService);
    dataSource = module.get(DataSource);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await module.close();
  });

  describe('register', () => {
    it('creates the account and spends the token', async () => {
      const token = await tokens.issue('new@example.com');

      const user = await service.register({
        email: 'New@Example.com',
        username: 'newcomer',
        password: 'a-long-password',
        token,
      });

      expect(user).toMatchObject({
        email: 'new@example.com',
        username: 'newcomer',
        firstName: '',
        lastName: '',
        isStaff: false,
      });
      const stored = await dataSource
        .getRepository(User)
        .findOneByOrFail({ id: user.id });
      expect(await verify(stored.password, 'a-long-password')).toBe(true);
      expect(await dataSource.getRepository(ValidationToken).count()).toBe(0);
    });

    it('refuses an email that already has an account', async () => {
      await createUser(dataSource, { email: 'taken@example.com' });
      const token = await tokens.issue('taken@example.com');

      await expect(
        service.register({
          email: 'taken@example.com',
          username: 'someone',
          password: 'a-long-password',
          token,
        }),
      ).rejects.toBeInstanceOf(EmailAlreadyRegisteredException);
    });

    it('reports a lost race for the email as an existing account', async () => {
      await createUser(dataSource, { email: 'race@example.com' });
      const token = await tokens.issue('race@example.com');
      const users = module.get<Repository<User>>(getRepositoryToken(User));
      // The other registration commits after the up-front check.
      jest.spyOn(users, 'existsBy').mockResolvedValueOnce(false);

      await expect(
        service.register({
          email: 'race@example.com',
          username: 'racer',
          password: 'a-long-password',
          token,
        }),
      ).rejects.toThrow(
        new EmailAlreadyRegisteredException('auth.errors.emailExists'),
      );
    });

    it('reports a lost race for the username as a conflict', async () => {
      await createUser(dataSource, { username: 'racer' });
      const token = await tokens.issue('fresh@example.com');
      const users = module.get<Repository<User>>(getRepositoryToken(User));
      jest
        .spyOn(users, 'existsBy')
        .mockResolvedValueOnce(false)
        .mockResolvedValueOnce(false);

      await expect(
        service.register({
          email: 'fresh@example.com',
          username: 'racer',
          password: 'a-long-password',
          token,
        }),
      ).rejects.toThrow(new ConflictException('auth.errors.usernameExists'));
    });

    it('creates nothing when the token is wrong', async () => {
      await tokens.issue('new@example.com');

      await expect(
        service.register({
          email: 'new@example.com',
          username: 'newcomer',
          password: 'a-long-password',
          token: 'not-the-token',
        }),
      ).rejects.toBeInstanceOf(InvalidOrExpiredTokenException);
      expect(await dataSource.getRepository(User).count()).toBe(0);
    });
  });

  describe('resetPassword', () => {
    it('replaces the password', async () => {
      const user = await createUser(dataSource);
      const token = await tokens.issue(user.email);

      const result = await service.resetPassword({
        email: user.email,
        token,
        newPassword: 'another-password',
      });

      expect(result).toEqual({ message: 'auth.success.passwordReset' });
      const stored = await dataSource
        .getRepository(User)
        .findOneByOrFail({ id: user.id });
      expect(await verify(stored.password, 'another-password')).toBe(true);
    });
  });

  describe('access', () => {
    it('keeps the user list to staff', async () => {
      const member = actorOf(await createUser(dataSource));

      await expect(service.findAll(member, {})).rejects.toBeInstanceOf(
        PermissionDeniedException,
      );
    });

    it('lets a user edit only their own record', async () => {
      const owner = await createUser(dataSource);
      const other = actorOf(await createUser(dataSource));

      await expect(
        service.update(other, owner.id, { firstName: 'X' }),
      ).rejects.toBeInstanceOf(PermissionDeniedException);

      const updated = await service.update(actorOf(owner), owner.id, {
        firstName: 'Ada',
      });
      expect(updated.firstName).toBe('Ada');
    });
  });

  describe('remove', () => {
    it('deletes the reviews and recomputes the affected ratings', async () => {
      const leaving = await createUser(dataSource);
      const staying = await createUser(dataSource);
      await createTitle(dataSource, 1);
      await createReview(dataSource, leaving.id, 1, 8);
      await createReview(dataSource, staying.id, 1, 6);
      await dataSource.getRepository(Title).update(1, { rating: 7 });

      await service.remove(actorOf(leaving), leaving.id);

      expect(
        await dataSource.getRepository(User).existsBy({ id: leaving.id }),
      ).toBe(false);
      expect(await dataSource.getRepository(Review).count()).toBe(1);
      const title = await dataSource
        .getRepository(Title)
        .findOneByOrFail({ id: 1 });
      expect(title.rating).toBe(6);
    });
  });

  describe('deriveUniqueUsername', () => {
    it('uses the local part with unsupported characters replaced', async () => {
      await expect(
        service.deriveUniqueUsername('jo.hn+tag@example.com'),
      ).resolves.toBe('jo.hn_tag');
    });

    it('pads short local parts', async () => {
      await expect(
        service.deriveUniqueUsername('ab@example.com'),
      ).resolves.toBe('ab_user');
    });

    it('appends a counter until the name is free', async () => {
      await createUser(dataSource, { username: 'ann' });
      await createUser(dataSource, { username: 'ann1' });

      await expect(
        service.deriveUniqueUsername('ann@example.com'),
      ).resolves.toBe('ann2');
    });
  });
});
