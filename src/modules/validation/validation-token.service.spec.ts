import { InvalidOrExpiredTokenException } from '@/common/exceptions/domain.exception';
import { ValidationToken } from '@/database/entities';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { freezeDate, restoreDate } from '../../../test/helpers/clock';
import { sqliteTestingModules } from '../../../test/helpers/database';
import { i18nStub } from '../../../test/helpers/i18n';
import { isTokenFresh, ValidationTokenService } from './validation-token.service';

const ISSUED_AT = new Date('2024-03-01T12:00:00.000Z');
const after = (ms: number): Date => new Date(ISSUED_AT.getTime() + ms);

describe('isTokenFresh', () => {
  it('holds for three minutes, inclusive', () => {
    expect(isTokenFresh(ISSUED_AT, after(179_000))).toBe(true);
    expect(isTokenFresh(ISSUED_AT, after(180_000))).toBe(true);
    expect(isTokenFresh(ISSUED_AT, after(181_000))).toBe(false);
  });
});

describe('ValidationTokenService', () => {
  let module: TestingModule;
  let service: ValidationTokenService;
  let dataSource: DataSource;

  beforeEach(async () => {
    freezeDate(ISSUED_AT);

    module = await Test.createTestingModule({
      imports: [...sqliteTestingModules()],
      providers: [ValidationTokenService, i18nStub()],
    }).compile();

    service = module.get(ValidationTokenService);
    dataSource = module.get(DataSource);
  });

  afterEach(async () => {
    await module.close();
    restoreDate();
  });

  it('issues a url-safe random token bound to the normalized email', async () => {
    const token = await service.issue('  Someone@Example.com ');

    expect(token).toMatch(/^[A-Za-z0-9_-]{32}$/);
    const row = await dataSource
      .getRepository(ValidationToken)
      .findOneByOrFail({ token });
    expect(row.email).toBe('someone@example.com');
  });

  it('accepts a token at 2m59s and rejects it at 3m01s', async () => {
    const token = await service.issue('someone@example.com');

    jest.setSystemTime(after(179_000));
    await expect(service.verify('someone@example.com', token)).resolves.toMatchObject(
      { token },
    );

    jest.setSystemTime(after(181_000));
    await expect(
      service.verify('someone@example.com', token),
    ).rejects.toBeInstanceOf(InvalidOrExpiredTokenException);
  });

  it('rejects a token presented for another email', async () => {
    const token = await service.issue('someone@example.com');

    await expect(
      service.verify('other@example.com', token),
    ).rejects.toBeInstanceOf(InvalidOrExpiredTokenException);
  });

  it('redeems a token exactly once', async () => {
    const token = await service.issue('someone@example.com');

    await service.redeem('someone@example.com', token);

    await expect(
      service.redeem('someone@example.com', token),
    ).rejects.toBeInstanceOf(InvalidOrExpiredTokenException);
    expect(await dataSource.getRepository(ValidationToken).count()).toBe(0);
  });

  it('puts the token back when the surrounding transaction rolls back', async () => {
    const token = await service.issue('someone@example.com');

    await expect(
      dataSource.transaction(async (manager) => {
        await service.redeem('someone@example.com', token, manager);
        throw new Error('insert failed');
      }),
    ).rejects.toThrow('insert failed');

    await expect(
      service.verify('someone@example.com', token),
    ).resolves.toMatchObject({ token });
  });

  it('reports how many rows a consume removed', async () => {
    const token = await service.issue('someone@example.com');

    expect(await service.consume(token)).toBe(1);
    expect(await service.consume(token)).toBe(0);
  });
});
