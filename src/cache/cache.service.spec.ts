import { AppConfig } from '@/common/types/config.type';
import { Test, TestingModule } from '@nestjs/testing';
import { freezeDate, restoreDate } from '../../test/helpers/clock';
import { configProvider } from '../../test/helpers/config';
import { AppCacheService } from './cache.service';
import { InMemoryCacheService } from './in-memory-cache.service';
import { RedisCacheService } from './redis-cache.service';

const NOW = new Date('2024-03-01T12:00:00.000Z');

const compile = (cache: AppConfig['cache']): Promise<TestingModule> =>
  Test.createTestingModule({
    providers: [
      AppCacheService,
      InMemoryCacheService,
      RedisCacheService,
      configProvider({ cache }),
    ],
  }).compile();

describe('InMemoryCacheService', () => {
  let module: TestingModule;
  let cache: InMemoryCacheService;

  beforeEach(async () => {
    freezeDate(NOW);
    module = await compile({
      ttl: 60,
      max: 2,
      redis: { enabled: false, url: null },
    });
    await module.init();
    cache = module.get(InMemoryCacheService);
  });

  afterEach(async () => {
    await module.close();
    restoreDate();
  });

  it('serves an entry until its ttl has passed', () => {
    cache.set('key', { value: 1 }, 10);

    jest.setSystemTime(NOW.getTime() + 10_000);
    expect(cache.get('key')).toEqual({ value: 1 });

    jest.setSystemTime(NOW.getTime() + 10_001);
    expect(cache.get('key')).toBeNull();
  });

  it('evicts the least recently read entry when full', () => {
    cache.set('a', 1);
    jest.setSystemTime(NOW.getTime() + 1000);
    cache.set('b', 2);
    jest.setSystemTime(NOW.getTime() + 2000);
    cache.get('a');
    jest.setSystemTime(NOW.getTime() + 3000);

    cache.set('c', 3);

    expect(cache.get('a')).toBe(1);
    expect(cache.get('b')).toBeNull();
    expect(cache.get('c')).toBe(3);
  });

  it('overwrites a held key without evicting', () => {
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);

    expect(cache.get('a')).toBe(10);
    expect(cache.get('b')).toBe(2);
  });

  it('sweeps expired entries', () => {
    cache.set('short', 1, 1);
    cache.set('long', 2, 100);
    jest.setSystemTime(NOW.getTime() + 5000);

    expect(cache.cleanup()).toBe(1);
    expect(cache.get('long')).toBe(2);
  });
});

describe('AppCacheService', () => {
  let module: TestingModule;

  afterEach(async () => {
    await module.close();
  });

  it('stores loaded values in memory when redis is disabled', async () => {
    module = await compile({
      ttl: 60,
      max: 100,
      redis: { enabled: false, url: null },
    });
    const cache = module.get(AppCacheService);

    await cache.getOrSet('key', async () => 'value');

    expect(module.get(InMemoryCacheService).get('key')).toBe('value');
  });

  it('falls back to memory while redis is not connected', async () => {
    module = await compile({
      ttl: 60,
      max: 100,
      redis: { enabled: true, url: null },
    });
    await module.init();
    const cache = module.get(AppCacheService);

    await cache.getOrSet('key', async () => 'value');

    expect(module.get(RedisCacheService).isConnected()).toBe(false);
    expect(module.get(InMemoryCacheService).get('key')).toBe('value');
  });

  it('runs the loader once and serves the cached value after', async () => {
    module = await compile({
      ttl: 60,
      max: 100,
      redis: { enabled: false, url: null },
    });
    const cache = module.get(AppCacheService);
    const loader = jest.fn().mockResolvedValue(['x']);

    await expect(cache.getOrSet('list', loader)).resolves.toEqual(['x']);
    await expect(cache.getOrSet('list', loader)).resolves.toEqual(['x']);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('does not cache a loader failure', async () => {
    module = await compile({
      ttl: 60,
      max: 100,
      redis: { enabled: false, url: null },
    });
    const cache = module.get(AppCacheService);
    const loader = jest
      .fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');

    await expect(cache.getOrSet('key', loader)).rejects.toThrow('boom');
    await expect(cache.getOrSet('key', loader)).resolves.toBe('ok');
  });
});
