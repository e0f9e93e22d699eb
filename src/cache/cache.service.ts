import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InMemoryCacheService } from './in-memory-cache.service';
import { RedisCacheService } from './redis-cache.service';

export type CacheStrategy = 'redis' | 'memory';

/**
 * Cache facade used by the rest of the app. With `cache.redis.enabled`
 * Redis is primary and the in-memory cache takes over while it is down.
 */
@Injectable()
export class AppCacheService {
  private readonly logger = new Logger(AppCacheService.name);
  private readonly strategy: CacheStrategy;
  private readonly defaultTtl: number;

  constructor(
    private readonly config: ConfigService,
    private readonly redisCache: RedisCacheService,
    private readonly memoryCache: InMemoryCacheService,
  ) {
    this.strategy = this.config.get<boolean>('cache.redis.enabled', false)
      ? 'redis'
      : 'memory';
    this.defaultTtl = this.config.get<number>('cache.ttl', 300);
    this.logger.log(`Cache strategy: ${this.strategy}`);
  }

  /**
   * Returns the cached value for `key`, or runs `loader`, caches its result
   * and returns it. Loader errors are not cached.
   */
  async getOrSet<T>(
    key: string,
    loader: () => Promise<T>,
    ttlSeconds?: number,
  ): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== null) return cached;

    const value = await loader();
    await this.set(key, value, ttlSeconds);
    return value;
  }

  private async get<T>(key: string): Promise<T | null> {
    if (this.useRedis()) return this.redisCache.get<T>(key);
    return this.memoryCache.get<T>(key);
  }

  private async set(
    key: string,
    value: unknown,
    ttlSeconds?: number,
  ): Promise<void> {
    const ttl = ttlSeconds ?? this.defaultTtl;
    if (this.useRedis() && (await this.redisCache.set(key, value, ttl))) {
      return;
    }
    this.memoryCache.set(key, value, ttl);
  }

  private useRedis(): boolean {
    if (this.strategy !== 'redis') return false;
    if (this.redisCache.isConnected()) return true;
    this.logger.debug('Redis unavailable, using in-memory cache');
    return false;
  }
}
