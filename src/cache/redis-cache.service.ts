import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Redis-backed cache. Every operation degrades to a miss (or `false`) while
 * the connection is down; AppCacheService decides what to do about it.
 */
@Injectable()
export class RedisCacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisCacheService.name);
  private redis: Redis | null = null;
  private ready = false;
  private readonly maxReconnectAttempts = 10;

  constructor(private readonly config: ConfigService) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.get<boolean>('cache.redis.enabled', false)) return;

    const redisUrl = this.config.get<string | null>('cache.redis.url', null);
    if (!redisUrl) {
      this.logger.warn('REDIS_URL not configured. Redis cache is disabled.');
      return;
    }

    const options: RedisOptions = {
      retryStrategy: (times: number): number | null => {
        if (times > this.maxReconnectAttempts) {
          this.logger.error(
            `Max reconnect attempts (${this.maxReconnectAttempts}) reached. Giving up.`,
          );
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      maxRetriesPerRequest: 3,
      enableOfflineQueue: false,
      connectTimeout: 10000,
      commandTimeout: 5000,
    };

    try {
      this.redis = new Redis(redisUrl, options);
      this.redis.on('ready', () => {
        this.ready = true;
        this.logger.log('Redis ready');
      });
      this.redis.on('error', (error: Error) => {
        this.ready = false;
        this.logger.error(`Redis connection error: ${error.message}`);
      });
      this.redis.on('end', () => {
        this.ready = false;
        this.logger.warn('Redis connection ended');
      });

      await this.redis.ping();
      this.ready = true;
    } catch (error) {
      this.logger.error(`Failed to initialize Redis: ${errorMessage(error)}`);
      this.redis?.disconnect();
      this.redis = null;
      this.ready = false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.error(`Error closing Redis: ${errorMessage(error)}`);
      this.redis.disconnect();
    } finally {
      this.redis = null;
      this.ready = false;
    }
  }

  isConnected(): boolean {
    return this.ready && this.redis !== null && this.redis.status === 'ready';
  }

  async get<T>(key: string): Promise<T | null> {
    if (!this.redis || !this.isConnected()) return null;

    try {
      const value = await this.redis.get(key);
      return value === null ? null : (JSON.parse(value) as T);
    } catch (error) {
      this.logger.error(`Failed to get "${key}": ${errorMessage(error)}`);
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds = 300): Promise<boolean> {
    if (!this.redis || !this.isConnected()) return false;

    try {
      const result = await this.redis.setex(
        key,
        ttlSeconds,
        JSON.stringify(value),
      );
      return result === 'OK';
    } catch (error) {
      this.logger.error(`Failed to set "${key}": ${errorMessage(error)}`);
      return false;
    }
  }
}
