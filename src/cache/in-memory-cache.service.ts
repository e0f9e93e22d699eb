import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

interface CacheEntry {
  data: unknown;
  expiresAt: number;
  lastAccessedAt: number;
}

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Process-local TTL cache with least-recently-used eviction once
 * `cache.max` entries are held.
 */
@Injectable()
export class InMemoryCacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(InMemoryCacheService.name);
  private readonly cache = new Map<string, CacheEntry>();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly maxSize: number;

  constructor(private readonly config: ConfigService) {
    this.maxSize = this.config.get<number>('cache.max', 500);
  }

  onModuleInit(): void {
    this.cleanupInterval = setInterval(() => this.cleanup(), CLEANUP_INTERVAL_MS);
    this.cleanupInterval.unref();
    this.logger.log(`In-memory cache initialized (max: ${this.maxSize})`);
  }

  onModuleDestroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }

  get<T>(key: string): T | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    const now = Date.now();
    if (now > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    entry.lastAccessedAt = now;
    return entry.data as T;
  }

  set(key: string, value: unknown, ttlSeconds = 300): void {
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      this.evictLRU();
    }

    const now = Date.now();
    this.cache.set(key, {
      data: value,
      expiresAt: now + ttlSeconds * 1000,
      lastAccessedAt: now,
    });
  }

  cleanup(): number {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now > entry.expiresAt) {
        this.cache.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      this.logger.debug(
        `Cleaned up ${cleaned} expired entries (${this.cache.size} remaining)`,
      );
    }
    return cleaned;
  }

  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of this.cache.entries()) {
      if (entry.lastAccessedAt < oldestTime) {
        oldestTime = entry.lastAccessedAt;
        oldestKey = key;
      }
    }

    if (oldestKey !== null) {
      this.cache.delete(oldestKey);
      this.logger.debug(`Evicted LRU entry: ${oldestKey}`);
    }
  }
}
