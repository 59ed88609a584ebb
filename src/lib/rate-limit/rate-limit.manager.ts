/**
 * Rate Limit Manager
 * Sliding-window limiting for API clients, kept in Redis with an in-memory fallback
 */

import type Redis from 'ioredis';
import { redisConnection } from '../redis/redis.connection';
import { errorMessage } from '../crawling/crawl-errors';
import { RateLimitConfig, RateLimitResult, RateLimitStats } from './rate-limit.types';

const KEY_PREFIX = 'rate_limit:';

interface MemoryLimitEntry {
  timestamps: number[];
  resetTime: number;
}

export interface RedisClientSource {
  getClient(): Redis | null;
  isAvailable(): boolean;
}

export class RateLimitManager {
  private memoryLimits: Map<string, MemoryLimitEntry> = new Map();
  private stats = {
    totalRequests: 0,
    blockedRequests: 0,
  };
  private cleanupInterval: NodeJS.Timeout;

  constructor(
    private readonly redis: RedisClientSource = redisConnection,
    private readonly now: () => number = Date.now
  ) {
    this.cleanupInterval = setInterval(() => {
      this.cleanupExpiredEntries();
    }, 60000);
    this.cleanupInterval.unref();
  }

  /**
   * Record a request for key and report whether it fits the window
   */
  async checkLimit(key: string, config: RateLimitConfig): Promise<RateLimitResult> {
    this.stats.totalRequests++;

    const now = this.now();
    const windowStart = now - config.windowMs;

    const redisClient = this.redis.getClient();
    if (redisClient) {
      try {
        return await this.checkLimitRedis(redisClient, key, config, now, windowStart);
      } catch (error) {
        console.error('Redis rate limit check error, using memory:', errorMessage(error));
      }
    }

    return this.checkLimitMemory(key, config, now, windowStart);
  }

  private async checkLimitRedis(
    redisClient: Redis,
    key: string,
    config: RateLimitConfig,
    now: number,
    windowStart: number
  ): Promise<RateLimitResult> {
    const redisKey = `${KEY_PREFIX}${key}`;

    const results = await redisClient
      .pipeline()
      .zremrangebyscore(redisKey, 0, windowStart)
      .zcard(redisKey)
      .zadd(redisKey, now, `${now}-${Math.random()}`)
      .pexpire(redisKey, config.windowMs)
      .exec();

    const countReply = results?.[1];
    if (!countReply || countReply[0] || typeof countReply[1] !== 'number') {
      throw new Error('unexpected ZCARD reply');
    }

    const newCount = countReply[1] + 1;
    const allowed = newCount <= config.maxRequests;
    if (!allowed) {
      this.stats.blockedRequests++;
    }

    return {
      allowed,
      remaining: Math.max(0, config.maxRequests - newCount),
      resetTime: now + config.windowMs,
      totalRequests: newCount,
    };
  }

  private checkLimitMemory(
    key: string,
    config: RateLimitConfig,
    now: number,
    windowStart: number
  ): RateLimitResult {
    const resetTime = now + config.windowMs;
    const entry = this.memoryLimits.get(key) ?? { timestamps: [], resetTime };

    entry.timestamps = entry.timestamps.filter((ts) => ts > windowStart);
    entry.resetTime = resetTime;
    this.memoryLimits.set(key, entry);

    const allowed = entry.timestamps.length < config.maxRequests;
    if (allowed) {
      entry.timestamps.push(now);
    } else {
      this.stats.blockedRequests++;
    }

    return {
      allowed,
      remaining: Math.max(0, config.maxRequests - entry.timestamps.length),
      resetTime,
      totalRequests: entry.timestamps.length,
    };
  }

  /**
   * Counters since startup, reported on /health
   */
  getStats(): RateLimitStats {
    return {
      totalRequests: this.stats.totalRequests,
      blockedRequests: this.stats.blockedRequests,
      activeKeys: this.memoryLimits.size,
      redisAvailable: this.redis.isAvailable(),
    };
  }

  private cleanupExpiredEntries(): void {
    const now = this.now();
    for (const [key, entry] of this.memoryLimits.entries()) {
      if (entry.resetTime < now) {
        this.memoryLimits.delete(key);
      }
    }
  }

  destroy(): void {
    clearInterval(this.cleanupInterval);
    this.memoryLimits.clear();
  }
}

export const rateLimitManager = new RateLimitManager();
