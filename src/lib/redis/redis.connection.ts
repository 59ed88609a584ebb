/**
 * Redis Connection Manager
 * Singleton for the shared Redis client used by API rate limiting
 */

import Redis, { RedisOptions } from 'ioredis';
import { env } from '../../config/env';

export class RedisConnection {
  private client: Redis | null = null;
  private connectionAttempts: number = 0;
  private readonly maxConnectionAttempts: number = 5;

  constructor(
    private readonly url: string | undefined = env.REDIS_URL,
    private readonly enabled: boolean = env.REDIS_ENABLED
  ) {}

  /**
   * Ready client, or null while connecting or when Redis is not in use
   */
  getClient(): Redis | null {
    if (!this.client) {
      this.connect();
    }

    if (this.client && this.client.status === 'ready') {
      return this.client;
    }

    return null;
  }

  /**
   * Connect to Redis
   */
  private connect(): void {
    if (!this.enabled || !this.url) {
      return;
    }

    if (this.connectionAttempts >= this.maxConnectionAttempts) {
      return;
    }

    this.connectionAttempts++;

    const options: RedisOptions = {
      retryStrategy: (times: number) => {
        if (times > this.maxConnectionAttempts) {
          console.error('Max Redis connection attempts reached, rate limiting uses in-memory fallback');
          return null;
        }
        return Math.min(times * 50, 2000);
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      lazyConnect: false,
    };

    if (env.REDIS_PASSWORD) {
      options.password = env.REDIS_PASSWORD;
    }
    options.db = env.REDIS_DB;

    const client = new Redis(this.url, options);

    client.on('ready', () => {
      console.log('Redis: Connected and ready');
      this.connectionAttempts = 0;
    });

    client.on('error', (error: Error) => {
      console.error('Redis error:', error.message);
    });

    client.on('end', () => {
      console.log('Redis: Connection closed');
      if (this.client === client) {
        this.client = null;
      }
    });

    this.client = client;
  }

  /**
   * Health check - ping Redis server
   */
  async healthCheck(): Promise<boolean> {
    const client = this.getClient();
    if (!client) {
      return false;
    }

    try {
      const result = await client.ping();
      return result === 'PONG';
    } catch (error) {
      console.error('Redis health check failed:', error);
      return false;
    }
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.quit();
    }
  }

  isAvailable(): boolean {
    return this.getClient() !== null;
  }
}

export const redisConnection = new RedisConnection();
