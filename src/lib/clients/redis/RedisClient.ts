import Redis from 'ioredis';
import { CacheError, errorMessage, toError } from '../../utils/errors';
import logger from '../../utils/logger';
import { cacheHits, cacheMisses } from '../../utils/metrics';

export interface RedisConfig {
  host: string;
  port: number;
  password: string;
}

export class RedisClient {
  private client: Redis | null = null;

  constructor(private readonly redisConfig: RedisConfig) {}

  /**
   * Connect to Redis
   */
  async connect(): Promise<void> {
    try {
      this.client = new Redis({
        host: this.redisConfig.host,
        port: this.redisConfig.port,
        password: this.redisConfig.password || undefined,
        lazyConnect: true,
        retryStrategy: (times) => Math.min(times * 50, 2000),
      });

      this.client.on('error', (error: Error) => {
        logger.error('Redis error', { error: error.message });
      });

      this.client.on('connect', () => {
        logger.info('Connected to Redis');
      });

      await this.client.connect();
      await this.client.ping();
    } catch (error) {
      logger.error('Failed to connect to Redis', { error: errorMessage(error) });
      throw new CacheError('Failed to connect to Redis', toError(error));
    }
  }

  /**
   * Get value from cache
   */
  async get(key: string, cacheType: string = 'generic'): Promise<string | null> {
    const client = this.requireClient();

    try {
      const value = await client.get(key);

      if (value !== null) {
        cacheHits.inc({ cache_type: cacheType });
      } else {
        cacheMisses.inc({ cache_type: cacheType });
      }

      return value;
    } catch (error) {
      logger.error('Redis GET error', { key, error: errorMessage(error) });
      throw new CacheError('Failed to get from cache', toError(error));
    }
  }

  /**
   * Set value in cache with TTL
   */
  async setex(key: string, ttl: number, value: string): Promise<void> {
    const client = this.requireClient();

    try {
      await client.setex(key, ttl, value);
    } catch (error) {
      logger.error('Redis SETEX error', { key, ttl, error: errorMessage(error) });
      throw new CacheError('Failed to set cache', toError(error));
    }
  }

  /**
   * Delete key from cache
   */
  async del(key: string): Promise<void> {
    const client = this.requireClient();

    try {
      await client.del(key);
    } catch (error) {
      logger.error('Redis DEL error', { key, error: errorMessage(error) });
      throw new CacheError('Failed to delete from cache', toError(error));
    }
  }

  /**
   * Ping Redis to check connection
   */
  async ping(): Promise<string> {
    const client = this.requireClient();

    try {
      return await client.ping();
    } catch (error) {
      logger.error('Redis PING error', { error: errorMessage(error) });
      throw new CacheError('Failed to ping Redis', toError(error));
    }
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      logger.info('Disconnected from Redis');
    }
  }

  private requireClient(): Redis {
    if (!this.client) {
      throw new CacheError('Redis client not connected');
    }
    return this.client;
  }
}
