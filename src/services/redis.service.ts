import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient } from 'redis';
import { getRedisConfig } from '../config/redis.config';

type RedisClient = ReturnType<typeof createClient>;

const CONNECT_TIMEOUT_MS = 5000;

/**
 * RedisService - optional Redis connection used for rate-limit counters.
 *
 * Flow:
 * 1. On module init, attempts to connect
 * 2. If that fails, logs a warning and the app runs without Redis
 * 3. Every operation checks the connection and returns a neutral value
 *    (counter 0, no-op) when Redis is not available
 */
@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: RedisClient | null = null;
  private isConnected = false;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    await this.initializeRedis();
  }

  async onModuleDestroy(): Promise<void> {
    await this.disconnect();
  }

  private async initializeRedis(): Promise<void> {
    const options = getRedisConfig(this.configService);
    const client = createClient(options);
    client.on('error', (err: Error) => {
      if (this.isConnected) {
        this.logger.error(`Redis client error: ${err.message}`);
      }
      this.isConnected = false;
    });

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        client.connect(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error('Redis connection timeout')),
            CONNECT_TIMEOUT_MS,
          );
        }),
      ]);
      this.client = client;
      this.isConnected = true;
      this.logger.log('Redis client connected');
    } catch (error) {
      this.isConnected = false;
      this.logger.warn(
        `Redis connection failed, rate limiting disabled: ${error instanceof Error ? error.message : String(error)}`,
      );
      if (client.isOpen) {
        await client.disconnect();
      }
    } finally {
      clearTimeout(timer);
    }
  }

  async disconnect(): Promise<void> {
    if (!this.client || !this.isConnected) return;
    try {
      await this.client.disconnect();
      this.logger.log('Redis client disconnected');
    } catch (error) {
      this.logger.error('Error disconnecting Redis client', error instanceof Error ? error.stack : undefined);
    } finally {
      this.isConnected = false;
      this.client = null;
    }
  }

  isRedisAvailable(): boolean {
    return this.isConnected;
  }

  /**
   * Increment a counter. Returns 0 if Redis is not available.
   */
  async incr(key: string): Promise<number> {
    if (!this.client || !this.isConnected) return 0;
    try {
      return await this.client.incr(key);
    } catch (error) {
      this.logger.error(`Error incrementing key ${key}`, error instanceof Error ? error.stack : undefined);
      return 0;
    }
  }

  async expire(key: string, seconds: number): Promise<void> {
    if (!this.client || !this.isConnected) return;
    try {
      await this.client.expire(key, seconds);
    } catch (error) {
      this.logger.error(`Error setting expire for key ${key}`, error instanceof Error ? error.stack : undefined);
    }
  }

  /** Round-trip check for the health endpoint. */
  async ping(): Promise<boolean> {
    if (!this.client || !this.isConnected) return false;
    try {
      return (await this.client.ping()) === 'PONG';
    } catch {
      return false;
    }
  }
}
