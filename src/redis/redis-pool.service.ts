import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { maskCredentials } from '../common/utils/mask-credentials';

export interface RedisPoolConfig {
  url: string;
  connectTimeout: number;
}

const MAX_RECONNECT_DELAY_MS = 2000;

/**
 * Owns the shared cache connection.
 * Startup never fails because the cache is down: the error is logged and the
 * client keeps reconnecting in the background.
 */
@Injectable()
export class RedisPoolService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisPoolService.name);
  private client: Redis | null = null;
  private readonly config: RedisPoolConfig;
  private isConnected = false;
  private connectionPromise: Promise<boolean> | null = null;

  constructor(private readonly configService: ConfigService) {
    this.config = {
      url: this.configService.get<string>('REDIS_URL', 'redis://localhost:6379'),
      connectTimeout: this.configService.get<number>('REDIS_CONNECT_TIMEOUT_MS', 5000),
    };
  }

  async onModuleInit(): Promise<void> {
    await this.connect();
  }

  async onModuleDestroy(): Promise<void> {
    await this.disconnect();
  }

  /**
   * Connection-state flag maintained from client events.
   *
   * No command is sent, so a connection that dropped without the client
   * noticing yet still reads as open.
   */
  isOpen(): boolean {
    return this.client !== null && this.isConnected;
  }

  /**
   * Connect to Redis (idempotent - safe to call multiple times)
   */
  async connect(): Promise<boolean> {
    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    if (this.isConnected && this.client) {
      return true;
    }

    this.connectionPromise = this.doConnect();
    const result = await this.connectionPromise;
    this.connectionPromise = null;
    return result;
  }

  private async doConnect(): Promise<boolean> {
    if (!this.client) {
      this.client = this.createClient();
    }

    try {
      await this.client.connect();
      this.isConnected = true;
      this.logger.log(`Connected to Redis at ${maskCredentials(this.config.url)}`);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to connect to Redis: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      this.isConnected = false;
      return false;
    }
  }

  private createClient(): Redis {
    const client = new Redis(this.config.url, {
      lazyConnect: true,
      connectTimeout: this.config.connectTimeout,
      maxRetriesPerRequest: 1,
      enableReadyCheck: true,
      retryStrategy: (times) => Math.min(times * 200, MAX_RECONNECT_DELAY_MS),
    });

    client.on('error', (err: Error) => {
      this.logger.error(`Redis client error: ${err.message}`);
    });

    client.on('ready', () => {
      this.isConnected = true;
    });

    client.on('close', () => {
      if (this.isConnected) {
        this.logger.warn('Redis connection closed');
      }
      this.isConnected = false;
    });

    client.on('reconnecting', () => {
      this.logger.debug('Redis reconnecting...');
    });

    return client;
  }

  async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }

    const client = this.client;
    const wasConnected = this.isConnected;
    this.isConnected = false;
    try {
      if (wasConnected) {
        await client.quit();
      } else {
        client.disconnect();
      }
      this.logger.log('Redis connection closed on shutdown');
    } catch (error) {
      this.logger.warn(
        `Error disconnecting Redis: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    } finally {
      this.client = null;
      this.isConnected = false;
    }
  }
}
