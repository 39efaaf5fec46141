import { Injectable } from '@nestjs/common';
import { RedisPoolService } from '../../redis/redis-pool.service';
import { HealthProbe } from './health-probe.interface';

/**
 * Reads the cache client's connection-state flag instead of sending PING.
 *
 * Known limitation: the flag only changes when the client notices a dropped
 * connection, so a connection lost moments ago can still read as healthy.
 */
@Injectable()
export class CacheProbe implements HealthProbe {
  readonly name = 'redis';
  readonly route = 'redis';

  constructor(private readonly redisPool: RedisPoolService) {}

  async check(): Promise<boolean> {
    return this.redisPool.isOpen();
  }
}
