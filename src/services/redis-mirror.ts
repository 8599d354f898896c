/**
 * Redis Snapshot Mirror
 *
 * Writes each published snapshot to a Redis key (with a TTL so a dead
 * monitor's data expires) and announces it on a pub/sub channel, for
 * consumers that read Redis instead of the HTTP API.
 */

import { Redis } from 'ioredis';
import type { StatusSnapshot } from '../types.js';
import type { SnapshotSubscriber } from '../tasks/broadcaster.js';
import { log } from '../logger.js';

/** Redis key holding the latest snapshot */
export const STATUS_KEY = 'monitor:status:latest';
/** Channel each snapshot is published on */
export const STATUS_CHANNEL = 'monitor:status';
const STATUS_TTL_SECONDS = 60;

/** The subset of an ioredis client the mirror uses */
export interface MirrorClient {
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  publish(channel: string, message: string): Promise<unknown>;
}

export class RedisSnapshotMirror implements SnapshotSubscriber {
  readonly name = 'redis-mirror';

  constructor(private readonly client: MirrorClient) {}

  async publish(snapshot: StatusSnapshot): Promise<void> {
    const payload = JSON.stringify(snapshot);
    await this.client.set(STATUS_KEY, payload, 'EX', STATUS_TTL_SECONDS);
    await this.client.publish(STATUS_CHANNEL, payload);
  }
}

/**
 * Connect to Redis for mirroring. Errors are logged once per outage;
 * ioredis keeps reconnecting in the background.
 */
export function createRedisClient(url: string): Redis {
  let available = true;

  const redis = new Redis(url, {
    maxRetriesPerRequest: 1,
    connectTimeout: 5000,
    commandTimeout: 3000,
    retryStrategy: (times: number) => Math.min(times * 200, 5000),
  });

  redis.on('error', (err: Error) => {
    if (available) {
      log(`[RedisMirror] Redis error: ${err.message}`);
      available = false;
    }
  });

  redis.on('connect', () => {
    if (!available) {
      log('[RedisMirror] Redis reconnected');
    }
    available = true;
  });

  return redis;
}
