import { createClient } from 'redis';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

/**
 * Exclusive write access to the case store. One writer at a time, across processes.
 */
export interface StoreLock {
  /** A token proving ownership, or null when another writer holds the lock */
  acquire(): Promise<string | null>;
  release(token: string): Promise<void>;
}

// Delete the key only if it still holds our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

export interface StoreLockConnectOptions {
  connectTimeoutMs: number;
  /** Reconnect attempts before `connect` gives up and rejects */
  maxReconnectAttempts: number;
}

const DEFAULT_CONNECT_OPTIONS: StoreLockConnectOptions = {
  connectTimeoutMs: 5000,
  maxReconnectAttempts: 3,
};

/**
 * Backoff for the Redis socket. Returning an Error stops reconnecting and
 * rejects the pending `connect`, so an unreachable server fails the document
 * instead of stalling it.
 */
export function boundedReconnectStrategy(maxAttempts: number): (retries: number) => number | Error {
  return retries => {
    if (retries >= maxAttempts) {
      return new Error(`Store lock could not reach Redis after ${retries} attempts`);
    }
    return Math.min((retries + 1) * 100, 1000);
  };
}

/**
 * Redis-backed lock: SET NX PX to acquire, compare-and-delete to release.
 * The TTL frees the lock if a writer dies mid-merge.
 */
export class RedisStoreLock implements StoreLock {
  private redis: ReturnType<typeof createClient>;
  private isConnected: boolean = false;

  constructor(
    redisUrl: string,
    private readonly key: string,
    private readonly ttlMs: number,
    options: Partial<StoreLockConnectOptions> = {}
  ) {
    const connect = { ...DEFAULT_CONNECT_OPTIONS, ...options };
    this.redis = createClient({
      url: redisUrl,
      socket: {
        connectTimeout: connect.connectTimeoutMs,
        reconnectStrategy: boundedReconnectStrategy(connect.maxReconnectAttempts),
      },
    });

    this.redis.on('error', err => {
      logger.error({ error: err }, 'Redis error in store lock');
      this.isConnected = false;
    });

    this.redis.on('connect', () => {
      logger.debug('Store lock connected to Redis');
      this.isConnected = true;
    });
  }

  async connect(): Promise<void> {
    if (!this.isConnected && !this.redis.isOpen) {
      await this.redis.connect();
    }
  }

  async disconnect(): Promise<void> {
    if (this.redis.isOpen) {
      await this.redis.quit();
      this.isConnected = false;
    }
  }

  async acquire(): Promise<string | null> {
    await this.connect();
    const token = uuidv4();
    const result = await this.redis.set(this.key, token, { NX: true, PX: this.ttlMs });
    if (result !== 'OK') {
      logger.warn({ key: this.key }, 'Store lock is held by another writer');
      return null;
    }
    logger.debug({ key: this.key, ttlMs: this.ttlMs }, 'Store lock acquired');
    return token;
  }

  async release(token: string): Promise<void> {
    const released = await this.redis.eval(RELEASE_SCRIPT, { keys: [this.key], arguments: [token] });
    if (released !== 1) {
      logger.warn({ key: this.key }, 'Store lock had already expired or changed owner');
    }
  }
}
