import { createLogger } from '@rest-engine/logger';
import { PoolExhaustedError, toError } from '../errors.js';
import type { Connection, ConnectionFactory } from './connection.js';
import type { AcquireConnectionOptions, ConnectionPoolConfig, PoolStats } from './types.js';

const poolLog = createLogger('ConnectionPool');

type Waiter = {
  resolve: (handle: ConnectionHandle) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
};

type HostBucket = {
  idle: Connection[];
  active: Set<Connection>;
  waiters: Waiter[];
};

/**
 * Exclusive hold on a pooled connection. Mark it broken when the transport
 * failed so `release` discards the connection instead of reusing it.
 */
export class ConnectionHandle {
  readonly host: string;
  readonly connection: Connection;
  private brokenFlag = false;
  private releasedFlag = false;

  constructor(host: string, connection: Connection) {
    this.host = host;
    this.connection = connection;
  }

  markBroken(): void {
    this.brokenFlag = true;
  }

  get broken(): boolean {
    return this.brokenFlag;
  }

  /** @internal */
  settle(): boolean {
    if (this.releasedFlag) {
      return false;
    }
    this.releasedFlag = true;
    return true;
  }
}

/**
 * Per-host pool of reusable connections. At most `maxConnectionsPerHost`
 * connections exist per host; callers beyond that wait in FIFO order.
 */
export class ConnectionPool {
  private readonly buckets: Map<string, HostBucket>;
  private readonly factory: ConnectionFactory;
  private readonly maxPerHost: number;
  private readonly acquireTimeoutMs: number | undefined;
  private closed: boolean;

  constructor(factory: ConnectionFactory, config?: Partial<ConnectionPoolConfig>) {
    const maxPerHost = config?.maxConnectionsPerHost ?? 5;

    if (!Number.isInteger(maxPerHost) || maxPerHost < 1) {
      throw new RangeError(`maxConnectionsPerHost must be a positive integer, got ${maxPerHost}`);
    }

    this.factory = factory;
    this.maxPerHost = maxPerHost;
    this.acquireTimeoutMs = config?.acquireTimeoutMs;
    this.buckets = new Map();
    this.closed = false;
  }

  acquire(host: string, options: AcquireConnectionOptions = {}): Promise<ConnectionHandle> {
    const { signal } = options;

    if (this.closed) {
      return Promise.reject(new PoolExhaustedError(host, 'Connection pool is closed'));
    }

    if (signal?.aborted) {
      return Promise.reject(toError(signal.reason));
    }

    const bucket = this.bucketFor(host);
    const connection = this.takeIdle(bucket) ?? this.createIfRoom(host, bucket);

    if (connection) {
      bucket.active.add(connection);
      return Promise.resolve(new ConnectionHandle(host, connection));
    }

    return new Promise<ConnectionHandle>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => {
          if (timer !== undefined) {
            clearTimeout(timer);
          }
          signal?.removeEventListener('abort', onAbort);
        },
      };

      const abandon = (error: Error): void => {
        const index = bucket.waiters.indexOf(waiter);
        if (index === -1) {
          return;
        }
        bucket.waiters.splice(index, 1);
        waiter.cleanup();
        reject(error);
      };

      const onAbort = (): void => {
        abandon(toError(signal?.reason));
      };

      if (this.acquireTimeoutMs !== undefined) {
        const timeoutMs = this.acquireTimeoutMs;
        timer = setTimeout(() => {
          abandon(
            new PoolExhaustedError(
              host,
              `No connection to ${host} became available within ${timeoutMs}ms`,
            ),
          );
        }, timeoutMs);
      }

      signal?.addEventListener('abort', onAbort, { once: true });
      bucket.waiters.push(waiter);
    });
  }

  /**
   * Returns the connection to the pool, or discards it when it is broken or
   * no longer alive. A freed slot goes to the longest waiting caller.
   */
  release(handle: ConnectionHandle): void {
    if (!handle.settle()) {
      return;
    }

    const bucket = this.buckets.get(handle.host);
    const { connection } = handle;

    if (!bucket || !bucket.active.delete(connection)) {
      connection.close();
      return;
    }

    const reusable = !this.closed && !handle.broken && connection.isAlive();

    if (!reusable) {
      poolLog.debug(`Discarding connection ${connection.id} to ${handle.host}`);
      connection.close();
    }

    const waiter = bucket.waiters.shift();

    if (waiter) {
      waiter.cleanup();
      const next = reusable ? connection : this.factory(handle.host);
      bucket.active.add(next);
      waiter.resolve(new ConnectionHandle(handle.host, next));
      return;
    }

    if (reusable) {
      bucket.idle.push(connection);
    }
  }

  /** Runs `task` on a pooled connection; a thrown error marks the connection broken. */
  async withConnection<T>(
    host: string,
    task: (connection: Connection) => Promise<T>,
    options: AcquireConnectionOptions = {},
  ): Promise<T> {
    const handle = await this.acquire(host, options);

    try {
      return await task(handle.connection);
    } catch (error) {
      handle.markBroken();
      throw error;
    } finally {
      this.release(handle);
    }
  }

  stats(host?: string): PoolStats {
    const buckets = host === undefined ? [...this.buckets.values()] : [this.buckets.get(host)];

    return buckets.reduce<PoolStats>(
      (total, bucket) =>
        bucket
          ? {
              active: total.active + bucket.active.size,
              idle: total.idle + bucket.idle.length,
              waiting: total.waiting + bucket.waiters.length,
            }
          : total,
      { active: 0, idle: 0, waiting: 0 },
    );
  }

  /** Closes every connection and rejects pending acquirers. Handles still out are closed on release. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const [host, bucket] of this.buckets) {
      for (const waiter of bucket.waiters.splice(0)) {
        waiter.cleanup();
        waiter.reject(new PoolExhaustedError(host, 'Connection pool is closed'));
      }

      for (const connection of bucket.idle.splice(0)) {
        connection.close();
      }
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private bucketFor(host: string): HostBucket {
    let bucket = this.buckets.get(host);

    if (!bucket) {
      bucket = { idle: [], active: new Set(), waiters: [] };
      this.buckets.set(host, bucket);
    }

    return bucket;
  }

  private takeIdle(bucket: HostBucket): Connection | undefined {
    let candidate = bucket.idle.pop();

    while (candidate) {
      if (candidate.isAlive()) {
        return candidate;
      }
      poolLog.debug(`Replacing dead connection ${candidate.id} to ${candidate.host}`);
      candidate.close();
      candidate = bucket.idle.pop();
    }

    return undefined;
  }

  private createIfRoom(host: string, bucket: HostBucket): Connection | undefined {
    if (bucket.active.size + bucket.idle.length >= this.maxPerHost) {
      return undefined;
    }

    return this.factory(host);
  }
}
