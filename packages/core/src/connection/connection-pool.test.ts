import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConnectionPool } from './connection-pool.js';
import { Connection, hostKeyFor } from './connection.js';
import type { RawResponse } from './types.js';
import { PoolExhaustedError } from '../errors.js';

class StubConnection extends Connection {
  alive = true;
  closed = false;

  async send(): Promise<RawResponse> {
    return { status: 200, headers: {}, body: new Uint8Array(0) };
  }

  isAlive(): boolean {
    return this.alive && !this.closed;
  }

  close(): void {
    this.closed = true;
  }
}

const HOST = 'https://api.example.test';

function stubPool(maxConnectionsPerHost: number, acquireTimeoutMs?: number) {
  const created: StubConnection[] = [];
  const pool = new ConnectionPool(
    (host) => {
      const connection = new StubConnection(host);
      created.push(connection);
      return connection;
    },
    { maxConnectionsPerHost, acquireTimeoutMs },
  );
  return { pool, created };
}

describe('ConnectionPool', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reuses a released connection', async () => {
    const { pool, created } = stubPool(2);

    const handle = await pool.acquire(HOST);
    pool.release(handle);
    const again = await pool.acquire(HOST);

    expect(again.connection).toBe(handle.connection);
    expect(created).toHaveLength(1);
  });

  it('creates new connections up to the per-host limit', async () => {
    const { pool } = stubPool(2);

    const first = await pool.acquire(HOST);
    const second = await pool.acquire(HOST);

    expect(first.connection).not.toBe(second.connection);
    expect(pool.stats(HOST)).toEqual({ active: 2, idle: 0, waiting: 0 });
  });

  it('keeps hosts independent', async () => {
    const { pool } = stubPool(1);

    await pool.acquire(HOST);
    const other = await pool.acquire('https://other.example.test');

    expect(other.host).toBe('https://other.example.test');
    expect(pool.stats()).toEqual({ active: 2, idle: 0, waiting: 0 });
  });

  it('hands released connections to waiters in FIFO order', async () => {
    const { pool } = stubPool(1);
    const held = await pool.acquire(HOST);
    const order: string[] = [];

    const first = pool.acquire(HOST).then((handle) => {
      order.push('first');
      return handle;
    });
    const second = pool.acquire(HOST).then((handle) => {
      order.push('second');
      return handle;
    });
    expect(pool.stats(HOST).waiting).toBe(2);

    pool.release(held);
    pool.release(await first);
    await second;

    expect(order).toEqual(['first', 'second']);
  });

  it('replaces dead idle connections before reuse', async () => {
    const { pool, created } = stubPool(1);
    const handle = await pool.acquire(HOST);
    pool.release(handle);

    created[0].alive = false;
    const fresh = await pool.acquire(HOST);

    expect(fresh.connection).not.toBe(handle.connection);
    expect(created[0].closed).toBe(true);
    expect(created).toHaveLength(2);
  });

  it('discards a broken connection on release and gives the waiter a fresh one', async () => {
    const { pool, created } = stubPool(1);
    const handle = await pool.acquire(HOST);
    const waiting = pool.acquire(HOST);

    handle.markBroken();
    pool.release(handle);
    const next = await waiting;

    expect(created[0].closed).toBe(true);
    expect(next.connection).toBe(created[1]);
    expect(pool.stats(HOST)).toEqual({ active: 1, idle: 0, waiting: 0 });
  });

  it('ignores a second release of the same handle', async () => {
    const { pool } = stubPool(1);
    const handle = await pool.acquire(HOST);

    pool.release(handle);
    pool.release(handle);

    expect(pool.stats(HOST)).toEqual({ active: 0, idle: 1, waiting: 0 });
  });

  it('fails with PoolExhaustedError after the acquire timeout', async () => {
    vi.useFakeTimers();
    const { pool } = stubPool(1, 250);
    await pool.acquire(HOST);

    const waiting = pool.acquire(HOST);
    const assertion = expect(waiting).rejects.toBeInstanceOf(PoolExhaustedError);
    await vi.advanceTimersByTimeAsync(250);

    await assertion;
    expect(pool.stats(HOST).waiting).toBe(0);
  });

  it('rejects a waiter with the abort reason', async () => {
    const { pool } = stubPool(1);
    await pool.acquire(HOST);
    const controller = new AbortController();

    const waiting = pool.acquire(HOST, { signal: controller.signal });
    controller.abort(new Error('caller gave up'));

    await expect(waiting).rejects.toThrow('caller gave up');
    expect(pool.stats(HOST).waiting).toBe(0);
  });

  it('withConnection releases on success and discards on failure', async () => {
    const { pool, created } = stubPool(1);

    const status = await pool.withConnection(HOST, async (connection) => {
      const response = await connection.send({
        method: 'GET',
        url: `${HOST}/health`,
        headers: {},
        timeoutMs: 1000,
        signal: new AbortController().signal,
      });
      return response.status;
    });
    expect(status).toBe(200);
    expect(pool.stats(HOST)).toEqual({ active: 0, idle: 1, waiting: 0 });

    await expect(
      pool.withConnection(HOST, async () => {
        throw new Error('socket hang up');
      }),
    ).rejects.toThrow('socket hang up');

    expect(created[0].closed).toBe(true);
    expect(pool.stats(HOST)).toEqual({ active: 0, idle: 0, waiting: 0 });
  });

  it('close rejects waiters and closes idle connections', async () => {
    const { pool, created } = stubPool(1);
    pool.release(await pool.acquire('https://other.example.test'));
    const held = await pool.acquire(HOST);
    const waiting = pool.acquire(HOST);

    pool.close();

    await expect(waiting).rejects.toBeInstanceOf(PoolExhaustedError);
    expect(created[0].closed).toBe(true);
    expect(created[1].closed).toBe(false);

    pool.release(held);
    expect(created[1].closed).toBe(true);
    await expect(pool.acquire(HOST)).rejects.toThrow('Connection pool is closed');
  });

  it('rejects a non-positive per-host limit', () => {
    expect(() => new ConnectionPool((host) => new StubConnection(host), { maxConnectionsPerHost: 0 })).toThrow(
      RangeError,
    );
  });
});

describe('hostKeyFor', () => {
  it('keys by scheme, host and port', () => {
    expect(hostKeyFor('https://api.example.test/v1/users?page=2')).toBe('https://api.example.test');
    expect(hostKeyFor('http://localhost:8080/health')).toBe('http://localhost:8080');
  });
});
