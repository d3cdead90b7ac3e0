import type { HttpMethod } from '../types.js';

type TransportRequest = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Uint8Array | string;
  /** Per-attempt limit; the signal bounds the send either way. */
  timeoutMs?: number;
  signal: AbortSignal;
};

type RawResponse = {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
};

type ConnectionPoolConfig = {
  maxConnectionsPerHost: number;
  /** How long `acquire` may wait for a free slot before `PoolExhaustedError`. */
  acquireTimeoutMs?: number;
};

type PoolStats = {
  active: number;
  idle: number;
  waiting: number;
};

type AcquireConnectionOptions = {
  signal?: AbortSignal;
};

export type {
  TransportRequest,
  RawResponse,
  ConnectionPoolConfig,
  PoolStats,
  AcquireConnectionOptions,
};
