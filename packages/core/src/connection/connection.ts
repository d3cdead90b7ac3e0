import { randomUUID } from 'node:crypto';
import type { RawResponse, TransportRequest } from './types.js';

/**
 * One reusable transport connection to a single origin.
 * The pool liveness-checks it before every reuse.
 */
abstract class Connection {
  readonly id: string;
  readonly host: string;

  constructor(host: string) {
    this.id = randomUUID();
    this.host = host;
  }

  abstract send(request: TransportRequest): Promise<RawResponse>;
  abstract isAlive(): boolean;
  abstract close(): void;
}

type ConnectionFactory = (host: string) => Connection;

/** Pool key for a URL: scheme, host and port. */
function hostKeyFor(url: string): string {
  return new URL(url).origin;
}

export type { ConnectionFactory };
export { Connection, hostKeyFor };
