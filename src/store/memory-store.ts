/**
 * In-process rate limit store
 *
 * Runs the `run` form of each transaction synchronously, so no other caller
 * interleaves with it on the event loop. Suitable for a single process and
 * for tests; state is not shared between processes.
 */

import { StoreUnavailableError } from '../errors.js';
import type {
  IRateLimitStore,
  WindowArguments,
  WindowReply,
  WindowTransaction,
} from '../interfaces/rate-limit-store.js';
import type { WindowKeys } from '../keys/key-space.js';
import { normalizeError } from '../utils/utils.js';
import { MemoryKeyspace } from './memory-keyspace.js';

export interface MemoryRateLimitStoreOptions {
  /** Clock in epoch seconds (default: wall clock) */
  clock?: () => number;
}

export function systemClock(): number {
  return Math.floor(Date.now() / 1000);
}

export class MemoryRateLimitStore implements IRateLimitStore {
  private readonly keyspace = new MemoryKeyspace();
  private readonly clock: () => number;
  private closed = false;

  constructor(options: MemoryRateLimitStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async execute(transaction: WindowTransaction, keys: WindowKeys, args: WindowArguments): Promise<WindowReply> {
    this.ensureOpen();
    try {
      return transaction.run(this.keyspace.view(this.clock()), keys, args);
    } catch (error: unknown) {
      throw new StoreUnavailableError(`Transaction ${transaction.name} failed: ${normalizeError(error).message}`, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.keyspace.clear();
  }

  // Inspection helpers (tests, debugging)

  get(key: string): string | null {
    return this.keyspace.get(key, this.clock());
  }

  hget(key: string, field: string): string | null {
    return this.keyspace.hget(key, field, this.clock());
  }

  ttl(key: string): number {
    return this.keyspace.ttl(key, this.clock());
  }

  zcard(key: string): number {
    return this.keyspace.zcard(key, this.clock());
  }

  keys(): string[] {
    return this.keyspace.keys(this.clock());
  }

  /** Entries held, including expired ones not yet swept */
  get size(): number {
    return this.keyspace.size;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError('Memory store is closed');
    }
  }
}
