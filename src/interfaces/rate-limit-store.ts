/**
 * Rate Limit Store Interface
 *
 * The shared state behind every strategy. A store runs one window
 * transaction at a time per call, atomically: no other caller may observe
 * or interleave with its read-decide-write sequence.
 *
 * Two execution forms exist for each transaction:
 * - `lua`: sent to Redis and run server-side (EVALSHA)
 * - `run`: executed synchronously against an in-process keyspace
 *
 * Both forms read the clock once and share the offense routine.
 */

import type { WindowKeys } from '../keys/key-space.js';

/**
 * Synchronous keyspace operations available inside a transaction.
 *
 * Semantics follow the Redis commands of the same name. `time()` returns
 * the single clock reading of the transaction in epoch seconds.
 */
export interface KeyspaceOps {
  time(): number;
  get(key: string): string | null;
  incr(key: string): number;
  set(key: string, value: string, ttlSeconds: number): void;
  expire(key: string, seconds: number): void;
  expireAt(key: string, epochSeconds: number): void;
  /** Remaining seconds, -1 without expiry, -2 when missing */
  ttl(key: string): number;
  hincrby(key: string, field: string, increment: number): number;
  hset(key: string, field: string, value: string): void;
  zadd(key: string, score: number, member: string): void;
  /** Remove members with `score <= maxScore` */
  zremRangeByScore(key: string, maxScore: number): void;
  zcard(key: string): number;
  /** Lowest score, or null when the set is empty */
  zlowestScore(key: string): number | null;
}

/**
 * Ban arguments as the transaction sees them. `threshold` 0 disables
 * offense bookkeeping.
 */
export interface BanArguments {
  threshold: number;
  initialBanSeconds: number;
  maxBanSeconds: number;
  decaySeconds: number;
}

export interface WindowArguments {
  limit: number;
  windowSeconds: number;
  ban: BanArguments;
  /** Unique member for logged events (sliding log only, empty otherwise) */
  member: string;
}

/**
 * Reply of one window transaction
 */
export interface WindowReply {
  allowed: boolean;
  remaining: number;
  resetAt: number;
  banTtl: number;
  now: number;
  banIssued: boolean;
}

export interface WindowTransaction {
  /** Stable name, used in logs and metrics */
  readonly name: string;
  /** Server-side form; KEYS = [counter, ban, meta], ARGV per `toScriptArguments` */
  readonly lua: string;
  /** In-process form; must not yield (no await) */
  run(ops: KeyspaceOps, keys: WindowKeys, args: WindowArguments): WindowReply;
}

export interface IRateLimitStore {
  /**
   * Runs a window transaction atomically
   *
   * @throws {StoreUnavailableError} If the store cannot complete the transaction
   */
  execute(transaction: WindowTransaction, keys: WindowKeys, args: WindowArguments): Promise<WindowReply>;

  /**
   * Releases connections; further calls fail with StoreUnavailableError
   */
  close(): Promise<void>;
}
