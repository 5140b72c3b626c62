/**
 * Redis Rate Limit Store
 *
 * Shares rate limit state across every process pointed at the same Redis.
 * Each window transaction runs as one Lua script, so the ban check, the
 * counting decision and the offense bookkeeping are atomic on the server.
 *
 * Scripts are addressed by their SHA-1, computed locally. A NOSCRIPT reply
 * (fresh server, SCRIPT FLUSH, failover) loads the script and retries once.
 *
 * Any client failure surfaces as StoreUnavailableError; nothing here decides
 * whether to fail open or closed.
 */

import AsyncLock from 'async-lock';
import { createClient, type RedisClientType } from 'redis';
import { z } from 'zod';
import { DEFAULT_CONNECT_TIMEOUT_MS } from '../constants.js';
import { StoreUnavailableError } from '../errors.js';
import type {
  IRateLimitStore,
  WindowArguments,
  WindowReply,
  WindowTransaction,
} from '../interfaces/rate-limit-store.js';
import type { WindowKeys } from '../keys/key-space.js';
import { toScriptArguments } from '../strategies/window-script.js';
import { digestHex, normalizeError } from '../utils/utils.js';

export interface RedisRateLimitStoreOptions {
  /**
   * Redis connection URL
   * Format: redis://[username:password@]host:port[/database]
   */
  redisUrl: string;

  /** Connect timeout in milliseconds (default: 1000) */
  connectTimeoutMs?: number;

  /** Pre-built client (tests, shared connections); `redisUrl` is then unused */
  client?: RedisClientType;
}

const int = z.number().int();

/** { allowed, remaining, resetAt, banTtl, now, banIssued } */
const ScriptReplySchema = z.tuple([int, int, int, int, int, int]);

export class RedisRateLimitStore implements IRateLimitStore {
  private readonly client: RedisClientType;
  private readonly scriptLock = new AsyncLock();
  private readonly shas = new Map<string, string>();

  constructor(options: RedisRateLimitStoreOptions) {
    this.client =
      options.client ??
      createClient({
        url: options.redisUrl,
        socket: {
          reconnectStrategy: false,
          connectTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        },
      });

    this.client.on('error', (err: unknown) => {
      console.error(`[RedisRateLimitStore] Redis client error: ${normalizeError(err).message}`);
    });
  }

  /**
   * Opens the connection (no-op when already open)
   *
   * @throws {StoreUnavailableError} If Redis cannot be reached
   */
  async connect(): Promise<void> {
    if (this.client.isOpen) return;
    try {
      await this.client.connect();
      console.log('[RedisRateLimitStore] Connected to Redis');
    } catch (error: unknown) {
      throw new StoreUnavailableError(`Redis connection failed: ${normalizeError(error).message}`, { cause: error });
    }
  }

  async execute(transaction: WindowTransaction, keys: WindowKeys, args: WindowArguments): Promise<WindowReply> {
    const sha = this.shaOf(transaction);
    const evalOptions = {
      keys: [keys.counter, keys.ban, keys.meta],
      arguments: toScriptArguments(args),
    };

    let raw: unknown;
    try {
      try {
        raw = await this.client.evalSha(sha, evalOptions);
      } catch (error: unknown) {
        if (!isNoScriptError(error)) throw error;
        await this.loadScript(transaction);
        raw = await this.client.evalSha(sha, evalOptions);
      }
    } catch (error: unknown) {
      throw new StoreUnavailableError(
        `Transaction ${transaction.name} failed: ${normalizeError(error).message}`,
        { cause: error }
      );
    }

    return parseReply(transaction.name, raw);
  }

  async close(): Promise<void> {
    if (!this.client.isOpen) return;
    await this.client.quit().catch((err: unknown) => {
      console.warn(`[RedisRateLimitStore] Error closing Redis connection: ${normalizeError(err).message}`);
    });
  }

  private shaOf(transaction: WindowTransaction): string {
    let sha = this.shas.get(transaction.name);
    if (!sha) {
      sha = digestHex('sha1', transaction.lua);
      this.shas.set(transaction.name, sha);
    }
    return sha;
  }

  /**
   * Concurrent NOSCRIPT replies for one script share a single SCRIPT LOAD
   */
  private async loadScript(transaction: WindowTransaction): Promise<void> {
    await this.scriptLock.acquire(transaction.name, async () => {
      console.log(`[RedisRateLimitStore] Script ${transaction.name} missing from server cache, loading`);
      const loaded = await this.client.scriptLoad(transaction.lua);
      if (loaded !== this.shaOf(transaction)) {
        console.warn(`[RedisRateLimitStore] Script ${transaction.name} loaded under unexpected SHA ${loaded}`);
      }
    });
  }
}

function isNoScriptError(error: unknown): boolean {
  return normalizeError(error).message.startsWith('NOSCRIPT');
}

function parseReply(name: string, raw: unknown): WindowReply {
  const parsed = ScriptReplySchema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreUnavailableError(`Transaction ${name} returned a malformed reply: ${JSON.stringify(raw)}`);
  }
  const [allowed, remaining, resetAt, banTtl, now, banIssued] = parsed.data;
  return {
    allowed: allowed === 1,
    remaining,
    resetAt,
    banTtl,
    now,
    banIssued: banIssued === 1,
  };
}
