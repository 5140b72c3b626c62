/**
 * Fixed Window Strategy
 *
 * Time is cut into epoch-aligned windows (`start = now - now % W`) with one
 * counter per window. O(1) storage per client.
 *
 * Boundary burst is inherent: a client can spend its full limit at the end
 * of one window and again at the start of the next, so up to 2×limit
 * requests pass across a boundary.
 */

import { recordOffense } from '../bans/offense-tracker.js';
import type { WindowTransaction } from '../interfaces/rate-limit-store.js';
import type { StrategyKind } from '../types.js';
import { buildWindowScript } from './window-script.js';
import { WindowStrategy } from './window-strategy.js';

const FIXED_WINDOW_LUA = buildWindowScript(`
local window_start = now - now % win
local reset_at = window_start + win
if ban_ttl > 0 then return {0, 0, reset_at, ban_ttl, now, 0} end

local bucket = counter .. ':' .. window_start
local count = tonumber(redis.call('GET', bucket) or '0')
if count < limit then
  local next_count = redis.call('INCR', bucket)
  redis.call('EXPIREAT', bucket, reset_at)
  return {1, limit - next_count, reset_at, 0, now, 0}
end

local banned_for = record_offense()
return {0, 0, reset_at, banned_for, now, banned_for > 0 and 1 or 0}
`);

export const fixedWindowTransaction: WindowTransaction = {
  name: 'fixed-window',
  lua: FIXED_WINDOW_LUA,
  run(ops, keys, args) {
    const now = ops.time();
    const windowStart = now - (now % args.windowSeconds);
    const resetAt = windowStart + args.windowSeconds;

    const banTtl = ops.ttl(keys.ban);
    if (banTtl > 0) {
      return { allowed: false, remaining: 0, resetAt, banTtl, now, banIssued: false };
    }

    const bucket = `${keys.counter}:${windowStart}`;
    const count = Number(ops.get(bucket) ?? '0');
    if (count < args.limit) {
      const nextCount = ops.incr(bucket);
      ops.expireAt(bucket, resetAt);
      return { allowed: true, remaining: args.limit - nextCount, resetAt, banTtl: 0, now, banIssued: false };
    }

    const bannedFor = recordOffense(ops, keys, args);
    return { allowed: false, remaining: 0, resetAt, banTtl: bannedFor, now, banIssued: bannedFor > 0 };
  },
};

export class FixedWindowStrategy extends WindowStrategy {
  readonly kind: StrategyKind = 'fixed';
  protected readonly transaction = fixedWindowTransaction;
}
