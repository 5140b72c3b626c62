/**
 * Moving Window Strategy (sliding window counter)
 *
 * Two epoch buckets, `floor(now / W)` and the one before it. The previous
 * bucket is weighted by the share of it still inside the moving window:
 *
 *   weighted = floor(prev * (W - now % W) / W + curr)
 *
 * O(1) storage with smoother boundaries than the fixed window, at the cost
 * of being an estimate. Buckets live for 2W so the previous one is still
 * readable during the next epoch.
 */

import { recordOffense } from '../bans/offense-tracker.js';
import type { WindowTransaction } from '../interfaces/rate-limit-store.js';
import type { StrategyKind } from '../types.js';
import { buildWindowScript } from './window-script.js';
import { WindowStrategy } from './window-strategy.js';

const MOVING_WINDOW_LUA = buildWindowScript(`
local epoch = math.floor(now / win)
local reset_at = (epoch + 1) * win
if ban_ttl > 0 then return {0, 0, reset_at, ban_ttl, now, 0} end

local current = counter .. ':' .. epoch
local previous = counter .. ':' .. (epoch - 1)
local curr = tonumber(redis.call('GET', current) or '0')
local prev = tonumber(redis.call('GET', previous) or '0')
local remaining_share = win - now % win
local weighted = math.floor(prev * remaining_share / win + curr)
if weighted < limit then
  local next_count = redis.call('INCR', current)
  redis.call('EXPIRE', current, win * 2)
  weighted = math.floor(prev * remaining_share / win + next_count)
  return {1, math.max(0, limit - weighted), reset_at, 0, now, 0}
end

local banned_for = record_offense()
return {0, 0, reset_at, banned_for, now, banned_for > 0 and 1 or 0}
`);

export function weightedCount(previous: number, current: number, now: number, windowSeconds: number): number {
  return Math.floor((previous * (windowSeconds - (now % windowSeconds))) / windowSeconds + current);
}

export const movingWindowTransaction: WindowTransaction = {
  name: 'moving-window',
  lua: MOVING_WINDOW_LUA,
  run(ops, keys, args) {
    const now = ops.time();
    const epoch = Math.floor(now / args.windowSeconds);
    const resetAt = (epoch + 1) * args.windowSeconds;

    const banTtl = ops.ttl(keys.ban);
    if (banTtl > 0) {
      return { allowed: false, remaining: 0, resetAt, banTtl, now, banIssued: false };
    }

    const current = `${keys.counter}:${epoch}`;
    const previous = `${keys.counter}:${epoch - 1}`;
    const curr = Number(ops.get(current) ?? '0');
    const prev = Number(ops.get(previous) ?? '0');

    if (weightedCount(prev, curr, now, args.windowSeconds) < args.limit) {
      const nextCount = ops.incr(current);
      ops.expire(current, args.windowSeconds * 2);
      const weighted = weightedCount(prev, nextCount, now, args.windowSeconds);
      return {
        allowed: true,
        remaining: Math.max(0, args.limit - weighted),
        resetAt,
        banTtl: 0,
        now,
        banIssued: false,
      };
    }

    const bannedFor = recordOffense(ops, keys, args);
    return { allowed: false, remaining: 0, resetAt, banTtl: bannedFor, now, banIssued: bannedFor > 0 };
  },
};

export class MovingWindowStrategy extends WindowStrategy {
  readonly kind: StrategyKind = 'moving';
  protected readonly transaction = movingWindowTransaction;
}
