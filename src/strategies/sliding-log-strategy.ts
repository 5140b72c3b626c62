/**
 * Sliding Log Strategy
 *
 * Keeps one sorted-set entry per admitted request, scored by its timestamp.
 * The window is `(now - W, now]`, so entries scored `<= now - W` are pruned
 * before counting. Exact: no interval of length W ever holds more than
 * `limit` admissions.
 *
 * Storage grows with requests in the window, unlike the counter strategies.
 * Every event gets a unique member so that requests within the same second
 * are not collapsed into one entry.
 */

import { v4 as uuidv4 } from 'uuid';
import { recordOffense } from '../bans/offense-tracker.js';
import { SLIDING_LOG_EXPIRY_PADDING_SECONDS } from '../constants.js';
import type { WindowTransaction } from '../interfaces/rate-limit-store.js';
import type { StrategyKind } from '../types.js';
import { buildWindowScript } from './window-script.js';
import { WindowStrategy } from './window-strategy.js';

const SLIDING_LOG_LUA = buildWindowScript(`
local function reset_from_oldest()
  local oldest = redis.call('ZRANGE', counter, 0, 0, 'WITHSCORES')[2]
  if oldest then return tonumber(oldest) + win end
  return now + win
end

if ban_ttl > 0 then return {0, 0, reset_from_oldest(), ban_ttl, now, 0} end

redis.call('ZREMRANGEBYSCORE', counter, '-inf', now - win)
local count = redis.call('ZCARD', counter)
if count < limit then
  redis.call('ZADD', counter, now, member)
  redis.call('EXPIRE', counter, win + ${SLIDING_LOG_EXPIRY_PADDING_SECONDS})
  return {1, limit - count - 1, reset_from_oldest(), 0, now, 0}
end

local reset_at = reset_from_oldest()
local banned_for = record_offense()
return {0, 0, reset_at, banned_for, now, banned_for > 0 and 1 or 0}
`);

export const slidingLogTransaction: WindowTransaction = {
  name: 'sliding-log',
  lua: SLIDING_LOG_LUA,
  run(ops, keys, args) {
    const now = ops.time();
    const resetFromOldest = (): number => {
      const oldest = ops.zlowestScore(keys.counter);
      return (oldest ?? now) + args.windowSeconds;
    };

    const banTtl = ops.ttl(keys.ban);
    if (banTtl > 0) {
      return { allowed: false, remaining: 0, resetAt: resetFromOldest(), banTtl, now, banIssued: false };
    }

    ops.zremRangeByScore(keys.counter, now - args.windowSeconds);
    const count = ops.zcard(keys.counter);
    if (count < args.limit) {
      ops.zadd(keys.counter, now, args.member);
      ops.expire(keys.counter, args.windowSeconds + SLIDING_LOG_EXPIRY_PADDING_SECONDS);
      return {
        allowed: true,
        remaining: args.limit - count - 1,
        resetAt: resetFromOldest(),
        banTtl: 0,
        now,
        banIssued: false,
      };
    }

    const resetAt = resetFromOldest();
    const bannedFor = recordOffense(ops, keys, args);
    return { allowed: false, remaining: 0, resetAt, banTtl: bannedFor, now, banIssued: bannedFor > 0 };
  },
};

export class SlidingLogStrategy extends WindowStrategy {
  readonly kind: StrategyKind = 'sliding';
  protected readonly transaction = slidingLogTransaction;

  protected override eventMember(): string {
    return uuidv4();
  }
}
