/**
 * Offense tracking and ban escalation
 *
 * Runs inside every strategy transaction, only when the counter denies a
 * request (never for a client that is already banned):
 *
 *   Clean ──over limit──▶ Accumulating(off) ──off ≥ threshold──▶ Banned(d)
 *     ▲                                                            │
 *     └──────────────── ban flag expires ◀─────────────────────────┘
 *
 * `bc` (consecutive bans) survives the ban itself; it decays only when the
 * meta record expires without further offenses. Ban length doubles per
 * consecutive ban: d = min(initial * 2^(bc-1), max).
 *
 * The routine exists in two forms that must stay equivalent: the in-process
 * `recordOffense` and the Lua `record_offense` embedded in every script.
 */

import type { BanArguments, KeyspaceOps, WindowArguments } from '../interfaces/rate-limit-store.js';
import type { WindowKeys } from '../keys/key-space.js';
import type { BanPolicy } from '../types.js';

const OFFENSES_FIELD = 'off';
const CONSECUTIVE_BANS_FIELD = 'bc';
const BAN_FLAG = '1';

export function computeBanDuration(
  consecutiveBans: number,
  ban: Pick<BanArguments, 'initialBanSeconds' | 'maxBanSeconds'>
): number {
  return Math.floor(Math.min(ban.initialBanSeconds * 2 ** (consecutiveBans - 1), ban.maxBanSeconds));
}

export function toBanArguments(policy: BanPolicy): BanArguments {
  return {
    threshold: policy.enabled ? policy.threshold : 0,
    initialBanSeconds: policy.initialBanSeconds,
    maxBanSeconds: policy.maxBanSeconds,
    decaySeconds: policy.decaySeconds,
  };
}

/**
 * Records one offense and issues a ban once the threshold is reached.
 *
 * @returns Ban duration in seconds, 0 when no ban was issued
 */
export function recordOffense(ops: KeyspaceOps, keys: WindowKeys, args: WindowArguments): number {
  const { ban } = args;
  if (ban.threshold <= 0) {
    return 0;
  }

  const offenses = ops.hincrby(keys.meta, OFFENSES_FIELD, 1);
  ops.expire(keys.meta, args.windowSeconds * 2);
  if (offenses < ban.threshold) {
    return 0;
  }

  const consecutiveBans = ops.hincrby(keys.meta, CONSECUTIVE_BANS_FIELD, 1);
  const duration = computeBanDuration(consecutiveBans, ban);
  ops.set(keys.ban, BAN_FLAG, duration);
  ops.hset(keys.meta, OFFENSES_FIELD, '0');
  ops.expire(keys.meta, Math.max(duration, ban.decaySeconds));
  return duration;
}

/**
 * Lua form of `recordOffense`. Expects the prelude locals `ban`, `meta`,
 * `win`, `ban_after`, `initial_ban`, `max_ban` and `decay`.
 */
export const RECORD_OFFENSE_LUA = `
local function record_offense()
  if ban_after <= 0 then return 0 end
  local offenses = redis.call('HINCRBY', meta, '${OFFENSES_FIELD}', 1)
  redis.call('EXPIRE', meta, win * 2)
  if offenses < ban_after then return 0 end
  local bans = redis.call('HINCRBY', meta, '${CONSECUTIVE_BANS_FIELD}', 1)
  local duration = math.floor(math.min(initial_ban * 2 ^ (bans - 1), max_ban))
  redis.call('SET', ban, '${BAN_FLAG}', 'EX', duration)
  redis.call('HSET', meta, '${OFFENSES_FIELD}', 0)
  redis.call('EXPIRE', meta, math.max(duration, decay))
  return duration
end
`;
