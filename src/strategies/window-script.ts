/**
 * Lua script assembly shared by all strategies
 *
 * Every script starts with the same prelude (argument decoding, one TIME
 * read, the ban flag TTL) followed by the offense routine, then the
 * strategy body. Bodies return:
 *
 *   { allowed(0|1), remaining, resetAt, banTtl, now, banIssued(0|1) }
 */

import { RECORD_OFFENSE_LUA } from '../bans/offense-tracker.js';
import type { WindowArguments } from '../interfaces/rate-limit-store.js';

const PRELUDE_LUA = `
local counter, ban, meta = KEYS[1], KEYS[2], KEYS[3]
local limit, win = tonumber(ARGV[1]), tonumber(ARGV[2])
local ban_after, initial_ban = tonumber(ARGV[3]), tonumber(ARGV[4])
local max_ban, decay = tonumber(ARGV[5]), tonumber(ARGV[6])
local member = ARGV[7]
local now = tonumber(redis.call('TIME')[1])
local ban_ttl = redis.call('TTL', ban)
`;

export function buildWindowScript(body: string): string {
  return `${PRELUDE_LUA}${RECORD_OFFENSE_LUA}${body}`;
}

/**
 * ARGV order expected by the prelude
 */
export function toScriptArguments(args: WindowArguments): string[] {
  return [
    args.limit,
    args.windowSeconds,
    args.ban.threshold,
    args.ban.initialBanSeconds,
    args.ban.maxBanSeconds,
    args.ban.decaySeconds,
  ]
    .map(String)
    .concat(args.member);
}
