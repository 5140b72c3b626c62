/**
 * Type definitions for the admission-guard engine
 */

/**
 * Counting algorithm a rule runs under.
 *
 * The tag is written into every storage key, so renaming a member changes
 * the key layout in Redis.
 */
export type StrategyKind = 'fixed' | 'sliding' | 'moving';

export const STRATEGY_KINDS: readonly StrategyKind[] = ['fixed', 'sliding', 'moving'] as const;

/**
 * Normalized path pattern (rules and exemptions share this shape)
 */
export interface PathPattern {
  /** Exact path, or the prefix when `wildcard` is set (trailing `/` stripped) */
  prefix: string;
  /** Pattern ended in `/*` */
  wildcard: boolean;
}

/**
 * Rate rule, immutable after configuration load
 */
export interface Rule extends PathPattern {
  /** Pattern as configured (e.g. `/api/*`) */
  pattern: string;
  /** Requests admitted per window */
  limit: number;
  /** Window length in seconds */
  windowSeconds: number;
  strategy: StrategyKind;
}

/**
 * Ban escalation policy, shared by every rule of one engine
 */
export interface BanPolicy {
  /** Disable to skip offense bookkeeping entirely */
  enabled: boolean;
  /** Offenses that trigger a ban */
  threshold: number;
  /** First ban length in seconds */
  initialBanSeconds: number;
  /** Upper bound for escalated bans in seconds */
  maxBanSeconds: number;
  /** Minimum lifetime of the escalation record after a ban, in seconds */
  decaySeconds: number;
  /** One ban blocks the identifier on every rule */
  siteWide: boolean;
}

/**
 * Outcome of one strategy hit
 */
export interface HitResult {
  allowed: boolean;
  /** Requests left in the window (0 on every denied path) */
  remaining: number;
  /** Absolute epoch second at which the window frees up */
  resetAt: number;
  /** Seconds left on the ban, 0 when not banned */
  banTtl: number;
  /** Store clock reading used for this hit (epoch seconds) */
  serverNow: number;
  /** This hit crossed the offense threshold and issued the ban */
  banIssued: boolean;
}

/**
 * Values an adapter needs to render rate limit response headers
 */
export interface PolicyHeaders {
  limit: number;
  windowSeconds: number;
  remaining: number;
  /** Seconds until the reporting rule's window resets (at least 1) */
  resetSeconds: number;
}

export interface AllowedDecision {
  outcome: 'allowed';
  /** Absent when no rule matched */
  headers?: PolicyHeaders;
}

export interface RateLimitedDecision {
  outcome: 'rate_limited';
  retryAfterSeconds: number;
  limit: number;
  windowSeconds: number;
}

export interface BannedDecision {
  outcome: 'banned';
  ttlSeconds: number;
}

export type Decision = AllowedDecision | RateLimitedDecision | BannedDecision;

export type DecisionOutcome = Decision['outcome'];
