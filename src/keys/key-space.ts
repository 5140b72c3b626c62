/**
 * Storage key derivation
 *
 * Layout (the identifier digest is a Redis Cluster hash tag, so every key
 * of one client lands in one slot):
 *
 *   rl:<kind>:{<id>}:<ruleTag>:<limit>:<window>        counter base
 *   rl:<kind>:{<id>}:<ruleTag>:<limit>:<window>:ban    per-rule ban flag
 *   ban:{<id>}                                         site-wide ban flag
 *   <ban scope base>:meta                              offense record
 *
 * Raw identifiers never reach the store; only a truncated SHA-256 does.
 */

import {
  BAN_KEY_PREFIX,
  IDENTIFIER_HASH_LENGTH,
  RATE_KEY_PREFIX,
  RULE_TAG_LENGTH,
} from '../constants.js';
import { digestHex } from '../utils/utils.js';
import type { Rule } from '../types.js';

/** Rule fields that take part in key identity */
export type KeyedRule = Pick<Rule, 'pattern' | 'limit' | 'windowSeconds' | 'strategy'>;

export function hashIdentifier(identifier: string): string {
  return digestHex('sha256', identifier).slice(0, IDENTIFIER_HASH_LENGTH);
}

function ruleTag(pattern: string): string {
  return digestHex('sha256', pattern).slice(0, RULE_TAG_LENGTH);
}

export function deriveKey(identifier: string, rule: KeyedRule): string {
  return [
    RATE_KEY_PREFIX,
    rule.strategy,
    `{${hashIdentifier(identifier)}}`,
    ruleTag(rule.pattern),
    rule.limit,
    rule.windowSeconds,
  ].join(':');
}

export function deriveBanKey(identifier: string, rule: KeyedRule, siteWide: boolean): string {
  if (siteWide) {
    return `${BAN_KEY_PREFIX}:{${hashIdentifier(identifier)}}`;
  }
  return `${deriveKey(identifier, rule)}:ban`;
}

export function deriveMetaKey(key: string): string {
  return `${key}:meta`;
}

/**
 * All keys one strategy transaction touches
 */
export interface WindowKeys {
  /** Counter base; strategies append window ids to it */
  counter: string;
  ban: string;
  meta: string;
}

/**
 * Keys for one (identifier, rule) pair. The offense record follows the ban
 * scope: one record per identifier when bans are site-wide.
 */
export function deriveWindowKeys(identifier: string, rule: KeyedRule, siteWide: boolean): WindowKeys {
  const counter = deriveKey(identifier, rule);
  const ban = deriveBanKey(identifier, rule, siteWide);
  return {
    counter,
    ban,
    meta: deriveMetaKey(siteWide ? ban : counter),
  };
}
