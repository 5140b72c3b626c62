/**
 * Rule Matcher
 *
 * Maps a request path to every rule that covers it. Patterns are either an
 * exact path (`/login`) or a prefix ending in `/*` (`/api/*`). A wildcard
 * covers its prefix itself and anything below `prefix + '/'`, so `/api/*`
 * matches `/api` and `/api/users` but not `/apikeys`.
 *
 * Trailing slashes are insignificant on both sides. Query strings are the
 * adapter's concern and never reach this module.
 */

import { WILDCARD_SUFFIX } from '../constants.js';
import { ConfigurationError } from '../errors.js';
import { STRATEGY_KINDS, type PathPattern, type Rule, type StrategyKind } from '../types.js';

export function normalizePath(path: string): string {
  return path.replace(/\/+$/, '');
}

export function normalizePattern(pattern: string): PathPattern {
  if (pattern.endsWith(WILDCARD_SUFFIX)) {
    return { prefix: normalizePath(pattern.slice(0, -WILDCARD_SUFFIX.length)), wildcard: true };
  }
  return { prefix: normalizePath(pattern), wildcard: false };
}

/**
 * @param path - Already normalized
 */
export function matchesPattern(pattern: PathPattern, path: string): boolean {
  if (!pattern.wildcard) {
    return path === pattern.prefix;
  }
  return path === pattern.prefix || path.startsWith(`${pattern.prefix}/`);
}

function isStrategyKind(value: string): value is StrategyKind {
  return STRATEGY_KINDS.some((kind) => kind === value);
}

export interface RuleSettings {
  limit: number;
  windowSeconds: number;
  /** Case-insensitive; unknown names are rejected */
  strategy: string;
}

/**
 * Builds an immutable rule
 *
 * @throws {ConfigurationError} On an unknown strategy, a non-positive window or a negative limit
 */
export function createRule(pattern: string, settings: RuleSettings): Rule {
  const { limit, windowSeconds } = settings;
  const strategy = settings.strategy.toLowerCase();

  if (!isStrategyKind(strategy)) {
    throw new ConfigurationError(
      `Unknown strategy "${settings.strategy}" for rule ${pattern} (expected one of: ${STRATEGY_KINDS.join(', ')})`
    );
  }
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ConfigurationError(`Invalid limit ${limit} for rule ${pattern}: expected a non-negative integer`);
  }
  if (!Number.isInteger(windowSeconds) || windowSeconds <= 0) {
    throw new ConfigurationError(
      `Invalid window ${windowSeconds}s for rule ${pattern}: expected a positive integer`
    );
  }

  return Object.freeze({ pattern, ...normalizePattern(pattern), limit, windowSeconds, strategy });
}

/**
 * Wildcards before exact paths; wildcards by ascending prefix length, exact
 * paths by descending length. Order affects only which rule a decision
 * reports first, never whether a request is admitted.
 */
function compareRules(a: Rule, b: Rule): number {
  if (a.wildcard !== b.wildcard) {
    return a.wildcard ? -1 : 1;
  }
  return a.wildcard ? a.prefix.length - b.prefix.length : b.prefix.length - a.prefix.length;
}

export class RuleMatcher {
  private readonly rules: readonly Rule[];
  private readonly exempt: readonly PathPattern[];

  constructor(rules: readonly Rule[], exempt: readonly string[] = []) {
    this.rules = [...rules].sort(compareRules);
    this.exempt = exempt.map(normalizePattern);
  }

  matchRules(path: string): Rule[] {
    const normalized = normalizePath(path);
    return this.rules.filter((rule) => matchesPattern(rule, normalized));
  }

  isExempt(path: string): boolean {
    const normalized = normalizePath(path);
    return this.exempt.some((pattern) => matchesPattern(pattern, normalized));
  }

  getRules(): readonly Rule[] {
    return this.rules;
  }
}
