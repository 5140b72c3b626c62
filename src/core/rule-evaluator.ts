/**
 * Rule Evaluator
 *
 * Combines the verdicts of every rule matched for one request. The request
 * is admitted only if every rule admits it; the first ban or denial stops
 * evaluation, so later rules are neither consulted nor charged.
 *
 * When everything admits, the rule with the fewest requests left is the one
 * reported in headers (ties go to the earlier rule).
 */

import { StoreUnavailableError } from '../errors.js';
import type { IMetricsExporter } from '../interfaces/metrics-exporter.js';
import type { IRateLimitStore } from '../interfaces/rate-limit-store.js';
import { createStrategy } from '../strategies/strategy-factory.js';
import type { WindowStrategy } from '../strategies/window-strategy.js';
import type { BanPolicy, Decision, HitResult, Rule } from '../types.js';

export interface RuleEvaluatorOptions {
  store: IRateLimitStore;
  bans: BanPolicy;
  metrics?: IMetricsExporter;
}

/**
 * Seconds until `resetAt`, never below 1
 */
export function secondsUntil(resetAt: number, now: number): number {
  return Math.max(1, resetAt - now);
}

export class RuleEvaluator {
  private readonly store: IRateLimitStore;
  private readonly bans: BanPolicy;
  private readonly metrics?: IMetricsExporter;
  /** Keyed by what a strategy depends on, so equal rules share one */
  private readonly strategies = new Map<string, WindowStrategy>();

  constructor(options: RuleEvaluatorOptions) {
    this.store = options.store;
    this.bans = options.bans;
    this.metrics = options.metrics;
  }

  /**
   * @throws {StoreUnavailableError} If any store transaction fails; never turned into a verdict
   */
  async evaluate(identifier: string, rules: readonly Rule[]): Promise<Decision> {
    const startedAt = performance.now();
    try {
      const decision = await this.evaluateRules(identifier, rules);
      this.metrics?.recordDecision(decision.outcome);
      return decision;
    } catch (error: unknown) {
      if (error instanceof StoreUnavailableError) {
        this.metrics?.recordStoreError();
      }
      throw error;
    } finally {
      this.metrics?.recordEvaluationDuration((performance.now() - startedAt) / 1000);
    }
  }

  private async evaluateRules(identifier: string, rules: readonly Rule[]): Promise<Decision> {
    // Store clock of the first hit; every relative time in the decision uses it
    let requestNow: number | undefined;
    let reported: { rule: Rule; hit: HitResult } | undefined;

    for (const rule of rules) {
      const hit = await this.strategyFor(rule).hit(identifier, rule.limit, rule.windowSeconds);
      if (requestNow === undefined) {
        requestNow = hit.serverNow;
      }

      if (hit.banIssued) {
        this.metrics?.recordBan(rule.strategy);
      }
      if (hit.banTtl > 0) {
        return { outcome: 'banned', ttlSeconds: hit.banTtl };
      }
      if (!hit.allowed) {
        return {
          outcome: 'rate_limited',
          retryAfterSeconds: secondsUntil(hit.resetAt, requestNow),
          limit: rule.limit,
          windowSeconds: rule.windowSeconds,
        };
      }
      if (!reported || hit.remaining < reported.hit.remaining) {
        reported = { rule, hit };
      }
    }

    if (!reported || requestNow === undefined) {
      return { outcome: 'allowed' };
    }

    return {
      outcome: 'allowed',
      headers: {
        limit: reported.rule.limit,
        windowSeconds: reported.rule.windowSeconds,
        remaining: reported.hit.remaining,
        resetSeconds: secondsUntil(reported.hit.resetAt, requestNow),
      },
    };
  }

  private strategyFor(rule: Rule): WindowStrategy {
    const cacheKey = `${rule.strategy}:${rule.pattern}`;
    let strategy = this.strategies.get(cacheKey);
    if (!strategy) {
      strategy = createStrategy(rule, this.store, this.bans);
      this.strategies.set(cacheKey, strategy);
    }
    return strategy;
  }
}
