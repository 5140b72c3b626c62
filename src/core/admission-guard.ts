/**
 * Admission Guard
 *
 * Entry point for adapters: one call per request, returning the decision
 * for a path and client identifier. Owns the matcher, the evaluator and the
 * store connection.
 */

import type { LimiterConfig } from '../config/types.js';
import type { IMetricsExporter } from '../interfaces/metrics-exporter.js';
import type { IRateLimitStore } from '../interfaces/rate-limit-store.js';
import { RuleMatcher } from '../rules/rule-matcher.js';
import { RedisRateLimitStore } from '../store/redis-store.js';
import type { Decision, Rule } from '../types.js';
import { RuleEvaluator } from './rule-evaluator.js';

export interface AdmissionGuardOptions {
  /** Store to use instead of connecting to `config.redisUrl` */
  store?: IRateLimitStore;
  metrics?: IMetricsExporter;
}

export class AdmissionGuard {
  private readonly matcher: RuleMatcher;
  private readonly evaluator: RuleEvaluator;

  constructor(
    readonly config: LimiterConfig,
    private readonly store: IRateLimitStore,
    metrics?: IMetricsExporter
  ) {
    this.matcher = new RuleMatcher(config.rules, config.exempt);
    this.evaluator = new RuleEvaluator({ store, bans: config.bans, metrics });
  }

  /**
   * Builds a guard, connecting to Redis unless a store is supplied
   *
   * @throws {StoreUnavailableError} If Redis cannot be reached
   */
  static async create(config: LimiterConfig, options: AdmissionGuardOptions = {}): Promise<AdmissionGuard> {
    if (options.store) {
      return new AdmissionGuard(config, options.store, options.metrics);
    }

    const store = new RedisRateLimitStore({ redisUrl: config.redisUrl });
    await store.connect();
    return new AdmissionGuard(config, store, options.metrics);
  }

  /**
   * Decides one request. Exempt and unmatched paths are admitted without
   * touching the store.
   *
   * @throws {StoreUnavailableError} If the store fails mid-evaluation
   */
  async check(path: string, identifier: string): Promise<Decision> {
    if (this.matcher.isExempt(path)) {
      return { outcome: 'allowed' };
    }
    return await this.evaluator.evaluate(identifier, this.matcher.matchRules(path));
  }

  matchRules(path: string): Rule[] {
    return this.matcher.matchRules(path);
  }

  isExempt(path: string): boolean {
    return this.matcher.isExempt(path);
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
