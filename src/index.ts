/**
 * admission-guard
 *
 * Redis-backed admission control: per-path rate rules (fixed window,
 * sliding log, moving window) with escalating bans for repeat offenders.
 *
 * @example
 * ```typescript
 * const config = resolveLimiterConfig({
 *   rules: { '/api/*': { limit: 100, window: '1m', strategy: 'moving' } },
 *   exempt: ['/health'],
 * });
 * const guard = await AdmissionGuard.create(config);
 * app.use(new RateLimitMiddleware(guard).handle);
 * ```
 */

export { AdmissionGuard, type AdmissionGuardOptions } from './core/admission-guard.js';
export { RuleEvaluator, type RuleEvaluatorOptions } from './core/rule-evaluator.js';
export { RateLimitMiddleware, type RateLimitMiddlewareOptions } from './core/middleware/rate-limit-middleware.js';
export { resolveClientIdentifier, type IdentifiableRequest } from './core/middleware/client-identifier.js';
export { formatPolicyHeader, formatStatusHeader } from './core/middleware/rate-limit-headers.js';

export { RuleMatcher, createRule, normalizePath, normalizePattern, matchesPattern } from './rules/rule-matcher.js';
export { deriveKey, deriveBanKey, deriveMetaKey, deriveWindowKeys, hashIdentifier } from './keys/key-space.js';
export { computeBanDuration } from './bans/offense-tracker.js';

export { WindowStrategy } from './strategies/window-strategy.js';
export { FixedWindowStrategy } from './strategies/fixed-window-strategy.js';
export { SlidingLogStrategy } from './strategies/sliding-log-strategy.js';
export { MovingWindowStrategy } from './strategies/moving-window-strategy.js';
export { createStrategy } from './strategies/strategy-factory.js';

export { RedisRateLimitStore, type RedisRateLimitStoreOptions } from './store/redis-store.js';
export { MemoryRateLimitStore, type MemoryRateLimitStoreOptions } from './store/memory-store.js';
export type { IRateLimitStore, KeyspaceOps, WindowTransaction } from './interfaces/rate-limit-store.js';

export { parseDuration } from './config/duration.js';
export { resolveLimiterConfig, loadConfigFile, loadConfigFromEnv } from './config/loader.js';
export type { LimiterConfigInput } from './config/schemas.js';
export type { LimiterConfig } from './config/types.js';

export { MetricsExporter } from './observability/metrics-exporter.js';
export type { IMetricsExporter } from './interfaces/metrics-exporter.js';

export { AdmissionError, StoreUnavailableError, ConfigurationError } from './errors.js';
export { STRATEGY_KINDS } from './types.js';
export type {
  StrategyKind,
  PathPattern,
  Rule,
  BanPolicy,
  HitResult,
  PolicyHeaders,
  AllowedDecision,
  RateLimitedDecision,
  BannedDecision,
  Decision,
  DecisionOutcome,
} from './types.js';
