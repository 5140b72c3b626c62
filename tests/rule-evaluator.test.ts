/**
 * Rule Evaluator Tests
 *
 * Multi-rule conjunction, header selection and error propagation against
 * the in-process store.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RuleEvaluator } from '../src/core/rule-evaluator.js';
import { StoreUnavailableError } from '../src/errors.js';
import type { IMetricsExporter } from '../src/interfaces/metrics-exporter.js';
import { deriveKey } from '../src/keys/key-space.js';
import { createRule } from '../src/rules/rule-matcher.js';
import type { MemoryRateLimitStore } from '../src/store/memory-store.js';
import { createStrategy } from '../src/strategies/strategy-factory.js';
import { ManualClock, T0, banPolicy, createClockedStore } from './helpers/test-clock.js';

vi.mock('../src/strategies/strategy-factory.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/strategies/strategy-factory.js')>();
  return { ...actual, createStrategy: vi.fn(actual.createStrategy) };
});

const ID = 'client-a';

function createMetricsStub() {
  return {
    recordDecision: vi.fn(),
    recordBan: vi.fn(),
    recordStoreError: vi.fn(),
    recordEvaluationDuration: vi.fn(),
    getMetrics: vi.fn().mockResolvedValue(''),
    reset: vi.fn(),
  } satisfies IMetricsExporter;
}

describe('RuleEvaluator', () => {
  let clock: ManualClock;
  let store: MemoryRateLimitStore;
  let metrics: ReturnType<typeof createMetricsStub>;
  let evaluator: RuleEvaluator;

  beforeEach(() => {
    clock = new ManualClock();
    store = createClockedStore(clock);
    metrics = createMetricsStub();
    evaluator = new RuleEvaluator({ store, bans: banPolicy({ threshold: 10 }), metrics });
  });

  it('should_allowWithoutHeaders_when_noRulesMatched', async () => {
    expect(await evaluator.evaluate(ID, [])).toEqual({ outcome: 'allowed' });
  });

  it('should_reportTightestRule_when_allRulesAdmit', async () => {
    const loose = createRule('/api/*', { limit: 5, windowSeconds: 60, strategy: 'fixed' });
    const tight = createRule('/api/upload', { limit: 3, windowSeconds: 60, strategy: 'fixed' });

    const decision = await evaluator.evaluate(ID, [loose, tight]);

    expect(decision).toEqual({
      outcome: 'allowed',
      headers: { limit: 3, windowSeconds: 60, remaining: 2, resetSeconds: 60 },
    });
  });

  it('should_keepFirstRule_when_remainingTies', async () => {
    const first = createRule('/a/*', { limit: 3, windowSeconds: 60, strategy: 'fixed' });
    const second = createRule('/a/b', { limit: 3, windowSeconds: 30, strategy: 'fixed' });

    const decision = await evaluator.evaluate(ID, [first, second]);

    expect(decision).toMatchObject({ outcome: 'allowed', headers: { windowSeconds: 60, remaining: 2 } });
  });

  it('should_stopAtFirstDenial_when_ruleExhausted', async () => {
    const strict = createRule('/a/*', { limit: 1, windowSeconds: 60, strategy: 'fixed' });
    const later = createRule('/a/b', { limit: 5, windowSeconds: 60, strategy: 'fixed' });

    await evaluator.evaluate(ID, [strict, later]);
    clock.advance(15);
    const decision = await evaluator.evaluate(ID, [strict, later]);

    expect(decision).toEqual({ outcome: 'rate_limited', retryAfterSeconds: 45, limit: 1, windowSeconds: 60 });
    // the later rule was charged by the first request only
    expect(store.get(`${deriveKey(ID, later)}:${T0}`)).toBe('1');
  });

  it('should_returnBanned_when_hitIssuesBan', async () => {
    evaluator = new RuleEvaluator({ store, bans: banPolicy({ threshold: 1, initialBanSeconds: 30 }), metrics });
    const rule = createRule('/login', { limit: 1, windowSeconds: 60, strategy: 'sliding' });

    await evaluator.evaluate(ID, [rule]);
    const decision = await evaluator.evaluate(ID, [rule]);

    expect(decision).toEqual({ outcome: 'banned', ttlSeconds: 30 });
    expect(metrics.recordBan).toHaveBeenCalledTimes(1);
    expect(metrics.recordBan).toHaveBeenCalledWith('sliding');
  });

  it('should_recordDecisionAndDuration_when_evaluated', async () => {
    const rule = createRule('/x', { limit: 1, windowSeconds: 60, strategy: 'moving' });

    await evaluator.evaluate(ID, [rule]);
    await evaluator.evaluate(ID, [rule]);

    expect(metrics.recordDecision.mock.calls).toEqual([['allowed'], ['rate_limited']]);
    expect(metrics.recordEvaluationDuration).toHaveBeenCalledTimes(2);
  });

  it('should_propagateStoreUnavailable_when_storeFails', async () => {
    const rule = createRule('/x', { limit: 1, windowSeconds: 60, strategy: 'fixed' });
    await store.close();

    await expect(evaluator.evaluate(ID, [rule])).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(metrics.recordStoreError).toHaveBeenCalledTimes(1);
    expect(metrics.recordDecision).not.toHaveBeenCalled();
  });

  it('should_reuseStrategy_when_equalRulesBuiltPerCall', async () => {
    vi.mocked(createStrategy).mockClear();

    for (let i = 0; i < 50; i++) {
      await evaluator.evaluate(ID, [createRule('/a', { limit: 100, windowSeconds: 60, strategy: 'fixed' })]);
    }
    await evaluator.evaluate(ID, [createRule('/a', { limit: 100, windowSeconds: 60, strategy: 'sliding' })]);

    expect(createStrategy).toHaveBeenCalledTimes(2);
  });
});
