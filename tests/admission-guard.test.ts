/**
 * AdmissionGuard end-to-end tests (config → matcher → evaluator → store)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { resolveLimiterConfig } from '../src/config/loader.js';
import { AdmissionGuard } from '../src/core/admission-guard.js';
import { deriveBanKey, deriveMetaKey } from '../src/keys/key-space.js';
import type { MemoryRateLimitStore } from '../src/store/memory-store.js';
import { ManualClock, createClockedStore } from './helpers/test-clock.js';

const ID = '198.51.100.23';

describe('AdmissionGuard', () => {
  let clock: ManualClock;
  let store: MemoryRateLimitStore;

  beforeEach(() => {
    clock = new ManualClock();
    store = createClockedStore(clock);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('login rule with bans', () => {
    let guard: AdmissionGuard;

    beforeEach(async () => {
      const config = resolveLimiterConfig({
        rules: { '/login': { limit: 5, window: 60, strategy: 'fixed' } },
        exempt: ['/health'],
        bans: { threshold: 3, initialBan: 30 },
      });
      guard = await AdmissionGuard.create(config, { store });
    });

    it('should_countDownThenRateLimitThenBan_when_clientKeepsHammering', async () => {
      const remaining: number[] = [];
      for (let i = 0; i < 5; i++) {
        const decision = await guard.check('/login', ID);
        if (decision.outcome !== 'allowed' || !decision.headers) {
          throw new Error(`request ${i + 1} was not admitted with headers`);
        }
        remaining.push(decision.headers.remaining);
      }
      expect(remaining).toEqual([4, 3, 2, 1, 0]);

      expect(await guard.check('/login', ID)).toEqual({
        outcome: 'rate_limited',
        retryAfterSeconds: 60,
        limit: 5,
        windowSeconds: 60,
      });
      const [rule] = guard.matchRules('/login');
      if (!rule) throw new Error('login rule missing');
      expect(store.hget(deriveMetaKey(deriveBanKey(ID, rule, true)), 'off')).toBe('1');

      expect((await guard.check('/login', ID)).outcome).toBe('rate_limited');
      expect(await guard.check('/login', ID)).toEqual({ outcome: 'banned', ttlSeconds: 30 });

      clock.advance(10);
      expect(await guard.check('/login', ID)).toEqual({ outcome: 'banned', ttlSeconds: 20 });
    });

    it('should_admitWithoutStore_when_pathExempt', async () => {
      expect(guard.isExempt('/health/')).toBe(true);
      expect(await guard.check('/health/', ID)).toEqual({ outcome: 'allowed' });
      expect(store.keys()).toEqual([]);
    });

    it('should_admitWithoutHeaders_when_noRuleMatches', async () => {
      expect(await guard.check('/about', ID)).toEqual({ outcome: 'allowed' });
      expect(store.keys()).toEqual([]);
    });

    it('should_trackClientsSeparately_when_identifiersDiffer', async () => {
      for (let i = 0; i < 5; i++) await guard.check('/login', ID);

      expect((await guard.check('/login', ID)).outcome).toBe('rate_limited');
      expect((await guard.check('/login', '198.51.100.24')).outcome).toBe('allowed');
    });
  });

  describe('ban scope', () => {
    const rules = {
      '/a': { limit: 1, window: 60, strategy: 'fixed' },
      '/b': { limit: 1, window: 60, strategy: 'fixed' },
    };

    it('should_blockEveryRule_when_banIsSiteWide', async () => {
      const guard = await AdmissionGuard.create(
        resolveLimiterConfig({ rules, bans: { threshold: 1, initialBan: 30, siteWide: true } }),
        { store }
      );

      await guard.check('/a', ID);
      expect(await guard.check('/a', ID)).toEqual({ outcome: 'banned', ttlSeconds: 30 });
      expect(await guard.check('/b', ID)).toEqual({ outcome: 'banned', ttlSeconds: 30 });
    });

    it('should_blockOnlyOffendingRule_when_banIsPerRule', async () => {
      const guard = await AdmissionGuard.create(
        resolveLimiterConfig({ rules, bans: { threshold: 1, initialBan: 30, siteWide: false } }),
        { store }
      );

      await guard.check('/a', ID);
      expect(await guard.check('/a', ID)).toEqual({ outcome: 'banned', ttlSeconds: 30 });
      expect((await guard.check('/b', ID)).outcome).toBe('allowed');
    });
  });

  it('should_closeStore_when_guardClosed', async () => {
    const closeSpy = vi.spyOn(store, 'close');
    const guard = new AdmissionGuard(resolveLimiterConfig({}), store);

    await guard.close();

    expect(closeSpy).toHaveBeenCalledTimes(1);
  });
});
