/**
 * Moving window (weighted two-bucket) strategy against the in-process store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { deriveKey } from '../src/keys/key-space.js';
import type { MemoryRateLimitStore } from '../src/store/memory-store.js';
import { MovingWindowStrategy, weightedCount } from '../src/strategies/moving-window-strategy.js';
import { ManualClock, T0, banPolicy, createClockedStore } from './helpers/test-clock.js';

const ID = 'client-a';
const PATTERN = '/feed';

describe('weightedCount', () => {
  it('should_weightPreviousBucketByOverlap_when_midWindow', () => {
    // 30 of 60 seconds of the previous bucket still overlap
    expect(weightedCount(10, 0, T0 + 30, 60)).toBe(5);
    expect(weightedCount(10, 2, T0 + 45, 60)).toBe(4);
  });

  it('should_countPreviousFully_when_epochJustStarted', () => {
    expect(weightedCount(7, 1, T0, 60)).toBe(8);
  });
});

describe('MovingWindowStrategy', () => {
  let clock: ManualClock;
  let store: MemoryRateLimitStore;
  let strategy: MovingWindowStrategy;

  beforeEach(() => {
    clock = new ManualClock();
    store = createClockedStore(clock);
    strategy = new MovingWindowStrategy(store, PATTERN, banPolicy({ threshold: 100 }));
  });

  it('should_admitLimitRequests_when_noHistory', async () => {
    const remaining: number[] = [];
    for (let i = 0; i < 10; i++) remaining.push((await strategy.hit(ID, 10, 60)).remaining);

    expect(remaining).toEqual([9, 8, 7, 6, 5, 4, 3, 2, 1, 0]);

    const denied = await strategy.hit(ID, 10, 60);
    expect(denied).toMatchObject({ allowed: false, remaining: 0, resetAt: T0 + 60 });
  });

  it('should_carryWeightedPrevious_when_nextEpochStarts', async () => {
    for (let i = 0; i < 11; i++) await strategy.hit(ID, 10, 60);

    clock.set(T0 + 30);
    expect((await strategy.hit(ID, 10, 60)).allowed).toBe(false);

    // previous bucket holds 10 admissions; half of it overlaps at T0 + 90
    clock.set(T0 + 90);
    const hit = await strategy.hit(ID, 10, 60);
    expect(hit).toMatchObject({ allowed: true, remaining: 4, resetAt: T0 + 120 });
  });

  it('should_keepRemainingWithinBounds_when_trafficVaries', async () => {
    for (let offset = 0; offset < 240; offset += 13) {
      clock.set(T0 + offset);
      for (let burst = 0; burst < 4; burst++) {
        const hit = await strategy.hit(ID, 10, 60);
        expect(hit.remaining).toBeGreaterThanOrEqual(0);
        expect(hit.remaining).toBeLessThanOrEqual(10);
      }
    }
  });

  it('should_leaveCurrentBucketUntouched_when_banned', async () => {
    const banning = new MovingWindowStrategy(store, PATTERN, banPolicy({ threshold: 1, initialBanSeconds: 30 }));
    const counter = deriveKey(ID, { pattern: PATTERN, limit: 1, windowSeconds: 60, strategy: 'moving' });
    const bucket = `${counter}:${T0 / 60}`;
    await banning.hit(ID, 1, 60);
    expect((await banning.hit(ID, 1, 60)).banIssued).toBe(true);
    expect(store.get(bucket)).toBe('1');

    clock.advance(10);
    const during = await banning.hit(ID, 1, 60);

    expect(during).toMatchObject({ allowed: false, banTtl: 20, banIssued: false });
    expect(store.get(bucket)).toBe('1');
  });

  it('should_reportEpochEnd_when_banned', async () => {
    const banning = new MovingWindowStrategy(store, PATTERN, banPolicy({ threshold: 1, initialBanSeconds: 30 }));
    clock.set(T0 + 20);
    await banning.hit(ID, 1, 60);
    await banning.hit(ID, 1, 60);

    const banned = await banning.hit(ID, 1, 60);
    expect(banned).toMatchObject({ allowed: false, banTtl: 30, resetAt: T0 + 60 });
  });
});
