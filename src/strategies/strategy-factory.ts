import type { IRateLimitStore } from '../interfaces/rate-limit-store.js';
import type { BanPolicy, Rule } from '../types.js';
import { FixedWindowStrategy } from './fixed-window-strategy.js';
import { MovingWindowStrategy } from './moving-window-strategy.js';
import { SlidingLogStrategy } from './sliding-log-strategy.js';
import type { WindowStrategy } from './window-strategy.js';

export function createStrategy(rule: Rule, store: IRateLimitStore, bans: BanPolicy): WindowStrategy {
  switch (rule.strategy) {
    case 'fixed':
      return new FixedWindowStrategy(store, rule.pattern, bans);
    case 'sliding':
      return new SlidingLogStrategy(store, rule.pattern, bans);
    case 'moving':
      return new MovingWindowStrategy(store, rule.pattern, bans);
  }
}
