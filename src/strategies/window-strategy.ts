/**
 * Base class for windowed counting strategies
 *
 * A strategy is bound to one rule. `hit` derives the rule's keys for the
 * identifier and hands the strategy's transaction to the store, which runs
 * it atomically (ban check, counting decision and offense bookkeeping in one
 * step).
 */

import { toBanArguments } from '../bans/offense-tracker.js';
import { deriveWindowKeys, type KeyedRule } from '../keys/key-space.js';
import type { IRateLimitStore, WindowTransaction } from '../interfaces/rate-limit-store.js';
import type { BanPolicy, HitResult, StrategyKind } from '../types.js';

export abstract class WindowStrategy {
  abstract readonly kind: StrategyKind;
  protected abstract readonly transaction: WindowTransaction;

  constructor(
    protected readonly store: IRateLimitStore,
    protected readonly pattern: string,
    protected readonly bans: BanPolicy
  ) {}

  /**
   * Counts one request for `identifier`
   *
   * @throws {StoreUnavailableError} If the store transaction fails
   */
  async hit(identifier: string, limit: number, windowSeconds: number): Promise<HitResult> {
    const rule: KeyedRule = { pattern: this.pattern, limit, windowSeconds, strategy: this.kind };
    const keys = deriveWindowKeys(identifier, rule, this.bans.siteWide);

    const reply = await this.store.execute(this.transaction, keys, {
      limit,
      windowSeconds,
      ban: toBanArguments(this.bans),
      member: this.eventMember(),
    });

    return {
      allowed: reply.allowed,
      remaining: reply.remaining,
      resetAt: reply.resetAt,
      banTtl: reply.banTtl,
      serverNow: reply.now,
      banIssued: reply.banIssued,
    };
  }

  /**
   * Member stored for an admitted request; only logging strategies need one
   */
  protected eventMember(): string {
    return '';
  }
}
