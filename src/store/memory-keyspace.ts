/**
 * In-process keyspace with Redis expiry semantics
 *
 * Holds strings, hashes and sorted sets with an optional absolute expiry in
 * epoch seconds. A key is gone once `now >= expiresAt`. Every read takes the
 * caller's clock reading instead of consulting one, so a transaction sees a
 * single instant.
 *
 * Keys nobody reads again (bucket keys of past windows) are swept once per
 * clock second when a view is taken.
 */

import type { KeyspaceOps } from '../interfaces/rate-limit-store.js';

type Value =
  | { type: 'string'; value: string }
  | { type: 'hash'; fields: Map<string, string> }
  | { type: 'zset'; members: Map<string, number> };

interface Entry {
  data: Value;
  /** Absolute epoch second, null for persistent keys */
  expiresAt: number | null;
}

export class WrongTypeError extends Error {
  constructor(key: string, expected: Value['type']) {
    super(`WRONGTYPE Operation against key '${key}' holding the wrong kind of value (expected ${expected})`);
    this.name = 'WrongTypeError';
  }
}

export class MemoryKeyspace {
  private entries = new Map<string, Entry>();
  private lastSweep: number | null = null;

  /** Entries held, expired or not */
  get size(): number {
    return this.entries.size;
  }

  private live(key: string, now: number): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && now >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private stringValue(key: string, now: number): string | null {
    const entry = this.live(key, now);
    if (!entry) return null;
    if (entry.data.type !== 'string') throw new WrongTypeError(key, 'string');
    return entry.data.value;
  }

  private hashFields(key: string, now: number, create: boolean): Map<string, string> | undefined {
    const entry = this.live(key, now);
    if (entry) {
      if (entry.data.type !== 'hash') throw new WrongTypeError(key, 'hash');
      return entry.data.fields;
    }
    if (!create) return undefined;
    const fields = new Map<string, string>();
    this.entries.set(key, { data: { type: 'hash', fields }, expiresAt: null });
    return fields;
  }

  private sortedSet(key: string, now: number, create: boolean): Map<string, number> | undefined {
    const entry = this.live(key, now);
    if (entry) {
      if (entry.data.type !== 'zset') throw new WrongTypeError(key, 'zset');
      return entry.data.members;
    }
    if (!create) return undefined;
    const members = new Map<string, number>();
    this.entries.set(key, { data: { type: 'zset', members }, expiresAt: null });
    return members;
  }

  get(key: string, now: number): string | null {
    return this.stringValue(key, now);
  }

  /** INCR keeps an existing expiry */
  incr(key: string, now: number): number {
    const current = this.stringValue(key, now);
    const next = (current === null ? 0 : parseInt(current, 10)) + 1;
    const entry = this.live(key, now);
    this.entries.set(key, { data: { type: 'string', value: String(next) }, expiresAt: entry?.expiresAt ?? null });
    return next;
  }

  /** SET key value EX ttl: replaces any value and expiry */
  set(key: string, value: string, ttlSeconds: number, now: number): void {
    this.entries.set(key, { data: { type: 'string', value }, expiresAt: now + ttlSeconds });
  }

  expireAt(key: string, epochSeconds: number, now: number): void {
    const entry = this.live(key, now);
    if (!entry) return;
    if (epochSeconds <= now) {
      this.entries.delete(key);
      return;
    }
    entry.expiresAt = epochSeconds;
  }

  expire(key: string, seconds: number, now: number): void {
    this.expireAt(key, now + seconds, now);
  }

  ttl(key: string, now: number): number {
    const entry = this.live(key, now);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return entry.expiresAt - now;
  }

  hget(key: string, field: string, now: number): string | null {
    return this.hashFields(key, now, false)?.get(field) ?? null;
  }

  hincrby(key: string, field: string, increment: number, now: number): number {
    const fields = this.hashFields(key, now, true);
    const next = parseInt(fields?.get(field) ?? '0', 10) + increment;
    fields?.set(field, String(next));
    return next;
  }

  hset(key: string, field: string, value: string, now: number): void {
    this.hashFields(key, now, true)?.set(field, value);
  }

  zadd(key: string, score: number, member: string, now: number): void {
    this.sortedSet(key, now, true)?.set(member, score);
  }

  zremRangeByScore(key: string, maxScore: number, now: number): void {
    const members = this.sortedSet(key, now, false);
    if (!members) return;
    for (const [member, score] of members) {
      if (score <= maxScore) members.delete(member);
    }
    if (members.size === 0) this.entries.delete(key);
  }

  zcard(key: string, now: number): number {
    return this.sortedSet(key, now, false)?.size ?? 0;
  }

  zlowestScore(key: string, now: number): number | null {
    const members = this.sortedSet(key, now, false);
    if (!members || members.size === 0) return null;
    let lowest = Infinity;
    for (const score of members.values()) {
      if (score < lowest) lowest = score;
    }
    return lowest;
  }

  /** Live keys at `now` */
  keys(now: number): string[] {
    return [...this.entries.keys()].filter((key) => this.live(key, now) !== undefined);
  }

  /** Drops every entry expired at `now` */
  sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && now >= entry.expiresAt) this.entries.delete(key);
    }
    this.lastSweep = now;
  }

  clear(): void {
    this.entries.clear();
    this.lastSweep = null;
  }

  /**
   * Operations bound to one clock reading
   */
  view(now: number): KeyspaceOps {
    if (this.lastSweep !== now) this.sweep(now);
    return {
      time: () => now,
      get: (key) => this.get(key, now),
      incr: (key) => this.incr(key, now),
      set: (key, value, ttlSeconds) => this.set(key, value, ttlSeconds, now),
      expire: (key, seconds) => this.expire(key, seconds, now),
      expireAt: (key, epochSeconds) => this.expireAt(key, epochSeconds, now),
      ttl: (key) => this.ttl(key, now),
      hincrby: (key, field, increment) => this.hincrby(key, field, increment, now),
      hset: (key, field, value) => this.hset(key, field, value, now),
      zadd: (key, score, member) => this.zadd(key, score, member, now),
      zremRangeByScore: (key, maxScore) => this.zremRangeByScore(key, maxScore, now),
      zcard: (key) => this.zcard(key, now),
      zlowestScore: (key) => this.zlowestScore(key, now),
    };
  }
}
