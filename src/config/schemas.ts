/**
 * Zod validation schemas for admission-guard configuration
 *
 * Durations are accepted as whole seconds or as duration strings ("5m",
 * "1h", "1d") and come out of parsing as seconds.
 */

import { z } from 'zod';
import {
  DEFAULT_BAN_DECAY,
  DEFAULT_BAN_THRESHOLD,
  DEFAULT_INITIAL_BAN,
  DEFAULT_MAX_BAN,
  DEFAULT_REDIS_URL,
} from '../constants.js';
import { parseDuration } from './duration.js';

/** Strings parse leniently, but every duration must come out positive */
export const DurationSchema = z
  .union([z.number().int().positive(), z.string()])
  .transform((value) => (typeof value === 'number' ? value : parseDuration(value)))
  .pipe(z.number().int().positive());

/**
 * `{ limit, window, strategy }` or the compact `[limit, window, strategy]`
 */
export const RuleConfigSchema = z
  .union([
    z
      .object({
        limit: z.number().int().min(0),
        window: DurationSchema,
        strategy: z.string().min(1),
      })
      .strict(),
    z.tuple([z.number().int().min(0), DurationSchema, z.string().min(1)]),
  ])
  .transform((rule) =>
    Array.isArray(rule)
      ? { limit: rule[0], windowSeconds: rule[1], strategy: rule[2] }
      : { limit: rule.limit, windowSeconds: rule.window, strategy: rule.strategy }
  );

export type RuleConfigInput = z.input<typeof RuleConfigSchema>;

export const BanConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    /** Offenses before a ban */
    threshold: z.number().int().min(1).default(DEFAULT_BAN_THRESHOLD),
    initialBan: DurationSchema.default(DEFAULT_INITIAL_BAN),
    maxBan: DurationSchema.default(DEFAULT_MAX_BAN),
    /** Minimum lifetime of the escalation record after a ban */
    decayWindow: DurationSchema.default(DEFAULT_BAN_DECAY),
    siteWide: z.boolean().default(true),
  })
  .strict();

export const LimiterConfigSchema = z
  .object({
    redisUrl: z.string().min(1).default(DEFAULT_REDIS_URL),
    rules: z.record(z.string(), RuleConfigSchema).default({}),
    exempt: z.array(z.string()).default([]),
    bans: BanConfigSchema.default({}),
    /** Identify clients by the first X-Forwarded-For entry (only behind a trusted proxy) */
    trustForwardedFor: z.boolean().default(false),
    /** Admit requests when the store is unreachable (default: reject with 503) */
    failOpen: z.boolean().default(false),
  })
  .strict();

export type LimiterConfigInput = z.input<typeof LimiterConfigSchema>;
export type ParsedLimiterConfig = z.output<typeof LimiterConfigSchema>;
