/**
 * Resolved configuration, ready to build an engine from
 */

import type { BanPolicy, Rule } from '../types.js';

export interface LimiterConfig {
  redisUrl: string;
  rules: Rule[];
  /** Path patterns that bypass every rule */
  exempt: string[];
  bans: BanPolicy;
  trustForwardedFor: boolean;
  failOpen: boolean;
}
