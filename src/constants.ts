/**
 * Shared constants for admission-guard
 */

/** Hex characters of the identifier digest kept in storage keys */
export const IDENTIFIER_HASH_LENGTH = 16;

/** Hex characters of the rule pattern digest kept in storage keys */
export const RULE_TAG_LENGTH = 8;

/** Prefix of every rate counter key */
export const RATE_KEY_PREFIX = 'rl';

/** Prefix of site-wide ban keys */
export const BAN_KEY_PREFIX = 'ban';

/** Seconds a sliding log outlives its window */
export const SLIDING_LOG_EXPIRY_PADDING_SECONDS = 60;

/** Identifier used when neither a forwarded address nor a socket address exists */
export const UNKNOWN_IDENTIFIER = 'unknown';

/** Suffix that marks a path pattern as a prefix match */
export const WILDCARD_SUFFIX = '/*';

/** Default Redis connection URL */
export const DEFAULT_REDIS_URL = 'redis://localhost:6379';

/** Redis connect timeout in milliseconds */
export const DEFAULT_CONNECT_TIMEOUT_MS = 1_000;

/** Ban policy defaults, as duration strings where applicable */
export const DEFAULT_BAN_THRESHOLD = 8;
export const DEFAULT_INITIAL_BAN = '5m';
export const DEFAULT_MAX_BAN = '1d';
export const DEFAULT_BAN_DECAY = '1h';
