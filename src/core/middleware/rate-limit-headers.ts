/**
 * RateLimit header fields (IETF httpapi-ratelimit-headers draft)
 *
 *   RateLimit-Policy: 100;w=60
 *   RateLimit: limit=100, remaining=42, reset=17
 */

export const RATE_LIMIT_POLICY_HEADER = 'RateLimit-Policy';
export const RATE_LIMIT_HEADER = 'RateLimit';
export const RETRY_AFTER_HEADER = 'Retry-After';

export function formatPolicyHeader(limit: number, windowSeconds: number): string {
  return `${limit};w=${windowSeconds}`;
}

export function formatStatusHeader(limit: number, remaining: number, resetSeconds: number): string {
  return `limit=${limit}, remaining=${remaining}, reset=${resetSeconds}`;
}
