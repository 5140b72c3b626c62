/**
 * Duration strings used across configuration ("5m", "1h", "2d", "90")
 */

const SECONDS_PER_DAY = 86_400;
const SECONDS_PER_HOUR = 3_600;
const SECONDS_PER_MINUTE = 60;

/**
 * Parse a duration string into whole seconds.
 *
 * Parsing is lenient: every non-digit character is dropped when reading the
 * magnitude, and a string without digits reads as 1. The unit is the first
 * of `d`, `h`, `m` that appears anywhere in the lowercased string, checked
 * in that order; anything else means seconds.
 *
 * @example
 * parseDuration('5m')   // 300
 * parseDuration('1d')   // 86400
 * parseDuration('h')    // 3600
 * parseDuration('45')   // 45
 * parseDuration('1.5h') // 54000 (digits "15")
 */
export function parseDuration(value: string): number {
  const normalized = value.trim().toLowerCase();
  const digits = normalized.replace(/\D/g, '');
  const magnitude = digits.length > 0 ? parseInt(digits, 10) : 1;

  if (normalized.includes('d')) return magnitude * SECONDS_PER_DAY;
  if (normalized.includes('h')) return magnitude * SECONDS_PER_HOUR;
  if (normalized.includes('m')) return magnitude * SECONDS_PER_MINUTE;
  return magnitude;
}
