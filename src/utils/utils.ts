/**
 * Utility functions for admission-guard
 */

import * as crypto from 'crypto';

/**
 * Hex digest of a UTF-8 string
 */
export function digestHex(algorithm: 'sha1' | 'sha256', value: string): string {
  return crypto.createHash(algorithm).update(value, 'utf8').digest('hex');
}

/**
 * Type guard to check if value is an Error instance
 */
export function isError(e: unknown): e is Error {
  return e instanceof Error;
}

/**
 * Normalize unknown error to Error
 *
 * @example
 * ```typescript
 * catch (error: unknown) {
 *   const err = normalizeError(error);
 *   console.error(err.message, err.stack);
 * }
 * ```
 */
export function normalizeError(error: unknown): Error;
/**
 * Normalize unknown error to Error with context
 *
 * @param context - Contextual prefix for the error message
 */
export function normalizeError(error: unknown, context: string): Error;
export function normalizeError(error: unknown, context?: string): Error {
  if (isError(error)) {
    return context ? new Error(`${context}: ${error.message}`) : error;
  }

  if (typeof error === 'string') {
    return new Error(context ? `${context}: ${error}` : error);
  }

  if (typeof error === 'object' && error !== null) {
    let serialized: string;
    try {
      serialized = JSON.stringify(error);
    } catch {
      // Circular reference or BigInt
      serialized = String(error);
    }
    return new Error(context ? `${context}: ${serialized}` : serialized);
  }

  const stringified = String(error);
  return new Error(context ? `${context}: ${stringified}` : stringified);
}
