/**
 * Error types surfaced by the engine
 *
 * Callers branch on the class (or `code`) to tell a store outage apart from
 * a configuration mistake. Neither is ever folded into an admission verdict.
 */

export type AdmissionErrorCode = 'STORE_UNAVAILABLE' | 'CONFIGURATION_INVALID';

export abstract class AdmissionError extends Error {
  constructor(
    public readonly code: AdmissionErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The shared store could not complete a transaction (network, timeout,
 * script error or an unreadable reply). Nothing was applied.
 */
export class StoreUnavailableError extends AdmissionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, options);
  }
}

/**
 * Rejected at setup time; never thrown while evaluating a request.
 */
export class ConfigurationError extends AdmissionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_INVALID', message, options);
  }
}
