/**
 * Express Rate Limit Middleware
 *
 * Maps admission decisions to HTTP:
 * - allowed: RateLimit-Policy / RateLimit headers (when a rule matched), next()
 * - rate limited: 429 with Retry-After and RateLimit headers (remaining=0)
 * - banned: 403 with Retry-After = remaining ban time
 * - store unavailable: 503, or next() when configured to fail open
 *
 * Rules match the full request path, wherever the middleware is mounted.
 * Only StoreUnavailableError is handled here; any other error goes to
 * Express's error handler.
 */

import type { Request, Response, NextFunction } from 'express';
import { StoreUnavailableError } from '../../errors.js';
import { hashIdentifier } from '../../keys/key-space.js';
import type { Decision } from '../../types.js';
import type { AdmissionGuard } from '../admission-guard.js';
import { resolveClientIdentifier } from './client-identifier.js';
import { acceptsJson, rejectionBody, renderErrorPage, type RejectionStatus } from './error-pages.js';
import {
  RATE_LIMIT_HEADER,
  RATE_LIMIT_POLICY_HEADER,
  RETRY_AFTER_HEADER,
  formatPolicyHeader,
  formatStatusHeader,
} from './rate-limit-headers.js';

export interface RateLimitMiddlewareOptions {
  /** Default: the guard's `trustForwardedFor` */
  trustForwardedFor?: boolean;
  /** Default: the guard's `failOpen` */
  failOpen?: boolean;
}

export class RateLimitMiddleware {
  private readonly trustForwardedFor: boolean;
  private readonly failOpen: boolean;

  constructor(
    private readonly guard: AdmissionGuard,
    options: RateLimitMiddlewareOptions = {}
  ) {
    this.trustForwardedFor = options.trustForwardedFor ?? guard.config.trustForwardedFor;
    this.failOpen = options.failOpen ?? guard.config.failOpen;
  }

  /**
   * Express middleware
   */
  handle = (req: Request, res: Response, next: NextFunction): void => {
    this.admit(req, res).then(
      (passThrough) => {
        if (passThrough) next();
      },
      (error: unknown) => next(error)
    );
  };

  /**
   * Answers the request or reports that it may proceed. Errors other than
   * StoreUnavailableError propagate.
   */
  private async admit(req: Request, res: Response): Promise<boolean> {
    const identifier = resolveClientIdentifier(req, this.trustForwardedFor);
    const path = requestPath(req);

    let decision: Decision;
    try {
      decision = await this.guard.check(path, identifier);
    } catch (error: unknown) {
      return this.handleFailure(error, path, req, res);
    }
    return this.respond(decision, identifier, path, req, res);
  }

  private respond(decision: Decision, identifier: string, path: string, req: Request, res: Response): boolean {
    switch (decision.outcome) {
      case 'allowed':
        if (decision.headers) {
          const { limit, windowSeconds, remaining, resetSeconds } = decision.headers;
          res.setHeader(RATE_LIMIT_POLICY_HEADER, formatPolicyHeader(limit, windowSeconds));
          res.setHeader(RATE_LIMIT_HEADER, formatStatusHeader(limit, remaining, resetSeconds));
        }
        return true;

      case 'rate_limited':
        res.setHeader(RETRY_AFTER_HEADER, String(decision.retryAfterSeconds));
        res.setHeader(RATE_LIMIT_POLICY_HEADER, formatPolicyHeader(decision.limit, decision.windowSeconds));
        res.setHeader(RATE_LIMIT_HEADER, formatStatusHeader(decision.limit, 0, decision.retryAfterSeconds));
        this.reject(req, res, 429, decision.retryAfterSeconds);
        return false;

      case 'banned':
        console.warn(
          `[RateLimitMiddleware] Blocked client ${hashIdentifier(identifier)} on ${path} ` +
            `(ban expires in ${decision.ttlSeconds}s)`
        );
        res.setHeader(RETRY_AFTER_HEADER, String(decision.ttlSeconds));
        this.reject(req, res, 403, decision.ttlSeconds);
        return false;
    }
  }

  private handleFailure(error: unknown, path: string, req: Request, res: Response): boolean {
    if (!(error instanceof StoreUnavailableError)) {
      throw error;
    }

    if (this.failOpen) {
      console.warn(`[RateLimitMiddleware] Store unavailable, admitting ${path} unchecked: ${error.message}`);
      return true;
    }

    console.error(`[RateLimitMiddleware] Store unavailable, rejecting ${path}: ${error.message}`);
    this.reject(req, res, 503);
    return false;
  }

  private reject(req: Request, res: Response, status: RejectionStatus, retryAfterSeconds?: number): void {
    if (acceptsJson(req.headers.accept)) {
      res.status(status).json(rejectionBody(status, retryAfterSeconds));
      return;
    }
    res.setHeader('Content-Type', 'text/html; charset=utf-8');
    res.status(status).send(renderErrorPage(status, retryAfterSeconds));
  }
}

/**
 * Full request path; `req.path` alone is relative to the mount point
 */
function requestPath(req: Request): string {
  return `${req.baseUrl}${req.path}`;
}
