import type { IncomingHttpHeaders } from 'http';
import { UNKNOWN_IDENTIFIER } from '../../constants.js';

/**
 * Request fields needed to identify a client (Express requests and plain
 * Node requests both fit)
 */
export interface IdentifiableRequest {
  headers: IncomingHttpHeaders;
  socket?: { remoteAddress?: string };
}

function firstForwardedAddress(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  const first = value?.split(',')[0]?.trim();
  return first ? first : undefined;
}

/**
 * Client identifier for rate limiting
 *
 * The first X-Forwarded-For entry is used only when `trustForwardedFor` is
 * set; clients control that header, so enable it only behind a proxy that
 * overwrites it.
 */
export function resolveClientIdentifier(req: IdentifiableRequest, trustForwardedFor: boolean): string {
  if (trustForwardedFor) {
    const forwarded = firstForwardedAddress(req.headers['x-forwarded-for']);
    if (forwarded) return forwarded;
  }
  return req.socket?.remoteAddress || UNKNOWN_IDENTIFIER;
}
