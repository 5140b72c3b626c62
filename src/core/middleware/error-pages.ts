/**
 * Bodies for rejected requests
 *
 * Clients that accept `application/json` get a JSON object; everyone else
 * (browsers) gets a small standalone HTML page.
 */

export type RejectionStatus = 429 | 403 | 503;

export interface RejectionBody {
  error: 'rate_limit_exceeded' | 'forbidden' | 'service_unavailable';
  retry_after?: number;
}

const PAGE_STYLE =
  'margin:0;height:100vh;display:grid;place-items:center;background:#0d1117;color:#c9d1d9;font:16px system-ui,sans-serif';
const CARD_STYLE =
  'width:500px;padding:32px;background:#161b22;border-radius:12px;text-align:center;border:2px solid #30363d';

function page(title: string, lines: string[]): string {
  const body = lines.map((line, i) => (i === 0 ? `<p style="margin:12px 0">${line}</p>` : `<p style="color:#8b949e">${line}</p>`));
  return (
    `<body style="${PAGE_STYLE}"><div style="${CARD_STYLE}">` +
    `<h1 style="color:#f85149;margin:0 0 16px;font-size:32px">${title}</h1>` +
    body.join('') +
    '</div></body>'
  );
}

export function acceptsJson(accept: string | undefined): boolean {
  return accept !== undefined && accept.includes('application/json');
}

export function rejectionBody(status: RejectionStatus, retryAfterSeconds?: number): RejectionBody {
  switch (status) {
    case 429:
      return { error: 'rate_limit_exceeded', retry_after: retryAfterSeconds };
    case 403:
      return { error: 'forbidden', retry_after: retryAfterSeconds };
    case 503:
      return { error: 'service_unavailable' };
  }
}

export function renderErrorPage(status: RejectionStatus, retryAfterSeconds?: number): string {
  switch (status) {
    case 429:
      return page('429 Too Many Requests', [
        'Rate limit exceeded.',
        `Retry in <strong>${retryAfterSeconds ?? 1}</strong>s`,
      ]);
    case 403:
      return page('403 Blocked', ['Too many requests from your address.', 'Temporarily blocked due to abuse.']);
    case 503:
      return page('503 Service Unavailable', ['Please try again shortly.']);
  }
}
