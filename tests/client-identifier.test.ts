import { describe, it, expect } from 'vitest';
import { resolveClientIdentifier } from '../src/core/middleware/client-identifier.js';

describe('resolveClientIdentifier', () => {
  it('should_useFirstForwardedEntry_when_trusted', () => {
    const req = { headers: { 'x-forwarded-for': ' 198.51.100.1 , 10.0.0.1' }, socket: { remoteAddress: '10.0.0.2' } };
    expect(resolveClientIdentifier(req, true)).toBe('198.51.100.1');
  });

  it('should_ignoreForwardedFor_when_untrusted', () => {
    const req = { headers: { 'x-forwarded-for': '198.51.100.1' }, socket: { remoteAddress: '10.0.0.2' } };
    expect(resolveClientIdentifier(req, false)).toBe('10.0.0.2');
  });

  it('should_fallBackToSocket_when_forwardedEntryEmpty', () => {
    const req = { headers: { 'x-forwarded-for': ', 10.0.0.1' }, socket: { remoteAddress: '10.0.0.2' } };
    expect(resolveClientIdentifier(req, true)).toBe('10.0.0.2');
  });

  it('should_returnUnknown_when_noAddressAvailable', () => {
    expect(resolveClientIdentifier({ headers: {} }, true)).toBe('unknown');
    expect(resolveClientIdentifier({ headers: {}, socket: {} }, false)).toBe('unknown');
  });
});
