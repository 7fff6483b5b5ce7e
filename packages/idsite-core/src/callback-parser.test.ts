import { describe, it, expect } from 'vitest';
import { extractToken } from './callback-parser.js';

describe('extractToken', () => {
  it('returns the jwtResponse parameter', () => {
    const result = extractToken('https://app.example.com/callback?jwtResponse=aaa.bbb.ccc');
    expect(result).toEqual({ ok: true, value: 'aaa.bbb.ccc' });
  });

  it('decodes percent-encoded values', () => {
    const result = extractToken('https://app.example.com/callback?foo=1&jwtResponse=aaa%2Ebbb%2Eccc');
    expect(result).toEqual({ ok: true, value: 'aaa.bbb.ccc' });
  });

  it('reads a custom parameter name', () => {
    const result = extractToken('https://app.example.com/saml?token=aaa.bbb.ccc', 'token');
    expect(result).toEqual({ ok: true, value: 'aaa.bbb.ccc' });
  });

  it('rejects a URL that cannot be parsed', () => {
    const result = extractToken('/callback?jwtResponse=aaa.bbb.ccc');
    expect(result).toEqual({
      ok: false,
      error: { code: 'malformed', message: 'Callback URL could not be parsed' },
    });
  });

  it('rejects a URL without the parameter', () => {
    const result = extractToken('https://app.example.com/callback?state=x');
    expect(result).toEqual({
      ok: false,
      error: { code: 'malformed', message: 'Callback URL has no jwtResponse parameter' },
    });
  });

  it('rejects an empty parameter', () => {
    const result = extractToken('https://app.example.com/callback?jwtResponse=');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('malformed');
      expect(result.error.message).toBe('Callback URL has an empty jwtResponse parameter');
    }
  });

  it('rejects a repeated parameter', () => {
    const result = extractToken('https://app.example.com/callback?jwtResponse=a.b.c&jwtResponse=d.e.f');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Callback URL has more than one jwtResponse parameter');
    }
  });
});
