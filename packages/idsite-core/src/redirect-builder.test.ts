import { describe, it, expect } from 'vitest';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { RedirectUrlBuilder } from './redirect-builder.js';
import { IdSiteError } from './errors.js';
import { APP_HREF, NOW, NOW_SEC, TEST_KEY } from './__tests__/hosted-page.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function createBuilder(ssoBaseUrl?: string): RedirectUrlBuilder {
  return new RedirectUrlBuilder({ applicationHref: APP_HREF, ssoBaseUrl, now: () => NOW });
}

function requestToken(url: string, param: string = 'jwtRequest'): string {
  const token = new URL(url).searchParams.get(param);
  if (!token) throw new Error(`missing ${param}`);
  return token;
}

function requestClaims(url: string, param?: string): JwtPayload {
  const claims = jwt.verify(requestToken(url, param), TEST_KEY.secret, { algorithms: ['HS256'] });
  if (typeof claims === 'string') throw new Error('string payload');
  return claims;
}

describe('RedirectUrlBuilder.build', () => {
  it('targets the hosted login endpoint with a jwtRequest parameter', () => {
    const url = createBuilder().build(TEST_KEY, 'https://app.example.com/callback');

    const parsed = new URL(url);
    expect(parsed.origin + parsed.pathname).toBe('https://login.example.com/sso');
    expect([...parsed.searchParams.keys()]).toEqual(['jwtRequest']);
  });

  it('signs the request claims with HS256', () => {
    const url = createBuilder().build(TEST_KEY, 'https://app.example.com/callback');
    const decoded = jwt.decode(requestToken(url), { complete: true });

    expect(decoded?.header.alg).toBe('HS256');
  });

  it('includes the required claims and leaves optional ones out', () => {
    const url = createBuilder().build(TEST_KEY, 'https://app.example.com/callback');
    const claims = requestClaims(url);

    expect(claims.iat).toBe(NOW_SEC);
    expect(claims.jti).toMatch(UUID_RE);
    expect(claims.iss).toBe('test-key-id');
    expect(claims.sub).toBe(APP_HREF);
    expect(claims.cb_uri).toBe('https://app.example.com/callback');
    expect(Object.keys(claims).sort()).toEqual(['cb_uri', 'iat', 'iss', 'jti', 'sub']);
  });

  it('includes path and state when supplied', () => {
    const url = createBuilder().build(TEST_KEY, 'https://app.example.com/callback', {
      path: '/#/register',
      state: 'test',
    });
    const claims = requestClaims(url);

    expect(claims.path).toBe('/#/register');
    expect(claims.state).toBe('test');
  });

  it('maps organization options to onk, sof and usd', () => {
    const url = createBuilder().build(TEST_KEY, 'https://app.example.com/callback', {
      organizationNameKey: 'acme',
      showOrganizationField: true,
      useSubdomain: false,
    });
    const claims = requestClaims(url);

    expect(claims.onk).toBe('acme');
    expect(claims.sof).toBe(true);
    expect(claims.usd).toBe(false);
  });

  it('generates a fresh jti for every redirect', () => {
    const builder = createBuilder();
    const first = requestClaims(builder.build(TEST_KEY, 'https://app.example.com/callback'));
    const second = requestClaims(builder.build(TEST_KEY, 'https://app.example.com/callback'));

    expect(first.jti).not.toBe(second.jti);
  });

  it('uses the logout endpoint for logout redirects', () => {
    const url = createBuilder().build(TEST_KEY, 'https://app.example.com/callback', { logout: true });
    const parsed = new URL(url);

    expect(parsed.origin + parsed.pathname).toBe('https://login.example.com/sso/logout');
  });

  it('trims trailing slashes from the base URL', () => {
    const url = createBuilder('https://id.example.org/').build(TEST_KEY, 'https://app.example.com/callback');

    expect(url.startsWith('https://id.example.org/sso?jwtRequest=')).toBe(true);
  });

  it('throws on an empty callback URI', () => {
    expect(() => createBuilder().build(TEST_KEY, '')).toThrow(IdSiteError);
    expect(() => createBuilder().build(TEST_KEY, '')).toThrow('Callback URI is required');
  });

  it('throws on a key without a secret', () => {
    expect(() => createBuilder().build({ id: 'k', secret: '' }, 'https://app.example.com/callback')).toThrow(
      'Signing key must have an id and a secret',
    );
  });

  it('requires an application href', () => {
    expect(() => new RedirectUrlBuilder({ applicationHref: '' })).toThrow('applicationHref is required');
  });
});

describe('RedirectUrlBuilder.buildSamlIdpRedirectUrl', () => {
  const idpEndpoint = `${APP_HREF}/saml/sso/idpRedirect`;

  it('carries the token in an accessToken parameter', () => {
    const url = createBuilder().buildSamlIdpRedirectUrl(TEST_KEY, 'http://localhost/', idpEndpoint);

    expect(url.startsWith(`${idpEndpoint}?accessToken=`)).toBe(true);
    const claims = requestClaims(url, 'accessToken');
    expect(claims.cb_uri).toBe('http://localhost/');
    expect(claims.path).toBeUndefined();
    expect(claims.state).toBeUndefined();
  });

  it('includes path and state when supplied', () => {
    const url = createBuilder().buildSamlIdpRedirectUrl(TEST_KEY, 'http://testserver/', idpEndpoint, {
      path: '/#/register',
      state: 'test',
    });
    const claims = requestClaims(url, 'accessToken');

    expect(claims.path).toBe('/#/register');
    expect(claims.state).toBe('test');
  });

  it('appends to an endpoint that already has a query string', () => {
    const url = createBuilder().buildSamlIdpRedirectUrl(TEST_KEY, 'http://localhost/', `${idpEndpoint}?x=1`);

    expect(url.startsWith(`${idpEndpoint}?x=1&accessToken=`)).toBe(true);
  });

  it('throws without an endpoint', () => {
    expect(() => createBuilder().buildSamlIdpRedirectUrl(TEST_KEY, 'http://localhost/', '')).toThrow(
      'SAML IdP endpoint is required',
    );
  });
});
