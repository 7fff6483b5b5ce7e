/**
 * Builds signed redirect URLs to the hosted login page (ID Site) and to SAML
 * identity providers.
 */

import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { IdSiteError } from './errors.js';
import type {
  ApiKeyRecord,
  RedirectClaims,
  RedirectOptions,
  RedirectUrlBuilderOptions,
} from './types.js';

export const SIGNING_ALGORITHM = 'HS256';
export const DEFAULT_SSO_BASE_URL = 'https://login.example.com';
export const REQUEST_PARAM = 'jwtRequest';
export const SAML_REQUEST_PARAM = 'accessToken';

export class RedirectUrlBuilder {
  private readonly ssoBaseUrl: string;
  private readonly now: () => number;

  constructor(private readonly options: RedirectUrlBuilderOptions) {
    if (!options.applicationHref) {
      throw new IdSiteError('invalid_input', 'applicationHref is required');
    }
    this.ssoBaseUrl = (options.ssoBaseUrl ?? DEFAULT_SSO_BASE_URL).replace(/\/+$/, '');
    this.now = options.now ?? Date.now;
  }

  /**
   * Build the ID Site redirect URL for a login (or, with `logout`, a logout)
   */
  build(signingKey: ApiKeyRecord, callbackUri: string, options: RedirectOptions = {}): string {
    const token = this.sign(signingKey, callbackUri, options);
    const endpoint = options.logout ? `${this.ssoBaseUrl}/sso/logout` : `${this.ssoBaseUrl}/sso`;
    const params = new URLSearchParams({ [REQUEST_PARAM]: token });
    return `${endpoint}?${params.toString()}`;
  }

  /**
   * Build the redirect URL for a SAML IdP endpoint registered on the application
   */
  buildSamlIdpRedirectUrl(
    signingKey: ApiKeyRecord,
    callbackUri: string,
    idpEndpoint: string,
    options: Omit<RedirectOptions, 'logout'> = {},
  ): string {
    if (!idpEndpoint) {
      throw new IdSiteError('invalid_input', 'SAML IdP endpoint is required');
    }
    const token = this.sign(signingKey, callbackUri, options);
    const params = new URLSearchParams({ [SAML_REQUEST_PARAM]: token });
    const separator = idpEndpoint.includes('?') ? '&' : '?';
    return `${idpEndpoint}${separator}${params.toString()}`;
  }

  /**
   * Assemble the request claims. Optional claims are left out entirely when
   * not supplied.
   */
  buildClaims(signingKey: ApiKeyRecord, callbackUri: string, options: RedirectOptions = {}): RedirectClaims {
    if (!callbackUri) {
      throw new IdSiteError('invalid_input', 'Callback URI is required');
    }
    if (!signingKey.id || !signingKey.secret) {
      throw new IdSiteError('invalid_input', 'Signing key must have an id and a secret');
    }

    const claims: RedirectClaims = {
      iat: Math.floor(this.now() / 1000),
      jti: randomUUID(),
      iss: signingKey.id,
      sub: this.options.applicationHref,
      cb_uri: callbackUri,
    };

    if (options.path) claims.path = options.path;
    if (options.state) claims.state = options.state;
    if (options.organizationNameKey) claims.onk = options.organizationNameKey;
    if (options.showOrganizationField !== undefined) claims.sof = options.showOrganizationField;
    if (options.useSubdomain !== undefined) claims.usd = options.useSubdomain;

    return claims;
  }

  private sign(signingKey: ApiKeyRecord, callbackUri: string, options: RedirectOptions): string {
    const claims = this.buildClaims(signingKey, callbackUri, options);
    return jwt.sign(claims, signingKey.secret, { algorithm: SIGNING_ALGORITHM });
  }
}
