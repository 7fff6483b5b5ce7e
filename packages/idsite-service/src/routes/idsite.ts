/**
 * ID Site routes
 *
 * Login, registration and logout redirects to the hosted login page, and
 * the callback the page sends the browser back to.
 */

import { Router, type Request, type Response } from 'express';
import type {
  ApiKeyRecord,
  FailureCode,
  IdSiteCallbackHandler,
  RedirectOptions,
  RedirectUrlBuilder,
} from '@hosted-sso/idsite-core';
import type { Account } from '../types.js';

export interface IdSiteRouteOptions {
  builder: RedirectUrlBuilder;
  callbackHandler: IdSiteCallbackHandler<Account>;
  signingKey: ApiKeyRecord;
  callbackUri: string;
  samlIdpUrl?: string;
}

export const FAILURE_STATUS: Record<FailureCode, number> = {
  malformed: 400,
  missing_audience: 400,
  missing_claim: 400,
  invalid_claim: 400,
  unknown_signer: 401,
  bad_signature: 401,
  expired: 401,
  not_yet_valid: 401,
  untrusted_issuer: 401,
  replayed: 409,
  signer_lookup_failed: 502,
  nonce_store_failed: 502,
  account_resolution_failed: 502,
};

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createIdSiteRouter(options: IdSiteRouteOptions): Router {
  const router = Router();
  const { builder, callbackHandler, signingKey, callbackUri } = options;

  const redirect = (res: Response, redirectOptions: RedirectOptions): void => {
    res.redirect(302, builder.build(signingKey, callbackUri, redirectOptions));
  };

  /**
   * GET /idsite/login
   */
  router.get('/login', (req, res) => {
    redirect(res, {
      path: queryString(req.query.path),
      state: queryString(req.query.state),
      organizationNameKey: queryString(req.query.organization),
    });
  });

  /**
   * GET /idsite/register
   */
  router.get('/register', (req, res) => {
    redirect(res, { path: '/#/register', state: queryString(req.query.state) });
  });

  /**
   * GET /idsite/logout
   */
  router.get('/logout', (req, res) => {
    redirect(res, { logout: true, state: queryString(req.query.state) });
  });

  /**
   * GET /idsite/saml/login
   */
  router.get('/saml/login', (req, res) => {
    if (!options.samlIdpUrl) {
      res.status(404).json({ error: 'SAML is not configured' });
      return;
    }
    const url = builder.buildSamlIdpRedirectUrl(signingKey, callbackUri, options.samlIdpUrl, {
      state: queryString(req.query.state),
    });
    res.redirect(302, url);
  });

  /**
   * GET /idsite/callback
   *
   * Verifies the jwtResponse and returns the authenticated account
   */
  router.get('/callback', async (req: Request, res: Response): Promise<void> => {
    try {
      const callbackUrl = `${req.protocol}://${req.get('host') || 'localhost'}${req.originalUrl}`;
      const result = await callbackHandler.handle(callbackUrl);

      if (!result.ok) {
        const { code, message, claim } = result.error;
        // messages can carry unverified token values; log the code only
        console.warn(`ID Site callback rejected: ${code}`);
        res.status(FAILURE_STATUS[code]).json({ error: message, code, ...(claim ? { claim } : {}) });
        return;
      }

      const { account, state, isNewAccount, status } = result.value;
      res.json({
        account: {
          href: account.href,
          username: account.username,
          email: account.email,
          given_name: account.given_name,
          surname: account.surname,
          status: account.status,
        },
        isNewAccount,
        ...(state !== undefined ? { state } : {}),
        ...(status !== undefined ? { status } : {}),
      });
    } catch (error) {
      console.error('ID Site callback error:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
