/**
 * @hosted-sso/idsite-core
 *
 * Signed redirects to a hosted login page (ID Site / SAML IdP) and
 * verification of the tokens it sends back.
 */

export * from './types.js';
export * from './errors.js';
export * from './redirect-builder.js';
export * from './callback-parser.js';
export * from './callback-verifier.js';
export * from './claims.js';
export * from './nonce-store.js';
export * from './result-factory.js';
export * from './callback-handler.js';
