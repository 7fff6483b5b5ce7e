/**
 * Type definitions for ID Site / SAML redirect issuance and callback verification
 */

/**
 * API key used to sign outbound requests and verify inbound responses.
 * `id` is the value the hosted page puts in `aud`.
 */
export interface ApiKeyRecord {
  readonly id: string;
  readonly secret: string;
}

/**
 * Claims of the `jwtRequest` token sent to the hosted login page
 */
export interface RedirectClaims {
  iat: number;
  jti: string;
  iss: string;
  sub: string;
  cb_uri: string;
  path?: string;
  state?: string;
  onk?: string;
  sof?: boolean;
  usd?: boolean;
}

export type CallbackStatus = 'AUTHENTICATED' | 'REGISTERED' | 'LOGOUT';

/**
 * Claims of a `jwtResponse` token after signature and claim validation
 */
export interface VerifiedAssertion {
  irt: string;
  iss: string;
  sub: string;
  aud: string;
  isNewSub: boolean;
  iat?: number;
  exp?: number;
  cb_uri?: string;
  path?: string;
  state?: string;
  status?: CallbackStatus;
}

export interface RedirectOptions {
  /** UI route on the hosted page, e.g. `/#/register` */
  path?: string;
  /** Opaque value echoed back in the callback */
  state?: string;
  /** Organization name key to pre-select */
  organizationNameKey?: string;
  showOrganizationField?: boolean;
  useSubdomain?: boolean;
  /** Send the user to the hosted logout endpoint instead of login */
  logout?: boolean;
}

export interface RedirectUrlBuilderOptions {
  /** Href of the application the redirect is issued for (`sub`) */
  applicationHref: string;
  /**
   * Base URL of the hosted login service
   * @default "https://login.example.com"
   */
  ssoBaseUrl?: string;
  /** Clock in milliseconds, defaults to Date.now */
  now?: () => number;
}

export interface CallbackVerifierOptions {
  /** When non-empty, `iss` must be one of these */
  acceptedIssuers?: string[];
  /**
   * Leeway applied to `exp` and `nbf`, in seconds
   * @default 0
   */
  clockToleranceSec?: number;
  /**
   * Nonce lifetime when the response carries no `exp`, in seconds
   * @default 600
   */
  defaultNonceTtlSec?: number;
  now?: () => number;
}

/**
 * Account as seen by the callback. Concrete account stores extend it.
 */
export interface AccountRef {
  href: string;
}

export interface CallbackOutcome<TAccount extends AccountRef = AccountRef> {
  readonly account: TAccount;
  readonly state?: string;
  readonly isNewAccount: boolean;
  readonly status?: CallbackStatus;
}

/**
 * Looks up an API key by client id. Resolves null when the key does not exist;
 * rejects when the lookup itself failed.
 */
export interface ApiKeyResolver {
  lookup(clientId: string): Promise<ApiKeyRecord | null>;
}

export type AccountResolver<TAccount extends AccountRef = AccountRef> = (
  href: string,
) => Promise<TAccount | null>;
