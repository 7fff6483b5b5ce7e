/**
 * Redirect Command
 *
 * Build a signed ID Site (or logout) redirect URL
 */

import chalk from 'chalk';
import { DEFAULT_SSO_BASE_URL, RedirectUrlBuilder } from '@hosted-sso/idsite-core';

export interface RedirectCommandOptions {
  keyId: string;
  secret: string;
  appHref: string;
  callback: string;
  baseUrl?: string;
  path?: string;
  state?: string;
  organization?: string;
  logout?: boolean;
}

export function buildRedirectUrl(options: RedirectCommandOptions): string {
  const builder = new RedirectUrlBuilder({
    applicationHref: options.appHref,
    ssoBaseUrl: options.baseUrl ?? DEFAULT_SSO_BASE_URL,
  });

  return builder.build({ id: options.keyId, secret: options.secret }, options.callback, {
    path: options.path,
    state: options.state,
    organizationNameKey: options.organization,
    logout: options.logout,
  });
}

export function redirectCommand(options: RedirectCommandOptions): number {
  try {
    const url = buildRedirectUrl(options);
    console.log(chalk.blue.bold(options.logout ? '\n🚪 Logout redirect\n' : '\n🔐 Login redirect\n'));
    console.log(url);
    console.log();
    return 0;
  } catch (error) {
    console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
    return 1;
  }
}
