#!/usr/bin/env node

/**
 * ID Site CLI
 *
 * Build signed redirect URLs and inspect callback URLs from the command line
 */

import { Command, InvalidArgumentError } from 'commander';
import { inspectCommand, type InspectCommandOptions } from './commands/inspect.js';
import { redirectCommand, type RedirectCommandOptions } from './commands/redirect.js';

function parseSeconds(value: string): number {
  const seconds = parseInt(value, 10);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return seconds;
}

const program = new Command();

program
  .name('idsite')
  .description('ID Site CLI - signed redirects and callback inspection')
  .version('0.1.0');

/**
 * redirect command - Build a login or logout redirect URL
 */
program
  .command('redirect')
  .description('Build a signed redirect URL to the hosted login page')
  .requiredOption('--key-id <id>', 'API key id (iss)', process.env.IDSITE_API_KEY_ID)
  .requiredOption('--secret <secret>', 'API key secret', process.env.IDSITE_API_KEY_SECRET)
  .requiredOption('--app-href <href>', 'Application href (sub)', process.env.IDSITE_APPLICATION_HREF)
  .requiredOption('--callback <uri>', 'Callback URI (cb_uri)', process.env.IDSITE_CALLBACK_URI)
  .option('--base-url <url>', 'Hosted login base URL', process.env.IDSITE_BASE_URL)
  .option('--path <path>', 'Hosted page route, e.g. /#/register')
  .option('--state <state>', 'Opaque state echoed back in the callback')
  .option('--organization <nameKey>', 'Organization name key')
  .option('--logout', 'Build a logout redirect')
  .action((options: RedirectCommandOptions) => {
    process.exitCode = redirectCommand(options);
  });

/**
 * inspect command - Verify a callback URL
 */
program
  .command('inspect')
  .description('Verify a callback URL and print its claims')
  .argument('<callback-url>', 'Full URL the hosted page redirected to')
  .requiredOption('--key-id <id>', 'API key id (aud)', process.env.IDSITE_API_KEY_ID)
  .requiredOption('--secret <secret>', 'API key secret', process.env.IDSITE_API_KEY_SECRET)
  .option('--issuer <issuer...>', 'Accepted issuers')
  .option('--clock-tolerance <seconds>', 'Leeway for exp and nbf', parseSeconds)
  .option('--param <name>', 'Token query parameter', 'jwtResponse')
  .action(async (callbackUrl: string, options: InspectCommandOptions) => {
    process.exitCode = await inspectCommand(callbackUrl, options);
  });

await program.parseAsync();
