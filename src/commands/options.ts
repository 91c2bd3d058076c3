/**
 * @file src/commands/options.ts
 * @description Credential flags shared by the commands that talk to the ONES backend.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { errorMessage } from '../lib/errors';
import { resolveWikiConfig, type WikiConfig } from '../shared/config';

export type CredentialCliOptions = {
  host?: string;
  email?: string;
  password?: string;
  timeout?: number;
  reloginOnUnauthorized?: boolean;
};

/** Commander argument parser for millisecond and port flags. */
export const parsePositiveIntOption = (value: string): number => {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

export const addCredentialOptions = (command: Command): Command =>
  command
    .option('--host <host>', 'ONES host, e.g. ones.example.com (env: ONES_HOST)')
    .option('--email <email>', 'Login email (env: ONES_EMAIL)')
    .option('--password <password>', 'Login password (env: ONES_PASSWORD)')
    .option(
      '--timeout <ms>',
      'Request timeout in milliseconds (env: ONES_TIMEOUT_MS)',
      parsePositiveIntOption,
    )
    .option(
      '--relogin-on-unauthorized',
      'Log in again and retry once when both endpoints answer 401/403',
    );

export const resolveConfigOrExit = (options: CredentialCliOptions): WikiConfig => {
  try {
    return resolveWikiConfig({
      host: options.host,
      email: options.email,
      password: options.password,
      timeoutMs: options.timeout,
      reloginOnUnauthorized: options.reloginOnUnauthorized,
    });
  } catch (error) {
    console.error(chalk.red(`[error] ${errorMessage(error)}`));
    process.exit(1);
  }
};
