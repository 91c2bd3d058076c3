/**
 * @file src/commands/init.ts
 * @description Interactive/non-interactive configuration. Captures the ONES host, login
 *              credentials and request defaults in `.oneswikirc.json`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import prompts from 'prompts';
import {
  CONFIG_PATH,
  FALLBACK_TIMEOUT_MS,
  normalizeHost,
  readConfig,
  writeConfig,
} from '../shared/config';
import { parsePositiveIntOption } from './options';

type InitOptions = {
  host?: string;
  email?: string;
  password?: string;
  timeout?: number;
  relogin?: boolean;
};

const normalize = (value?: string | null) =>
  value && value.trim().length ? value.trim() : undefined;

const initCommand = new Command('init')
  .description('Configure the ONES host, login credentials and request defaults')
  .option('--host <host>', 'ONES host, e.g. ones.example.com')
  .option('--email <email>', 'Login email')
  .option('--password <password>', 'Login password')
  .option('--timeout <ms>', 'Request timeout in milliseconds', parsePositiveIntOption)
  .option('--relogin', 'Log in again when both endpoints reject the session')
  .action(async (options: InitOptions) => {
    const existing = readConfig();
    const onCancel = () => {
      console.log(chalk.yellow('Initialization cancelled.'));
      process.exit(1);
    };

    const responses = await prompts(
      [
        {
          type: options.host ? null : 'text',
          name: 'host',
          message: 'ONES host',
          initial: existing.host ?? '',
          validate: (value: string) => (normalizeHost(value) ? true : 'Host is required.'),
        },
        {
          type: options.email ? null : 'text',
          name: 'email',
          message: 'Login email',
          initial: existing.email ?? '',
          validate: (value: string) => (value && value.trim().length ? true : 'Email is required.'),
        },
        {
          type: options.password ? null : 'password',
          name: 'password',
          message: 'Login password',
          validate: (value: string) => (value && value.length ? true : 'Password is required.'),
        },
        {
          type: options.timeout !== undefined ? null : 'number',
          name: 'timeoutMs',
          message: 'Request timeout (ms)',
          initial: existing.timeoutMs ?? FALLBACK_TIMEOUT_MS,
          validate: (value: number) => (value > 0 ? true : 'Timeout must be greater than zero.'),
        },
        {
          type: options.relogin !== undefined ? null : 'toggle',
          name: 'reloginOnUnauthorized',
          message: 'Log in again when the session is rejected?',
          active: 'yes',
          inactive: 'no',
          initial: existing.reloginOnUnauthorized ?? false,
        },
      ],
      { onCancel },
    );

    const host = normalizeHost(options.host) ?? normalizeHost(responses.host);
    const email = normalize(options.email) ?? normalize(responses.email);
    const password = options.password ?? responses.password;
    if (!host || !email || typeof password !== 'string' || !password.length) {
      console.error(chalk.red('[error] Host, email and password are required.'));
      process.exit(1);
    }

    const timeoutMs = Number(options.timeout ?? responses.timeoutMs) || FALLBACK_TIMEOUT_MS;
    const reloginOnUnauthorized =
      options.relogin === true
        ? true
        : typeof responses.reloginOnUnauthorized === 'boolean'
          ? responses.reloginOnUnauthorized
          : (existing.reloginOnUnauthorized ?? false);

    const updated = writeConfig({ host, email, password, timeoutMs, reloginOnUnauthorized });

    console.log(chalk.green('ones-wiki configured successfully.'));
    console.log(chalk.gray(`   Saved to ${CONFIG_PATH}`));
    console.log(
      [
        '',
        'Current defaults:',
        `  • Host: ${updated.host}`,
        `  • Email: ${updated.email}`,
        `  • Timeout: ${updated.timeoutMs ?? FALLBACK_TIMEOUT_MS}ms`,
        `  • Re-login on 401/403: ${updated.reloginOnUnauthorized ? 'enabled' : 'disabled'}`,
        '',
      ].join('\n'),
    );
  });

export default initCommand;
