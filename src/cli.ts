#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Bootstraps the ones-wiki CLI, which serves ONES wiki pages to MCP agents as
 *              AI-readable text.
 *
 * Commands exposed by the entry point:
 *   - `init`: capture the ONES host and login credentials in `.oneswikirc.json`.
 *   - `serve`: run the MCP server (stdio by default, `--transport http` for Streamable HTTP).
 *   - `fetch`: render a single wiki page to stdout.
 *
 * @example
 *   ones-wiki init
 *   ones-wiki serve
 *   ones-wiki serve --transport http --port 3233
 *   ones-wiki fetch "https://ones.example.com/wiki/#/team/T1/space/S1/page/P1"
 */

import chalk from 'chalk';
import { Command } from 'commander';
import figlet from 'figlet';
import pkg from '../package.json';
import fetchCommand from './commands/fetch';
import initCommand from './commands/init';
import serveCommand from './commands/serve';
import { errorMessage } from './lib/errors';

const program = new Command();
program
  .name('ones-wiki')
  .description('MCP server and CLI that turn ONES wiki pages into AI-readable text')
  .version(pkg.version, '-v, --version', 'Display CLI version');

program.addCommand(initCommand);
program.addCommand(serveCommand);
program.addCommand(fetchCommand);

const args = process.argv.slice(2);

if (!args.length) {
  const banner = figlet.textSync('ONES Wiki', { font: 'Standard' });
  console.error(chalk.hex('#9be2ff')(banner));
  program.outputHelp();
  process.exit(0);
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(`[error] ${errorMessage(error)}`));
    process.exit(1);
  });
}
