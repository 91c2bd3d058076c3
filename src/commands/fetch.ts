/**
 * @file src/commands/fetch.ts
 * @description Fetches one wiki page and prints the rendered text, the same output the MCP tool
 *              returns.
 */

import { Command } from 'commander';
import ora from 'ora';
import { createLogger } from '../shared/logger';
import {
  createWikiContentDependencies,
  runWikiContentWorkflow,
} from '../workflows/wiki-content-workflow';
import { addCredentialOptions, type CredentialCliOptions, resolveConfigOrExit } from './options';

const fetchCommand = addCredentialOptions(
  new Command('fetch')
    .description('Print a ONES wiki page as AI-readable text')
    .argument('<wikiUrl>', 'Wiki page URL (https://<host>/wiki/#/team/<team>/space/<space>/page/<page>)'),
).action(async (wikiUrl: string, options: CredentialCliOptions) => {
  const config = resolveConfigOrExit(options);
  const deps = createWikiContentDependencies(config, createLogger('[ones-wiki]'));
  const spinner = ora({ text: `[fetch] ${wikiUrl}`, stream: process.stderr }).start();
  const text = await runWikiContentWorkflow(wikiUrl, deps);
  spinner.stop();
  process.stdout.write(`${text}\n`);
});

export default fetchCommand;
