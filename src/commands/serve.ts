/**
 * @file src/commands/serve.ts
 * @description Starts the MCP server on stdio (default) or Streamable HTTP.
 */

import { Command, Option } from 'commander';
import { startHttpServer, startStdioServer } from '../mcp/server';
import { resolveHttpServerOptions } from '../shared/config';
import { createToolLogger } from '../tools/utils';
import { createWikiContentDependencies } from '../workflows/wiki-content-workflow';
import {
  addCredentialOptions,
  type CredentialCliOptions,
  parsePositiveIntOption,
  resolveConfigOrExit,
} from './options';

type ServeCliOptions = CredentialCliOptions & {
  transport: 'stdio' | 'http';
  port?: number;
  bind?: string;
};

const serveCommand = addCredentialOptions(
  new Command('serve').description('Run the MCP server exposing the getWikiContent tool'),
)
  .addOption(
    new Option('--transport <kind>', 'MCP transport').choices(['stdio', 'http']).default('stdio'),
  )
  .option(
    '--port <number>',
    'HTTP port (env: ONES_MCP_PORT, default 3233)',
    parsePositiveIntOption,
  )
  .option('--bind <host>', 'HTTP bind address (env: ONES_MCP_HOST, default 127.0.0.1)')
  .action(async (options: ServeCliOptions) => {
    const config = resolveConfigOrExit(options);
    const deps = createWikiContentDependencies(config, createToolLogger());
    if (options.transport === 'http') {
      await startHttpServer(deps, resolveHttpServerOptions({ host: options.bind, port: options.port }));
    } else {
      await startStdioServer(deps);
    }
  });

export default serveCommand;
