/**
 * @file src/mcp/server.ts
 * @description MCP server exposing the `getWikiContent` tool over stdio or a session-aware
 *              Streamable HTTP endpoint.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import express, { type Express, type Request, type Response } from 'express';
import type { Server as HttpServer } from 'node:http';
import { randomUUID } from 'node:crypto';
import pkg from '../../package.json';
import type { HttpServerOptions } from '../shared/config';
import { createWikiContentHandler, WIKI_CONTENT_TOOL_NAME, wikiContentTool } from '../tools/wiki-content';
import type { WikiContentDependencies } from '../workflows/wiki-content-workflow';

export const SERVER_NAME = 'ones-wiki-mcp';

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

export const createWikiMcpServer = (deps: WikiContentDependencies): McpServer => {
  const server = new McpServer({
    name: SERVER_NAME,
    version: pkg.version,
  });

  server.registerTool(WIKI_CONTENT_TOOL_NAME, wikiContentTool, createWikiContentHandler(deps));

  return server;
};

export const startStdioServer = async (deps: WikiContentDependencies): Promise<McpServer> => {
  const server = createWikiMcpServer(deps);
  await server.connect(new StdioServerTransport());
  deps.logger.log('[mcp] serving on stdio');
  return server;
};

/** Builds the express app; every MCP session gets its own server sharing `deps`. */
export const createHttpApp = (deps: WikiContentDependencies): Express => {
  const sessions = new Map<string, McpSession>();

  const createServerSession = async (): Promise<McpSession> => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        sessions.delete(transport.sessionId);
      }
    };

    const server = createWikiMcpServer(deps);
    await server.connect(transport);
    return { transport, server };
  };

  const handleMcpRequest = async (req: Request, res: Response): Promise<void> => {
    const header = req.headers['mcp-session-id'];
    const sessionId = typeof header === 'string' ? header : undefined;
    let session = sessionId ? sessions.get(sessionId) : undefined;

    if (req.method === 'GET') {
      if (!session) {
        res.status(400).json({
          error: 'Invalid session',
          message: 'No active MCP session. Initialize via POST first.',
        });
        return;
      }
      try {
        await session.transport.handleRequest(req, res);
      } catch (error) {
        deps.logger.error('[mcp] Error handling GET request:', error);
        if (!res.headersSent) {
          res.status(500).json({ error: 'Internal MCP error' });
        }
      }
      return;
    }

    if (!session && req.body?.method === 'initialize') {
      try {
        session = await createServerSession();
      } catch (error) {
        deps.logger.error('[mcp] Failed to initialize session:', error);
        if (!res.headersSent) {
          res.status(500).json({ error: 'Failed to initialize MCP server session.' });
        }
        return;
      }
    } else if (!session) {
      res.status(400).json({
        error: 'Invalid session',
        message: 'No active MCP session. Call initialize first.',
      });
      return;
    }

    try {
      await session.transport.handleRequest(req, res, req.body);
      if (session.transport.sessionId && !sessions.has(session.transport.sessionId)) {
        sessions.set(session.transport.sessionId, session);
        deps.logger.log('[mcp] Stored session:', session.transport.sessionId);
      }
    } catch (error) {
      deps.logger.error('[mcp] Error handling POST request:', error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal MCP error' });
      }
    }
  };

  const app = express();
  app.use(express.json({ limit: '2mb' }));
  app.post('/mcp', handleMcpRequest);
  app.get('/mcp', handleMcpRequest);
  return app;
};

export const startHttpServer = (
  deps: WikiContentDependencies,
  options: HttpServerOptions,
): Promise<HttpServer> =>
  new Promise((resolve, reject) => {
    const listener = createHttpApp(deps)
      .listen(options.port, options.host, () => {
        deps.logger.log(`[mcp] Listening on http://${options.host}:${options.port}/mcp`);
        resolve(listener);
      })
      .on('error', reject);
  });
