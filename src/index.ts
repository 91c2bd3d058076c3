/**
 * @file src/index.ts
 * @description Library entry point.
 */

export * from './lib/errors';
export * from './lib/wiki-url';
export * from './lib/ones-client';
export * from './lib/session';
export * from './lib/content-fetcher';

export * from './parsers';

export * from './shared/config';
export * from './shared/logger';

export * from './workflows/wiki-content-workflow';

export * from './tools/wiki-content';
export * from './mcp/server';
