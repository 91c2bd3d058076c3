/**
 * @file src/tools/utils.ts
 * @description Shared utilities for MCP tools.
 */

import { createLogger, type Logger } from '../shared/logger';

export const textContent = (text: string) => [{ type: 'text' as const, text }];

export const createToolLogger = (): Logger => createLogger('[MCP]');
