/**
 * @file src/shared/logger.ts
 * @description Console-shaped loggers. Everything goes to stderr: stdout carries the stdio
 *              transport when the MCP server runs under an agent host.
 */

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const createLogger = (prefix: string): Logger => ({
  log: (...args) => console.error(prefix, ...args),
  warn: (...args) => console.error(prefix, ...args),
  error: (...args) => console.error(prefix, ...args),
});
