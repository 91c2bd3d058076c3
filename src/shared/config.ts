/**
 * @file src/shared/config.ts
 * @description Resolves ONES credentials and server settings. Precedence: explicit overrides
 *              (CLI flags), then environment variables, then the persisted `.oneswikirc.json`.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { paths } from './paths';

const FileConfigSchema = z.object({
  host: z.string().optional(),
  email: z.string().optional(),
  password: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  reloginOnUnauthorized: z.boolean().optional(),
});

export type WikiFileConfig = z.infer<typeof FileConfigSchema>;

export const CONFIG_PATH = paths.CONFIG;

export const FALLBACK_TIMEOUT_MS = 30_000;
const FALLBACK_MCP_PORT = 3233;
const FALLBACK_MCP_HOST = '127.0.0.1';

export interface WikiConfigOverrides {
  host?: string;
  email?: string;
  password?: string;
  timeoutMs?: number;
  reloginOnUnauthorized?: boolean;
}

export interface WikiConfig {
  host: string;
  email: string;
  password: string;
  timeoutMs: number;
  reloginOnUnauthorized: boolean;
}

export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

export const normalizeHost = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/+$/, '');
  return trimmed.length ? trimmed : undefined;
};

const normalizeKey = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const parsePositiveInt = (value?: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
};

const positiveInt = (value?: number): number | undefined =>
  value !== undefined && Number.isInteger(value) && value > 0 ? value : undefined;

const parseFlag = (value?: string): boolean | undefined => {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

export const readConfig = (configPath: string = CONFIG_PATH): WikiFileConfig => {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  try {
    const parsed = FileConfigSchema.safeParse(JSON.parse(fs.readFileSync(configPath, 'utf8')));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
};

export const writeConfig = (
  update: Partial<WikiFileConfig>,
  configPath: string = CONFIG_PATH,
): WikiFileConfig => {
  const next: WikiFileConfig = { ...readConfig(configPath), ...update };
  paths.ensureDir(path.dirname(configPath));
  fs.writeFileSync(configPath, JSON.stringify(next, null, 2), { encoding: 'utf8', mode: 0o600 });
  return next;
};

export const resolveWikiConfig = (
  overrides: WikiConfigOverrides = {},
  sources: ConfigSources = {},
): WikiConfig => {
  const env = sources.env ?? process.env;
  const cfg = readConfig(sources.configPath);

  const host = normalizeHost(overrides.host ?? env.ONES_HOST ?? cfg.host);
  if (!host) {
    throw new Error("No ONES host configured. Run 'ones-wiki init', set ONES_HOST or pass --host.");
  }
  const email = normalizeKey(overrides.email ?? env.ONES_EMAIL ?? cfg.email);
  if (!email) {
    throw new Error("No ONES email configured. Run 'ones-wiki init', set ONES_EMAIL or pass --email.");
  }
  const password = overrides.password ?? env.ONES_PASSWORD ?? cfg.password;
  if (!password) {
    throw new Error(
      "No ONES password configured. Run 'ones-wiki init', set ONES_PASSWORD or pass --password.",
    );
  }

  return {
    host,
    email,
    password,
    timeoutMs:
      positiveInt(overrides.timeoutMs) ??
      parsePositiveInt(env.ONES_TIMEOUT_MS) ??
      cfg.timeoutMs ??
      FALLBACK_TIMEOUT_MS,
    reloginOnUnauthorized:
      overrides.reloginOnUnauthorized ??
      parseFlag(env.ONES_RELOGIN_ON_UNAUTHORIZED) ??
      cfg.reloginOnUnauthorized ??
      false,
  };
};

export interface HttpServerOptions {
  host: string;
  port: number;
}

export const resolveHttpServerOptions = (
  overrides: Partial<HttpServerOptions> = {},
  env: NodeJS.ProcessEnv = process.env,
): HttpServerOptions => ({
  host: overrides.host ?? normalizeKey(env.ONES_MCP_HOST) ?? FALLBACK_MCP_HOST,
  port:
    positiveInt(overrides.port) ??
    parsePositiveInt(env.ONES_MCP_PORT ?? env.PORT) ??
    FALLBACK_MCP_PORT,
});
