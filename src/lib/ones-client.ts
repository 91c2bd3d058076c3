/**
 * @file src/lib/ones-client.ts
 * @description Thin node-fetch client for the ONES backend: credential login and wiki content
 *              retrieval. Every call is bounded by the configured request timeout.
 */

import fetch, { type Response } from 'node-fetch';
import { z } from 'zod';
import { HttpStatusError } from './errors';

export interface Credentials {
  email: string;
  password: string;
}

export interface Session {
  readonly token: string;
  readonly userId: string;
}

export interface WikiHttpClient {
  login(credentials: Credentials): Promise<Session>;
  /** Resolves `null` when the backend answers 2xx without a `content` field. */
  getContent(url: string, session: Session): Promise<string | null>;
}

export interface OnesClientOptions {
  /** Backend host used for login and as the referer origin, without scheme. */
  host: string;
  timeoutMs: number;
}

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json',
  Accept: 'application/json, text/plain, */*',
  'accept-language': 'en',
  'sec-ch-ua': '"Google Chrome";v="135", "Not-A.Brand";v="8", "Chromium";v="135"',
  'sec-ch-ua-mobile': '?0',
  'sec-ch-ua-platform': '"macOS"',
  'sec-fetch-dest': 'empty',
  'sec-fetch-mode': 'cors',
  'sec-fetch-site': 'same-origin',
  'user-agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/135.0.0.0 Safari/537.36',
};

const LoginResponseSchema = z.object({
  user: z.object({
    uuid: z.string().min(1),
    token: z.string().min(1),
  }),
});

const ContentResponseSchema = z.object({
  content: z.string().nullish(),
});

export const buildLoginUrl = (host: string): string =>
  `https://${host}/project/api/project/auth/login`;

export const buildAuthHeaders = (host: string, session: Session): Record<string, string> => ({
  Referer: `https://${host}/wiki/`,
  Cookie: `language=en; ones-uid=${session.userId}; ones-lt=${session.token}; timezone=Asia/Shanghai`,
});

const ensureOk = async (response: Response): Promise<void> => {
  if (response.ok) return;
  const snippet = (await response.text()).slice(0, 200);
  throw new HttpStatusError(response.status, response.statusText, snippet);
};

export const createOnesClient = (options: OnesClientOptions): WikiHttpClient => ({
  login: async (credentials) => {
    const response = await fetch(buildLoginUrl(options.host), {
      method: 'POST',
      headers: { ...DEFAULT_HEADERS },
      body: JSON.stringify({ email: credentials.email, password: credentials.password }),
      timeout: options.timeoutMs,
    });
    await ensureOk(response);
    const parsed = LoginResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Login response did not contain a user token');
    }
    return { token: parsed.data.user.token, userId: parsed.data.user.uuid };
  },

  getContent: async (url, session) => {
    const response = await fetch(url, {
      method: 'GET',
      headers: { ...DEFAULT_HEADERS, ...buildAuthHeaders(options.host, session) },
      timeout: options.timeoutMs,
    });
    await ensureOk(response);
    const parsed = ContentResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Content response was not a wiki content payload');
    }
    return parsed.data.content ?? null;
  },
});
