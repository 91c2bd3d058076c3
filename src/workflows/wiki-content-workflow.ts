/**
 * @file src/workflows/wiki-content-workflow.ts
 * @description Orchestrates one `getWikiContent` call: session, URL translation, endpoint
 *              fallback and rendering. Every failure ends as a readable string; nothing is
 *              thrown past this function.
 */

import { fetchWikiContent } from '../lib/content-fetcher';
import { errorMessage, type WikiError } from '../lib/errors';
import { createOnesClient, type WikiHttpClient } from '../lib/ones-client';
import { SessionManager } from '../lib/session';
import { translateWikiUrl } from '../lib/wiki-url';
import { tryRenderContent } from '../parsers';
import type { WikiConfig } from '../shared/config';
import type { Logger } from '../shared/logger';

export interface WikiContentDependencies {
  sessions: SessionManager;
  client: WikiHttpClient;
  logger: Logger;
  /** Re-login and retry once when both endpoints reject the session with 401/403. */
  reloginOnUnauthorized?: boolean;
}

/** Wires the node-fetch client and a fresh session cache from resolved configuration. */
export const createWikiContentDependencies = (
  config: WikiConfig,
  logger: Logger,
): WikiContentDependencies => {
  const client = createOnesClient({ host: config.host, timeoutMs: config.timeoutMs });
  return {
    client,
    sessions: new SessionManager(
      client,
      { email: config.email, password: config.password },
      logger,
    ),
    logger,
    reloginOnUnauthorized: config.reloginOnUnauthorized,
  };
};

export const describeWikiError = (error: WikiError): string => {
  switch (error.kind) {
    case 'InvalidFormat':
      return `URL format error: ${error.message}`;
    case 'AuthFailed':
    case 'FetchFailed':
    case 'RenderFailed':
      return error.message;
  }
};

const fetchAndRender = async (wikiUrl: string, deps: WikiContentDependencies): Promise<string> => {
  const session = await deps.sessions.ensureSession();
  if (!session.ok) {
    return describeWikiError(session.error);
  }

  const reference = translateWikiUrl(wikiUrl);
  if (!reference.ok) {
    return describeWikiError(reference.error);
  }

  let fetched = await fetchWikiContent(reference.value, session.value, deps.client, deps.logger);
  if (!fetched.ok && deps.reloginOnUnauthorized && fetched.error.unauthorized) {
    deps.logger.warn('[wiki] session rejected by both endpoints, logging in again');
    deps.sessions.invalidate();
    const renewed = await deps.sessions.ensureSession();
    if (!renewed.ok) {
      return describeWikiError(renewed.error);
    }
    fetched = await fetchWikiContent(reference.value, renewed.value, deps.client, deps.logger);
  }
  if (!fetched.ok) {
    return describeWikiError(fetched.error);
  }

  deps.logger.log(`[wiki] fetched ${fetched.value.endpoint} endpoint ${fetched.value.url}`);
  const rendered = tryRenderContent(fetched.value.content);
  return rendered.ok ? rendered.value : describeWikiError(rendered.error);
};

export const runWikiContentWorkflow = async (
  wikiUrl: string,
  deps: WikiContentDependencies,
): Promise<string> => {
  try {
    return await fetchAndRender(wikiUrl, deps);
  } catch (error) {
    deps.logger.error('[wiki] unexpected failure', error);
    return `Failed to get Wiki content: ${errorMessage(error)}`;
  }
};
