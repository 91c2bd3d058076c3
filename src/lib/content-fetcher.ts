/**
 * @file src/lib/content-fetcher.ts
 * @description Requests wiki content from the candidate endpoints in priority order. The first
 *              endpoint that yields content wins; when every endpoint fails the error carries
 *              each attempt's reason.
 */

import type { Logger } from '../shared/logger';
import { err, errorMessage, HttpStatusError, ok, type Result, WikiError } from './errors';
import type { Session, WikiHttpClient } from './ones-client';
import { buildCandidateEndpoints, type EndpointLabel, type WikiReference } from './wiki-url';

export interface FetchedContent {
  endpoint: EndpointLabel;
  url: string;
  content: string;
}

export interface FetchAttemptFailure {
  endpoint: EndpointLabel;
  url: string;
  message: string;
  status?: number;
}

const describeAttempts = (attempts: FetchAttemptFailure[]): string => {
  const primary = attempts.find((attempt) => attempt.endpoint === 'primary');
  const alternative = attempts.find((attempt) => attempt.endpoint === 'alternative');
  return `Both primary and alternative APIs failed. Primary: ${primary?.message ?? 'not attempted'}, Alternative: ${alternative?.message ?? 'not attempted'}`;
};

export class FetchFailedError extends WikiError {
  readonly attempts: FetchAttemptFailure[];

  constructor(attempts: FetchAttemptFailure[]) {
    super('FetchFailed', describeAttempts(attempts));
    this.name = 'FetchFailedError';
    this.attempts = attempts;
  }

  /** True when any endpoint rejected the session itself. */
  get unauthorized(): boolean {
    return this.attempts.some((attempt) => attempt.status === 401 || attempt.status === 403);
  }
}

export const EMPTY_CONTENT_MESSAGE = 'Response did not contain wiki content';

export const fetchWikiContent = async (
  ref: WikiReference,
  session: Session,
  client: WikiHttpClient,
  logger: Logger,
): Promise<Result<FetchedContent, FetchFailedError>> => {
  const failures: FetchAttemptFailure[] = [];

  for (const endpoint of buildCandidateEndpoints(ref)) {
    let failure: FetchAttemptFailure;
    try {
      const content = await client.getContent(endpoint.url, session);
      if (content !== null) {
        return ok({ endpoint: endpoint.label, url: endpoint.url, content });
      }
      failure = { endpoint: endpoint.label, url: endpoint.url, message: EMPTY_CONTENT_MESSAGE };
    } catch (error) {
      failure = {
        endpoint: endpoint.label,
        url: endpoint.url,
        message: errorMessage(error),
        status: error instanceof HttpStatusError ? error.status : undefined,
      };
    }
    logger.warn(`[fetch] ${endpoint.label} endpoint failed: ${failure.message}`);
    failures.push(failure);
  }

  return err(new FetchFailedError(failures));
};
