/**
 * @file src/lib/session.ts
 * @description Lazily logs in against the ONES backend and memoizes the session for every later
 *              call. Concurrent callers share a single in-flight login.
 */

import type { Logger } from '../shared/logger';
import { err, errorMessage, ok, type Result, WikiError } from './errors';
import type { Credentials, Session, WikiHttpClient } from './ones-client';

export const LOGIN_FAILED_MESSAGE = 'Login failed, unable to get Wiki content';

export class SessionManager {
  private session: Session | null = null;
  private pending: Promise<Result<Session>> | null = null;

  constructor(
    private readonly client: WikiHttpClient,
    private readonly credentials: Credentials,
    private readonly logger: Logger,
  ) {}

  current(): Session | null {
    return this.session;
  }

  async ensureSession(): Promise<Result<Session>> {
    if (this.session) {
      return ok(this.session);
    }
    if (!this.pending) {
      this.pending = this.login().finally(() => {
        this.pending = null;
      });
    }
    return await this.pending;
  }

  /** Drops the cached session so the next `ensureSession` logs in again. */
  invalidate(): void {
    this.session = null;
  }

  private async login(): Promise<Result<Session>> {
    try {
      const session = await this.client.login(this.credentials);
      this.session = session;
      this.logger.log(`[session] logged in as ${session.userId}`);
      return ok(session);
    } catch (error) {
      this.logger.warn(`[session] login failed: ${errorMessage(error)}`);
      return err(new WikiError('AuthFailed', LOGIN_FAILED_MESSAGE));
    }
  }
}
