/**
 * @file src/lib/errors.ts
 * @description Error taxonomy shared by the translator, session, fetcher and renderer. Failures
 *              travel as `Result` values and only become display strings in the workflow.
 */

export type WikiErrorKind = 'InvalidFormat' | 'AuthFailed' | 'FetchFailed' | 'RenderFailed';

export class WikiError extends Error {
  readonly kind: WikiErrorKind;

  constructor(kind: WikiErrorKind, message: string) {
    super(message);
    this.name = 'WikiError';
    this.kind = kind;
  }
}

export class HttpStatusError extends Error {
  readonly status: number;
  readonly statusText: string;

  constructor(status: number, statusText: string, snippet: string) {
    super(`HTTP ${status} ${statusText}${snippet ? ` (${snippet})` : ''}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.statusText = statusText;
  }
}

export type Result<T, E = WikiError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
