/**
 * @file tests/content-fetcher.test.ts
 * @description Primary/alternative endpoint fallback and combined failure reporting.
 */

import { describe, expect, it, vi } from 'vitest';
import { FetchFailedError, fetchWikiContent } from '../src/lib/content-fetcher';
import { HttpStatusError } from '../src/lib/errors';
import type { Session, WikiHttpClient } from '../src/lib/ones-client';

const ref = { host: 'ones.example.com', teamId: 'T1', pageId: 'P1' };
const session: Session = { token: 'test-token', userId: 'user-1' };
const PRIMARY = 'https://ones.example.com/wiki/api/wiki/team/T1/online_page/P1/content';
const ALTERNATIVE = 'https://ones.example.com/wiki/api/wiki/team/T1/page/P1';

const createClient = () => {
  const getContent = vi.fn<WikiHttpClient['getContent']>();
  const client: WikiHttpClient = { login: vi.fn<WikiHttpClient['login']>(), getContent };
  const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { client, getContent, logger };
};

describe('fetchWikiContent', () => {
  it('returns the primary content without touching the alternative endpoint', async () => {
    const { client, getContent, logger } = createClient();
    getContent.mockResolvedValueOnce('<p>primary</p>');

    const result = await fetchWikiContent(ref, session, client, logger);

    expect(result).toEqual({
      ok: true,
      value: { endpoint: 'primary', url: PRIMARY, content: '<p>primary</p>' },
    });
    expect(getContent).toHaveBeenCalledTimes(1);
    expect(getContent).toHaveBeenCalledWith(PRIMARY, session);
  });

  it('falls back to the alternative endpoint when the primary fails', async () => {
    const { client, getContent, logger } = createClient();
    getContent
      .mockRejectedValueOnce(new HttpStatusError(500, 'Internal Server Error', ''))
      .mockResolvedValueOnce('{"blocks":[]}');

    const result = await fetchWikiContent(ref, session, client, logger);

    expect(result).toEqual({
      ok: true,
      value: { endpoint: 'alternative', url: ALTERNATIVE, content: '{"blocks":[]}' },
    });
    expect(getContent).toHaveBeenNthCalledWith(2, ALTERNATIVE, session);
    expect(logger.warn).toHaveBeenCalledWith(
      '[fetch] primary endpoint failed: HTTP 500 Internal Server Error',
    );
  });

  it('treats a payload without content as a failed attempt', async () => {
    const { client, getContent, logger } = createClient();
    getContent.mockResolvedValueOnce(null).mockResolvedValueOnce('alt');

    const result = await fetchWikiContent(ref, session, client, logger);

    expect(result.ok && result.value.endpoint).toBe('alternative');
  });

  it('accepts empty string content from the primary endpoint', async () => {
    const { client, getContent, logger } = createClient();
    getContent.mockResolvedValueOnce('');

    const result = await fetchWikiContent(ref, session, client, logger);

    expect(result).toEqual({ ok: true, value: { endpoint: 'primary', url: PRIMARY, content: '' } });
  });

  it('reports both failure reasons when every endpoint fails', async () => {
    const { client, getContent, logger } = createClient();
    getContent
      .mockRejectedValueOnce(new HttpStatusError(404, 'Not Found', ''))
      .mockRejectedValueOnce(new Error('socket hang up'));

    const result = await fetchWikiContent(ref, session, client, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(FetchFailedError);
    expect(result.error.kind).toBe('FetchFailed');
    expect(result.error.message).toBe(
      'Both primary and alternative APIs failed. Primary: HTTP 404 Not Found, Alternative: socket hang up',
    );
    expect(result.error.attempts).toEqual([
      { endpoint: 'primary', url: PRIMARY, message: 'HTTP 404 Not Found', status: 404 },
      { endpoint: 'alternative', url: ALTERNATIVE, message: 'socket hang up', status: undefined },
    ]);
    expect(result.error.unauthorized).toBe(false);
  });

  it('flags failures caused by a rejected session', async () => {
    const { client, getContent, logger } = createClient();
    getContent
      .mockRejectedValueOnce(new HttpStatusError(401, 'Unauthorized', ''))
      .mockResolvedValueOnce(null);

    const result = await fetchWikiContent(ref, session, client, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'Both primary and alternative APIs failed. Primary: HTTP 401 Unauthorized, Alternative: Response did not contain wiki content',
    );
    expect(result.error.unauthorized).toBe(true);
  });
});
