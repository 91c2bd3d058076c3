/**
 * @file tests/ones-client.test.ts
 * @description Login and content requests against a mocked node-fetch.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node-fetch', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node-fetch')>()),
  default: vi.fn(),
}));

import fetch, { Response } from 'node-fetch';
import { HttpStatusError } from '../src/lib/errors';
import { buildAuthHeaders, buildLoginUrl, createOnesClient } from '../src/lib/ones-client';

const mockFetch = vi.mocked(fetch);

const jsonResponse = (body: unknown, status = 200, statusText = 'OK') =>
  new Response(JSON.stringify(body), { status, statusText });

const session = { token: 'test-token', userId: 'user-1' };
const client = createOnesClient({ host: 'ones.example.com', timeoutMs: 5000 });

beforeEach(() => {
  mockFetch.mockReset();
});

describe('buildLoginUrl', () => {
  it('targets the project auth endpoint on the configured host', () => {
    expect(buildLoginUrl('ones.example.com')).toBe(
      'https://ones.example.com/project/api/project/auth/login',
    );
  });
});

describe('buildAuthHeaders', () => {
  it('carries the session in cookies and refers to the wiki app', () => {
    expect(buildAuthHeaders('ones.example.com', session)).toEqual({
      Referer: 'https://ones.example.com/wiki/',
      Cookie: 'language=en; ones-uid=user-1; ones-lt=test-token; timezone=Asia/Shanghai',
    });
  });
});

describe('createOnesClient.login', () => {
  it('posts the credentials and returns the session', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ user: { uuid: 'user-1', token: 'test-token' } }));

    await expect(client.login({ email: 'dev@example.com', password: 'test-secret' })).resolves.toEqual(
      session,
    );

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://ones.example.com/project/api/project/auth/login');
    expect(init?.method).toBe('POST');
    expect(init?.timeout).toBe(5000);
    expect(init?.body).toBe('{"email":"dev@example.com","password":"test-secret"}');
  });

  it('rejects with the HTTP status on a non-2xx answer', async () => {
    mockFetch.mockResolvedValueOnce(new Response('bad credentials', { status: 401, statusText: 'Unauthorized' }));

    const attempt = client.login({ email: 'dev@example.com', password: 'wrong' });
    await expect(attempt).rejects.toBeInstanceOf(HttpStatusError);
    await expect(attempt).rejects.toThrow('HTTP 401 Unauthorized (bad credentials)');
  });

  it('rejects when the answer has no user token', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ user: { uuid: 'user-1' } }));

    await expect(client.login({ email: 'dev@example.com', password: 'test-secret' })).rejects.toThrow(
      'Login response did not contain a user token',
    );
  });

  it('propagates transport errors', async () => {
    mockFetch.mockRejectedValueOnce(new Error('network timeout'));

    await expect(client.login({ email: 'dev@example.com', password: 'test-secret' })).rejects.toThrow(
      'network timeout',
    );
  });
});

describe('createOnesClient.getContent', () => {
  const url = 'https://ones.example.com/wiki/api/wiki/team/T1/online_page/P1/content';

  it('sends browser-like headers with the session cookie', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ content: '<p>Hi</p>' }));

    await expect(client.getContent(url, session)).resolves.toBe('<p>Hi</p>');

    const [calledUrl, init] = mockFetch.mock.calls[0];
    expect(calledUrl).toBe(url);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      'accept-language': 'en',
      Referer: 'https://ones.example.com/wiki/',
      Cookie: 'language=en; ones-uid=user-1; ones-lt=test-token; timezone=Asia/Shanghai',
    });
  });

  it('resolves null when the payload has no content', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ title: 'Page' }));
    await expect(client.getContent(url, session)).resolves.toBeNull();

    mockFetch.mockResolvedValueOnce(jsonResponse({ content: null }));
    await expect(client.getContent(url, session)).resolves.toBeNull();
  });

  it('rejects with the status when the backend refuses the request', async () => {
    mockFetch.mockResolvedValueOnce(new Response('', { status: 403, statusText: 'Forbidden' }));

    await expect(client.getContent(url, session)).rejects.toMatchObject({
      status: 403,
      message: 'HTTP 403 Forbidden',
    });
  });

  it('rejects payloads whose content is not text', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ content: 42 }));

    await expect(client.getContent(url, session)).rejects.toThrow(
      'Content response was not a wiki content payload',
    );
  });
});
