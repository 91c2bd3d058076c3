/**
 * @file tests/render-failure.test.ts
 * @description Renderer crashes surface as RenderFailed instead of escaping the dispatcher.
 */

import { describe, expect, it, vi } from 'vitest';

vi.mock('../src/parsers/html/render', () => ({
  renderHtmlContent: vi.fn(() => {
    throw new Error('parser crashed');
  }),
}));

import { renderContent, tryRenderContent } from '../src/parsers';

describe('render failures', () => {
  it('surfaces an unexpected renderer error as RenderFailed', () => {
    const result = tryRenderContent('<p>Body</p>');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('RenderFailed');
    expect(result.error.message).toBe('Content processing failed: parser crashed');
  });

  it('reports the failure when the block fallback also fails', () => {
    expect(renderContent('{broken')).toBe('Content processing failed: parser crashed');
  });

  it('still renders valid block documents', () => {
    expect(renderContent('{"blocks":[{"type":"text","text":[{"insert":"ok"}]}]}')).toBe('ok');
  });
});
