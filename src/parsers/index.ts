/**
 * @file src/parsers/index.ts
 * @description Content normalization entry point. Picks the block renderer or the HTML renderer
 *              from the first non-whitespace character of the raw content.
 */

import { err, errorMessage, ok, type Result, WikiError } from '../lib/errors';
import { renderBlockDocument } from './blocks/render';
import { renderHtmlContent } from './html/render';
import { CONTENT_EMPTY, processingFailed } from './shared/sentinels';

export type RenderStrategy = 'blocks' | 'html';

export const detectStrategy = (raw: string): RenderStrategy =>
  raw.trimStart().startsWith('{') ? 'blocks' : 'html';

/** Renders raw content; only unexpected internal failures surface as `RenderFailed`. */
export const tryRenderContent = (raw: string | null | undefined): Result<string> => {
  if (!raw || !raw.trim()) {
    return ok(CONTENT_EMPTY);
  }

  try {
    if (detectStrategy(raw) === 'blocks') {
      try {
        return ok(renderBlockDocument(raw));
      } catch {
        // Not a usable block document: render it as markup instead.
        return ok(renderHtmlContent(raw));
      }
    }
    return ok(renderHtmlContent(raw));
  } catch (error) {
    return err(new WikiError('RenderFailed', processingFailed(errorMessage(error))));
  }
};

export const renderContent = (raw: string | null | undefined): string => {
  const rendered = tryRenderContent(raw);
  return rendered.ok ? rendered.value : rendered.error.message;
};

export { extractTextFromTextArray } from './blocks/inline-text';
export { renderBlockDocument, renderWikiBlock, parseBlockDocument, BlockIndex } from './blocks/render';
export type { WikiBlock, WikiBlockKind, TextRun } from './blocks/types';
export { renderHtmlContent } from './html/render';
export { CONTENT_EMPTY, NO_VALID_CONTENT, processingFailed } from './shared/sentinels';
