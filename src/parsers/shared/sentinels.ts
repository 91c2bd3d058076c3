/**
 * @file src/parsers/shared/sentinels.ts
 * @description Fixed placeholder texts returned by the renderers instead of raising.
 */

export const CONTENT_EMPTY = 'Content is empty';
export const NO_VALID_CONTENT = 'No valid content extracted';

export const processingFailed = (reason: string): string => `Content processing failed: ${reason}`;
