/**
 * @file src/parsers/blocks/inline-text.ts
 * @description Flattens a block's text runs into plain text.
 */

import { TextRunSchema, type TextRun } from './types';

export const scalarText = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
};

const isLineBreak = (run: TextRun): boolean => run.attributes?.type === 'br';

/**
 * Concatenates the `insert` text of every run in order. A run marked `attributes.type = "br"`
 * contributes a newline instead of its insert. Anything that is not an array yields `''`.
 */
export const extractTextFromTextArray = (textArray: unknown): string => {
  if (!Array.isArray(textArray)) {
    return '';
  }
  let result = '';
  for (const entry of textArray) {
    const parsed = TextRunSchema.safeParse(entry);
    if (!parsed.success) continue;
    result += isLineBreak(parsed.data) ? '\n' : scalarText(parsed.data.insert);
  }
  return result;
};
