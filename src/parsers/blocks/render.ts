/**
 * @file src/parsers/blocks/render.ts
 * @description Renders a ONES block document into Markdown-like text. Child ids in tables and
 *              code blocks are looked up in a flat index over the document, so the same id may
 *              be referenced from several places and a missing id renders as nothing.
 */

import { NO_VALID_CONTENT } from '../shared/sentinels';
import { extractTextFromTextArray, scalarText } from './inline-text';
import { BlockDocumentSchema, TextCarrierSchema, type WikiBlock, WikiBlockSchema } from './types';

export class BlockIndex {
  private readonly entries: Map<string, unknown>;

  constructor(root: Record<string, unknown>) {
    this.entries = new Map(Object.entries(root));
  }

  resolve(id: unknown): unknown {
    const key = scalarText(id);
    return key ? this.entries.get(key) : undefined;
  }
}

export interface BlockDocument {
  blocks: unknown[];
  index: BlockIndex;
}

/** Throws when `raw` is not a JSON object; callers fall back to HTML rendering. */
export const parseBlockDocument = (raw: string): BlockDocument => {
  const json: unknown = JSON.parse(raw);
  const parsed = BlockDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error('Structured content is not a JSON object');
  }
  return { blocks: parsed.data.blocks ?? [], index: new BlockIndex(parsed.data) };
};

const carriedText = (node: unknown): string | null => {
  const parsed = TextCarrierSchema.safeParse(node);
  return parsed.success ? extractTextFromTextArray(parsed.data.text) : null;
};

const renderTable = (block: Extract<WikiBlock, { kind: 'table' }>, index: BlockIndex): string => {
  let result = '\n### Table\n\n';
  block.children.forEach((childId, position) => {
    const cellNodes = index.resolve(childId);
    if (!Array.isArray(cellNodes)) return;
    for (const cellNode of cellNodes) {
      const cellText = carriedText(cellNode);
      if (cellText && cellText.trim()) {
        result += `| ${cellText} `;
      }
    }
    if ((position + 1) % block.cols === 0) {
      result += '|\n';
    }
  });
  return `${result}\n`;
};

const renderCode = (block: Extract<WikiBlock, { kind: 'code' }>, index: BlockIndex): string => {
  let result = `\n\`\`\`${scalarText(block.language)}\n`;
  for (const childId of block.children) {
    const line = carriedText(index.resolve(childId));
    if (line !== null) {
      result += `${line}\n`;
    }
  }
  return `${result}\`\`\`\n`;
};

export const renderWikiBlock = (block: WikiBlock, index: BlockIndex): string => {
  switch (block.kind) {
    case 'text': {
      const prefix = block.heading ? `${'#'.repeat(block.heading)} ` : '';
      return `${prefix}${extractTextFromTextArray(block.text)}\n`;
    }
    case 'list': {
      const text = extractTextFromTextArray(block.text);
      if (!text.trim()) return '';
      const indent = '  '.repeat(Math.max(0, block.level - 1));
      return `${indent}${block.ordered ? '1. ' : '- '}${text}\n`;
    }
    case 'table':
      return renderTable(block, index);
    case 'embed': {
      if (block.embedType !== 'image' || !block.embedData) return '';
      const src = block.embedData.src === undefined ? 'Unknown image' : scalarText(block.embedData.src);
      return `\n[Image: ${src}]\n`;
    }
    case 'code':
      return renderCode(block, index);
    case 'unknown':
      return extractTextFromTextArray(block.text);
    default: {
      const unreachable: never = block;
      return unreachable;
    }
  }
};

/** Renders one raw block entry; a block that cannot be rendered contributes nothing. */
export const renderRawBlock = (raw: unknown, index: BlockIndex): string => {
  try {
    const parsed = WikiBlockSchema.safeParse(raw);
    return parsed.success ? renderWikiBlock(parsed.data, index) : '';
  } catch {
    return '';
  }
};

export const renderBlockDocument = (raw: string): string => {
  const document = parseBlockDocument(raw);
  const result = document.blocks
    .map((block) => renderRawBlock(block, document.index))
    .filter((rendered) => rendered.length > 0)
    .map((rendered) => `${rendered}\n`)
    .join('')
    .trim();
  return result || NO_VALID_CONTENT;
};
