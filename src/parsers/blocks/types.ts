/**
 * @file src/parsers/blocks/types.ts
 * @description Shapes of the ONES wiki block document. A document is one JSON object: its
 *              `blocks` array lists the top-level blocks in order and every other key is an id
 *              that tables and code blocks reference from their `children`.
 */

import { z } from 'zod';

const present = z.unknown().refine((value) => value !== undefined);

const childIds = z.array(z.unknown()).optional().catch(undefined);

export const TextRunSchema = z.object({
  insert: present,
  attributes: z
    .object({ type: z.unknown() })
    .passthrough()
    .optional()
    .catch(undefined),
});

export type TextRun = z.output<typeof TextRunSchema>;

/** Any node carrying a `text` run array: table cells, code lines, unknown blocks. */
export const TextCarrierSchema = z.object({ text: present });

const TextBlockSchema = z
  .object({
    type: z.literal('text'),
    heading: z.number().int().min(1).max(6).optional().catch(undefined),
    text: z.unknown(),
  })
  .transform((block) => ({ kind: 'text' as const, heading: block.heading, text: block.text }));

const ListBlockSchema = z
  .object({
    type: z.literal('list'),
    ordered: z.boolean().catch(false),
    level: z.number().int().catch(1),
    text: z.unknown(),
  })
  .transform((block) => ({
    kind: 'list' as const,
    ordered: block.ordered,
    level: block.level,
    text: block.text,
  }));

const TableBlockSchema = z
  .object({
    type: z.literal('table'),
    cols: z.number().int().positive().catch(2),
    children: childIds,
  })
  .transform((block) => ({
    kind: 'table' as const,
    cols: block.cols,
    children: block.children ?? [],
  }));

const EmbedBlockSchema = z
  .object({
    type: z.literal('embed'),
    embedType: z.unknown(),
    embedData: z
      .object({ src: z.unknown() })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .transform((block) => ({
    kind: 'embed' as const,
    embedType: block.embedType,
    embedData: block.embedData,
  }));

const CodeBlockSchema = z
  .object({
    type: z.literal('code'),
    language: z.unknown(),
    children: childIds,
  })
  .transform((block) => ({
    kind: 'code' as const,
    language: block.language,
    children: block.children ?? [],
  }));

const UnknownBlockSchema = z
  .object({
    type: z.unknown(),
    text: z.unknown(),
  })
  .passthrough()
  .transform((block) => ({ kind: 'unknown' as const, type: block.type, text: block.text }));

// Order matters: the catch-all arm must stay last.
export const WikiBlockSchema = z.union([
  TextBlockSchema,
  ListBlockSchema,
  TableBlockSchema,
  EmbedBlockSchema,
  CodeBlockSchema,
  UnknownBlockSchema,
]);

export type WikiBlock = z.output<typeof WikiBlockSchema>;
export type WikiBlockKind = WikiBlock['kind'];

export const BlockDocumentSchema = z
  .object({
    blocks: z.array(z.unknown()).optional().catch(undefined),
  })
  .passthrough();
