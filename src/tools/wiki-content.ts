/**
 * @file src/tools/wiki-content.ts
 * @description MCP tool that returns a ONES wiki page as AI-readable text.
 */

import { z } from 'zod';
import {
  runWikiContentWorkflow,
  type WikiContentDependencies,
} from '../workflows/wiki-content-workflow';
import { textContent } from './utils';

export const WIKI_CONTENT_TOOL_NAME = 'getWikiContent';

export const WikiContentInputShape = {
  wikiUrl: z
    .string()
    .describe(
      'Wiki page URL, format like: https://example.com/wiki/#/team/AQzvsooq/space/EYvdiwVh/page/4RwySM6h',
    ),
};

export const WikiContentInputSchema = z.object(WikiContentInputShape);

export const wikiContentTool = {
  title: 'Get ONES Wiki Page Content',
  description: 'Retrieve ONES Wiki page content and convert it to AI-friendly text format',
  inputSchema: WikiContentInputShape,
};

export const createWikiContentHandler =
  (deps: WikiContentDependencies) => async (input: z.infer<typeof WikiContentInputSchema>) => ({
    content: textContent(await runWikiContentWorkflow(input.wikiUrl, deps)),
  });
