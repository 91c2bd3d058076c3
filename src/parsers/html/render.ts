/**
 * @file src/parsers/html/render.ts
 * @description Best-effort HTML to text rendering for wiki pages that are not stored as block
 *              documents. Struck-through and script content is dropped, then every element is
 *              visited in document order, and dedicated table, image and link sections are
 *              appended.
 */

import { type AnyNode, type CheerioAPI, type Element, load as loadHtml } from 'cheerio';
import { errorMessage } from '../../lib/errors';
import { CONTENT_EMPTY, NO_VALID_CONTENT, processingFailed } from '../shared/sentinels';

const HEADING_TAG = /^h([1-6])$/;
const TEXT_NODE = 3;
const NOISE_TAGS = new Set(['div', 'span', 'strong', 'b']);
const HIDDEN_SELECTOR = 's, strike, del, script, style, noscript';
const BLOCK_SELECTOR = [
  'address', 'article', 'aside', 'blockquote', 'caption', 'dd', 'div', 'dl', 'dt', 'fieldset',
  'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr',
  'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'table', 'tbody', 'td', 'tfoot', 'th',
  'thead', 'tr', 'ul',
].join(', ');

const collapse = (value: string): string => value.replace(/\s+/g, ' ').trim();

/** Text of the element's direct text children only; `<br>` counts as a space. */
export const ownText = ($: CheerioAPI, element: AnyNode): string => {
  let text = '';
  $(element)
    .contents()
    .each((_, node) => {
      if (node.nodeType === TEXT_NODE) {
        text += $(node).text();
      } else if ($(node).is('br')) {
        text += ' ';
      }
    });
  return collapse(text);
};

/** Text of every descendant; `<br>` and block element boundaries count as a space. */
export const flowText = ($: CheerioAPI, nodes: AnyNode[]): string => {
  let text = '';
  const visit = (node: AnyNode): void => {
    if (node.nodeType === TEXT_NODE) {
      text += $(node).text();
      return;
    }
    const $node = $(node);
    if ($node.is('br')) {
      text += ' ';
      return;
    }
    const block = $node.is(BLOCK_SELECTOR);
    if (block) text += ' ';
    $node.contents().each((_, child) => visit(child));
    if (block) text += ' ';
  };
  nodes.forEach(visit);
  return collapse(text);
};

const renderElements = ($: CheerioAPI): string => {
  let result = '';
  $<Element, string>('*').each((_, element) => {
    const $element = $(element);
    const tag = element.tagName.toLowerCase();
    const heading = HEADING_TAG.exec(tag);

    if (heading) {
      const text = ownText($, element);
      if (text) result += `${'#'.repeat(Number(heading[1]))} ${text}\n\n`;
    } else if (tag === 'p') {
      const text = ownText($, element);
      if (text) result += `${text}\n\n`;
    } else if (tag === 'li') {
      const text = ownText($, element);
      if (text) result += `${$element.parent().is('ol') ? '- ' : '• '}${text}\n`;
    } else if (tag === 'td' || tag === 'th') {
      const text = ownText($, element);
      if (text) result += `**${text}** `;
    } else if (NOISE_TAGS.has(tag)) {
      const text = ownText($, element);
      if (text.length > 2) result += `${text} `;
    }
  });
  return result;
};

const renderTables = ($: CheerioAPI): string => {
  const tables = $('table');
  if (!tables.length) return '';
  let result = '\n\n=== Table data ===\n';
  tables.each((tableIndex, table) => {
    result += `\n## Table ${tableIndex + 1}\n`;
    $(table)
      .find('tr')
      .each((_, row) => {
        const cells = $(row).find('th, td');
        if (cells.length >= 2) {
          const key = flowText($, cells.eq(0).toArray());
          const value = flowText($, cells.eq(1).toArray());
          if (key && value) result += `**${key}**: ${value}\n`;
        } else if (cells.length === 1) {
          const cellText = flowText($, cells.eq(0).toArray());
          if (cellText) result += `- ${cellText}\n`;
        }
      });
  });
  return result;
};

const renderImages = ($: CheerioAPI): string => {
  const images = $('img');
  if (!images.length) return '';
  let result = '\n\n=== Image information ===\n';
  images.each((_, image) => {
    const alt = $(image).attr('alt') ?? '';
    const src = $(image).attr('src') ?? '';
    result += `[Image: ${alt || 'No description'}${src ? ` - ${src}` : ''}]\n`;
  });
  return result;
};

const renderLinks = ($: CheerioAPI): string => {
  const links = $('a[href]');
  if (!links.length) return '';
  let result = '\n\n=== Link information ===\n';
  links.each((_, link) => {
    const text = flowText($, [link]);
    const href = $(link).attr('href') ?? '';
    if (text && href && !href.startsWith('#')) {
      result += `[Link: ${text}](${href})\n`;
    }
  });
  return result;
};

export const renderHtmlContent = (html: string | null | undefined): string => {
  if (!html || !html.trim()) {
    return CONTENT_EMPTY;
  }

  try {
    const $ = loadHtml(html);
    $(HIDDEN_SELECTOR).remove();

    let result = renderElements($);
    if (!result) {
      const allText = flowText($, $.root().toArray());
      if (allText) result = `Page content:\n${allText}`;
    }

    result += renderTables($);
    result += renderImages($);
    result += renderLinks($);

    const finalResult = result.trim();
    return finalResult || NO_VALID_CONTENT;
  } catch (error) {
    return processingFailed(errorMessage(error));
  }
};
