/**
 * @fileoverview Plain-text extraction from HTML documents.
 *
 * Pattern based, not a parser: enough to hand page content to a model, not
 * to reproduce the page's layout.
 *
 * @module research-loop/tools/html-text
 * @version 0.1.0
 */

export interface ExtractedPage {
  /** Contents of `<title>`, or null when absent or empty */
  readonly title: string | null;
  readonly text: string;
}

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const HIDDEN_ELEMENTS = /<(script|style|noscript|template|svg)\b[\s\S]*?<\/\1\s*>/gi;
const BLOCK_END = /<\/(p|div|h[1-6]|li|tr|section|article|header|footer|main|nav|aside|ul|ol|table|blockquote|pre|figure)\s*>/gi;

/**
 * Extracts the title and the visible text of an HTML document. Block
 * elements end a line; list items are prefixed with `- `.
 */
export function extractText(html: string): ExtractedPage {
  const rawTitle = /<title[^>]*>([\s\S]*?)<\/title\s*>/i.exec(html)?.[1];
  const title = rawTitle === undefined ? '' : collapseLine(decodeEntities(stripTags(rawTitle)));

  const body = html
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(HIDDEN_ELEMENTS, '')
    .replace(/<head\b[\s\S]*?<\/head\s*>/i, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<li\b[^>]*>/gi, '\n- ')
    .replace(BLOCK_END, '\n');

  const text = decodeEntities(stripTags(body))
    .split('\n')
    .map(collapseLine)
    .filter(line => line !== '')
    .join('\n');

  return { title: title === '' ? null : title, text };
}

/**
 * Decodes the common named entities and every numeric one. Unknown names
 * are left as written.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, name: string) => {
    if (name.startsWith('#')) {
      const codePoint = name[1] === 'x' || name[1] === 'X'
        ? Number.parseInt(name.slice(2), 16)
        : Number.parseInt(name.slice(1), 10);
      return codePoint > 0 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
    }
    return NAMED_ENTITIES[name.toLowerCase()] ?? entity;
  });
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, '');
}

function collapseLine(line: string): string {
  return line.replace(/\s+/g, ' ').trim();
}
