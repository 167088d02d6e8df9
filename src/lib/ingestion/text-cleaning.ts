import { JSDOM } from 'jsdom';

const WHITESPACE_RE = /\s+/g;
const NON_CONTENT_SELECTOR = 'script, style, noscript, template';

let parser: JSDOM | null = null;

function getParserDocument(): Document {
  if (!parser) {
    parser = new JSDOM('');
  }
  return parser.window.document;
}

/**
 * Decodes every HTML character reference. Markup is not interpreted: a
 * textarea parses its content as text, so tags come back as literal text.
 */
export function decodeHtmlEntities(value: string): string {
  if (!value.includes('&')) {
    return value;
  }
  const textarea = getParserDocument().createElement('textarea');
  textarea.innerHTML = value;
  return textarea.value;
}

export function normalizeWhitespace(value: string): string {
  return value.replace(WHITESPACE_RE, ' ').trim();
}

function collectText(node: Node, parts: string[]): void {
  node.childNodes.forEach((child) => {
    if (child.nodeType === child.TEXT_NODE) {
      parts.push(child.textContent ?? '');
    } else {
      collectText(child, parts);
    }
  });
}

/**
 * Text of an element with script-like elements removed. Text nodes are joined
 * with spaces so adjacent blocks don't run together. Mutates `root`.
 */
export function elementText(root: Element): string {
  root.querySelectorAll(NON_CONTENT_SELECTOR).forEach((element) => element.remove());
  const parts: string[] = [];
  collectText(root, parts);
  return parts.join(' ');
}

export function stripHtml(value: string): string {
  const container = getParserDocument().createElement('div');
  container.innerHTML = value;
  return elementText(container);
}

/**
 * Cleaning applied to every document body before checksumming and chunking.
 */
export function cleanText(value: string | null | undefined): string {
  const decoded = decodeHtmlEntities(value ?? '');
  return normalizeWhitespace(stripHtml(decoded));
}

/** First `length` code points of `value`; surrogate pairs stay whole. */
export function truncateText(value: string, length: number): string {
  return Array.from(value).slice(0, length).join('');
}
