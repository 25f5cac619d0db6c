import { JSDOM } from 'jsdom';
import { ClassTokenClassifier } from './classifier.js';
import type { DescriptionClassifier, ProgramItem } from './program.js';

export interface ExtractOptions {
  /** Site root that relative hrefs are resolved against. */
  baseUrl: string;
  maxItems?: number;
  newMarker?: string;
  defaultDescription?: string;
  classifier?: DescriptionClassifier;
  now?: Date;
}

const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6';
const SCHEME_REGEX = /^[a-z][a-z\d+.-]*:/i;
// `//host/path` (or `\\host`) keeps the path relative but switches host.
const NETWORK_PATH_REGEX = /^[\\/]{2}/;
const MIN_TITLE_LENGTH = 3;

/**
 * Anchors pointing at a fragment or at another origin are navigation, not programs.
 */
export function isProgramHref(href: string): boolean {
  return !href.startsWith('#') && !SCHEME_REGEX.test(href) && !NETWORK_PATH_REGEX.test(href);
}

/**
 * Absolute URL for `href` against `baseUrl`, or null when it does not parse.
 */
export function resolveLink(href: string, baseUrl: string): string | null {
  if (SCHEME_REGEX.test(href)) return href;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function* textNodes(node: Node): Generator<string> {
  for (const child of Array.from(node.childNodes)) {
    if (child.nodeType === child.TEXT_NODE) {
      yield child.textContent ?? '';
    } else {
      yield* textNodes(child);
    }
  }
}

export function containsMarker(node: Node, marker: string): boolean {
  const needle = marker.toLowerCase();
  for (const text of textNodes(node)) {
    if (text.toLowerCase().includes(needle)) return true;
  }
  return false;
}

/**
 * Stable partition: new programs first, encounter order kept within each group.
 */
export function newFirst(items: ProgramItem[]): ProgramItem[] {
  return [...items.filter((p) => p.isNew), ...items.filter((p) => !p.isNew)];
}

/**
 * Scan start-page markup for program tiles: anchors wrapping a heading.
 * Duplicate anchors are kept as-is.
 */
export function extractPrograms(html: string, options: ExtractOptions): ProgramItem[] {
  const {
    baseUrl,
    maxItems = 20,
    newMarker = 'nieuw',
    defaultDescription = 'Programma op NPO',
    classifier = new ClassTokenClassifier(),
    now = new Date(),
  } = options;

  const dom = new JSDOM(html);
  const document = dom.window.document;
  const publishedDate = now.toISOString();
  const programs: ProgramItem[] = [];

  for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
    const href = anchor.getAttribute('href');
    if (!href || !isProgramHref(href)) continue;

    const heading = anchor.querySelector(HEADING_SELECTOR);
    if (!heading) continue;

    const title = heading.textContent?.trim() ?? '';
    if (title.length < MIN_TITLE_LENGTH) continue;

    const link = resolveLink(href, baseUrl);
    if (!link) continue;

    programs.push({
      title,
      link,
      description: classifier.classify(anchor) ?? defaultDescription,
      isNew: containsMarker(anchor, newMarker),
      publishedDate,
    });
  }

  dom.window.close();
  return newFirst(programs).slice(0, maxItems);
}
