// RSS 2.0 and Atom extraction. Regex over the raw XML rather than a full
// parser: feeds are small, flat documents and only a handful of fields matter.

import { convert } from 'html-to-text';
import { FeedParseError } from '../types/error.js';

export type FeedEntry = {
  readonly title: string;
  readonly link: string;
  readonly description: string;
  readonly published: string;
  readonly author: string;
  readonly tags: ReadonlyArray<string>;
};

export type ParsedFeed = {
  readonly format: 'rss' | 'atom';
  readonly title: string;
  readonly description: string;
  readonly link: string;
  readonly language: string;
  readonly updated: string;
  readonly totalEntries: number;
  readonly entries: ReadonlyArray<FeedEntry>;
};

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePointOr(codePoint: number, fallback: string): string {
  return Number.isSafeInteger(codePoint) && codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : fallback;
}

/** Out-of-range numeric references are left as written. */
export function decodeXmlText(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePointOr(Number.parseInt(entity.slice(2), 16), whole);
    }
    if (entity.startsWith('#')) {
      return fromCodePointOr(Number.parseInt(entity.slice(1), 10), whole);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? whole;
  });
}

function escapeTag(tag: string): string {
  return tag.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function rawChildren(block: string, tag: string): string[] {
  const pattern = new RegExp(`<${escapeTag(tag)}(?:\\s[^>]*)?>([\\s\\S]*?)</${escapeTag(tag)}>`, 'gi');
  return Array.from(block.matchAll(pattern), (match) => match[1] ?? '');
}

function textOf(raw: string): string {
  const cdata = raw.match(/^\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*$/);
  if (cdata) {
    return (cdata[1] ?? '').trim();
  }
  return decodeXmlText(raw).trim();
}

function childText(block: string, ...tags: string[]): string {
  for (const tag of tags) {
    const [first] = rawChildren(block, tag);
    if (first !== undefined) {
      return textOf(first);
    }
  }
  return '';
}

/**
 * Descriptions are often escaped HTML; flatten them to a single line of text.
 */
function plainText(markup: string): string {
  if (!/[<&]/.test(markup)) {
    return markup.replace(/\s+/g, ' ').trim();
  }
  return convert(markup, { wordwrap: false, selectors: [{ selector: 'a', options: { ignoreHref: true } }] })
    .replace(/\s+/g, ' ')
    .trim();
}

function attribute(tag: string, name: string): string | null {
  const match = tag.match(new RegExp(`\\b${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i'));
  const value = match?.[1] ?? match?.[2];
  return value === undefined ? null : decodeXmlText(value);
}

function atomLink(block: string): string {
  let fallback = '';
  for (const tag of block.match(/<link\b[^>]*>/gi) ?? []) {
    const href = attribute(tag, 'href');
    if (href === null) {
      continue;
    }
    const rel = attribute(tag, 'rel');
    if (rel === null || rel === 'alternate') {
      return href;
    }
    if (fallback === '') {
      fallback = href;
    }
  }
  return fallback;
}

function headerOf(xml: string, itemTag: string): string {
  const index = xml.search(new RegExp(`<${itemTag}[\\s>]`, 'i'));
  return index === -1 ? xml : xml.slice(0, index);
}

function parseRss(xml: string, limit: number): ParsedFeed {
  const items = rawChildren(xml, 'item');
  const header = headerOf(xml, 'item');

  const entries = items.slice(0, limit).map((item) => ({
    title: plainText(childText(item, 'title')),
    link: childText(item, 'link') || childText(item, 'guid'),
    description: plainText(childText(item, 'description', 'content:encoded')),
    published: childText(item, 'pubDate', 'dc:date'),
    author: childText(item, 'author', 'dc:creator'),
    tags: rawChildren(item, 'category')
      .map(textOf)
      .filter((tag) => tag !== ''),
  }));

  return {
    format: 'rss',
    title: plainText(childText(header, 'title')),
    description: plainText(childText(header, 'description')),
    link: childText(header, 'link'),
    language: childText(header, 'language'),
    updated: childText(header, 'lastBuildDate', 'pubDate'),
    totalEntries: items.length,
    entries,
  };
}

function parseAtom(xml: string, limit: number): ParsedFeed {
  const items = rawChildren(xml, 'entry');
  const header = headerOf(xml, 'entry');
  const feedTag = xml.match(/<feed\b[^>]*>/i)?.[0] ?? '';

  const entries = items.slice(0, limit).map((entry) => ({
    title: plainText(childText(entry, 'title')),
    link: atomLink(entry),
    description: plainText(childText(entry, 'summary', 'content')),
    published: childText(entry, 'published', 'updated'),
    author: childText(rawChildren(entry, 'author')[0] ?? '', 'name'),
    tags: (entry.match(/<category\b[^>]*>/gi) ?? [])
      .map((tag) => attribute(tag, 'term') ?? '')
      .filter((tag) => tag !== ''),
  }));

  return {
    format: 'atom',
    title: plainText(childText(header, 'title')),
    description: plainText(childText(header, 'subtitle')),
    link: atomLink(header),
    language: attribute(feedTag, 'xml:lang') ?? '',
    updated: childText(header, 'updated'),
    totalEntries: items.length,
    entries,
  };
}

/**
 * Parses an RSS 2.0 or Atom document, keeping at most `limit` entries.
 */
export function parseFeed(xml: string, limit: number): ParsedFeed {
  if (/<feed[\s>]/i.test(xml)) {
    return parseAtom(xml, limit);
  }
  if (/<rss[\s>]/i.test(xml) || /<channel[\s>]/i.test(xml)) {
    return parseRss(xml, limit);
  }
  throw new FeedParseError('Document is neither an RSS nor an Atom feed');
}
