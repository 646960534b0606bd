// Static HTML to readable text: title, meta description, main text, outbound links.

import { convert } from 'html-to-text';

export type PageLink = {
  readonly text: string;
  readonly url: string;
};

export type ExtractedPage = {
  readonly title: string;
  readonly description: string;
  readonly text: string;
  readonly links: ReadonlyArray<PageLink>;
};

export const MAX_PAGE_LINKS = 20;

/**
 * HTML fragment to a single line of plain text.
 */
export function inlineText(fragment: string): string {
  return convert(fragment, { wordwrap: false }).replace(/\s+/g, ' ').trim();
}

function extractTitle(html: string): string {
  const match = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  return match?.[1] ? inlineText(match[1]) : '';
}

function extractDescription(html: string): string {
  for (const tag of html.match(/<meta\b[^>]*>/gi) ?? []) {
    if (!/\bname\s*=\s*["']description["']/i.test(tag)) {
      continue;
    }
    const content = tag.match(/\bcontent\s*=\s*"([^"]*)"|\bcontent\s*=\s*'([^']*)'/i);
    const value = content?.[1] ?? content?.[2];
    if (value !== undefined) {
      return inlineText(value);
    }
  }
  return '';
}

/**
 * Absolute http(s) links in document order, de-duplicated, capped at `limit`.
 */
export function extractLinks(html: string, baseUrl: string, limit = MAX_PAGE_LINKS): PageLink[] {
  const links: PageLink[] = [];
  const seen = new Set<string>();
  const anchor = /<a\b[^>]*?\bhref\s*=\s*(?:"([^"]*)"|'([^']*)')[^>]*>([\s\S]*?)<\/a>/gi;

  for (const match of html.matchAll(anchor)) {
    if (links.length >= limit) {
      break;
    }
    const href = match[1] ?? match[2] ?? '';
    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      continue;
    }
    if (seen.has(resolved.href)) {
      continue;
    }
    seen.add(resolved.href);
    links.push({ text: inlineText(match[3] ?? ''), url: resolved.href });
  }

  return links;
}

/**
 * Prefers <main>, role="main", then <article> when one holds real content.
 */
function extractMainContent(html: string): string | null {
  const patterns = [
    /<main[\s>][\s\S]*?<\/main>/i,
    /<[^>]+role\s*=\s*["']main["'][^>]*>[\s\S]*?<\/[^>]+>/i,
    /<article[\s>][\s\S]*?<\/article>/i,
  ];

  for (const pattern of patterns) {
    const match = html.match(pattern);
    if (match && match[0].length > 200) {
      return match[0];
    }
  }

  return null;
}

const BOILERPLATE_PATTERNS: ReadonlyArray<RegExp> = [
  /<nav[\s>][\s\S]*?<\/nav>/gi,
  /<header[\s>][\s\S]*?<\/header>/gi,
  /<footer[\s>][\s\S]*?<\/footer>/gi,
  /<script[\s>][\s\S]*?<\/script>/gi,
  /<style[\s>][\s\S]*?<\/style>/gi,
  /<noscript[\s>][\s\S]*?<\/noscript>/gi,
  /<svg[\s>][\s\S]*?<\/svg>/gi,
  /<iframe[\s>][\s\S]*?<\/iframe>/gi,
  /<!--[\s\S]*?-->/g,
];

export function stripBoilerplate(html: string): string {
  let result = extractMainContent(html) ?? html;
  for (const pattern of BOILERPLATE_PATTERNS) {
    result = result.replace(pattern, '');
  }
  return result;
}

/**
 * Trims line ends and collapses runs of blank lines to one.
 */
export function collapseWhitespace(text: string): string {
  return text
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function extractPage(html: string, baseUrl: string): ExtractedPage {
  const text = convert(stripBoilerplate(html), {
    wordwrap: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
    ],
  });

  return {
    title: extractTitle(html),
    description: extractDescription(html),
    text: collapseWhitespace(text),
    links: extractLinks(html, baseUrl),
  };
}
