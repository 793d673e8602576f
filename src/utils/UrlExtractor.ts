/**
 * UrlExtractor - Pulls candidate URLs out of pasted text or batch files
 */

const URL_PATTERN = /https?:\/\/[^\s<>"]+/gi;
const SCHEME_TOKENS = ['https://', 'http://'];
const TRAILING_JUNK = ' \t\r\n.!,);]>\'"';

function firstIndexOfScheme(text: string, fromIndex: number): number {
  const lower = text.toLowerCase();
  const hits = SCHEME_TOKENS.map((token) => lower.indexOf(token, fromIndex)).filter(
    (index) => index !== -1,
  );
  return hits.length > 0 ? Math.min(...hits) : -1;
}

function trimTrailing(text: string): string {
  let end = text.length;
  while (end > 0 && TRAILING_JUNK.includes(text[end - 1])) {
    end--;
  }
  return text.slice(0, end);
}

/**
 * Make a pasted URL usable:
 * drops junk before the scheme, keeps only the first of several URLs glued
 * together and strips punctuation picked up by copy/paste
 */
export function normalizeUrl(raw: string): string {
  let url = (raw || '').trim();

  const first = firstIndexOfScheme(url, 0);
  if (first > 0) {
    url = url.slice(first);
  }

  const second = firstIndexOfScheme(url, 1);
  if (second !== -1) {
    url = url.slice(0, second);
  }

  return trimTrailing(url);
}

/**
 * Extract all http(s) URLs from arbitrary text.
 * Comment lines (first non-blank char `#`) are skipped, results are deduplicated
 * in first-seen order.
 */
export function extractUrls(text: string): string[] {
  if (!text) {
    return [];
  }

  const blob = text
    .split(/\r?\n/)
    .filter((line) => !line.trimStart().startsWith('#'))
    .join('\n');

  const seen = new Set<string>();
  const urls: string[] = [];

  for (const match of blob.match(URL_PATTERN) ?? []) {
    const url = normalizeUrl(match);
    if (!url || seen.has(url)) {
      continue;
    }
    seen.add(url);
    urls.push(url);
  }

  return urls;
}
