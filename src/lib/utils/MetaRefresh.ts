import * as cheerio from 'cheerio';
import { Option } from 'effect';
import { UrlUtils } from './UrlUtils.js';

export interface MetaRefresh {
  /** Delay in seconds before the browser would follow the refresh */
  readonly interval: number;
  /** Absolute target URL */
  readonly url: string;
}

// "5; url=/next", "0;URL='/next'", "3, /next"
const REFRESH_CONTENT = /^\s*(\d*\.?\d+)\s*[;,]\s*(?:url\s*=\s*)?(.+?)\s*$/is;

const unquote = (value: string): string => {
  const match = /^(["'])(.*)\1$/s.exec(value);
  return match ? match[2].trim() : value;
};

/**
 * Find the first `<meta http-equiv="refresh">` directive of an HTML
 * document that carries a target URL.
 *
 * Elements inside `ignoreTags` are not considered. Relative targets are
 * resolved against the document's `<base href>` when present, otherwise
 * against `pageUrl`.
 *
 * @example
 * ```typescript
 * getMetaRefresh(
 *   '<meta http-equiv="refresh" content="5; url=/next">',
 *   'https://example.com/a/b',
 *   ['script', 'noscript']
 * );
 * // Option.some({ interval: 5, url: 'https://example.com/next' })
 * ```
 */
export const getMetaRefresh = (
  html: string,
  pageUrl: string,
  ignoreTags: readonly string[]
): Option.Option<MetaRefresh> => {
  const $ = cheerio.load(html);
  if (ignoreTags.length > 0) {
    $(ignoreTags.join(',')).remove();
  }

  const baseHref = $('base[href]').first().attr('href');
  const base = baseHref
    ? Option.getOrElse(UrlUtils.resolve(baseHref, pageUrl), () => pageUrl)
    : pageUrl;

  const content = $('meta[http-equiv]')
    .filter((_, el) => ($(el).attr('http-equiv') ?? '').trim().toLowerCase() === 'refresh')
    .first()
    .attr('content');
  if (content === undefined) {
    return Option.none();
  }

  const match = REFRESH_CONTENT.exec(content);
  if (!match) {
    return Option.none();
  }

  const interval = Number.parseFloat(match[1]);
  return UrlUtils.resolve(unquote(match[2]), base).pipe(
    Option.map((url) => ({ interval, url }))
  );
};
