/**
 * URL Utilities
 * WHATWG URL resolution without exceptions
 */

import { Option } from 'effect';

export const UrlUtils = {
  /**
   * Resolve a possibly relative reference against a base URL.
   *
   * WHATWG parsing percent-encodes characters that are unsafe in a URL
   * (spaces, non-ASCII), so the result is always safe to send.
   *
   * @example
   * ```ts
   * UrlUtils.resolve('../b c', 'https://example.com/x/y');
   * // Option.some('https://example.com/b%20c')
   * ```
   */
  resolve: (reference: string, base: string): Option.Option<string> =>
    URL.canParse(reference.trim(), base)
      ? Option.some(new URL(reference.trim(), base).href)
      : Option.none(),
};
