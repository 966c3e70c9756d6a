import { Data } from 'effect';
import { HttpHeaders, type HeaderInit } from './HttpHeaders.js';
import type { RequestMeta } from './RequestMeta.js';

/**
 * A cookie attached directly to a request, in explicit list form.
 */
export interface RequestCookie {
  readonly name: string;
  readonly value: string;
  readonly domain?: string;
  readonly path?: string;
}

/**
 * Cookies attached to a request: either a name → value mapping or an
 * explicit list of cookie records.
 */
export type RequestCookies =
  | Readonly<Record<string, string>>
  | ReadonlyArray<RequestCookie>;

export interface CrawlRequestInit {
  readonly url: string;
  readonly method?: string;
  readonly headers?: HeaderInit | HttpHeaders;
  readonly body?: string | Uint8Array;
  readonly cookies?: RequestCookies;
  readonly priority?: number;
  readonly dontFilter?: boolean;
  readonly meta?: RequestMeta;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const toBytes = (body: string | Uint8Array | undefined): Uint8Array =>
  body === undefined
    ? new Uint8Array(0)
    : typeof body === 'string'
      ? encoder.encode(body)
      : body;

/**
 * An outgoing request.
 *
 * A request is a value with history: middlewares never edit one in place.
 * Each redirect or retry derives a new instance through {@link replace} or
 * {@link withMeta}, carrying a shallow copy of `meta` forward.
 *
 * @example
 * ```typescript
 * const request = CrawlRequest.make({
 *   url: 'https://example.com/login',
 *   method: 'POST',
 *   body: 'user=test',
 *   meta: { cookieJar: 'session-a' }
 * });
 * const retried = request.replace({ dontFilter: true }).withMeta({ retryTimes: 1 });
 * ```
 *
 * @group Data Types
 * @public
 */
export class CrawlRequest extends Data.Class<{
  readonly url: string;
  /** Upper-cased HTTP method */
  readonly method: string;
  readonly headers: HttpHeaders;
  readonly body: Uint8Array;
  readonly cookies: RequestCookies;
  /** Higher values are scheduled sooner */
  readonly priority: number;
  /** Bypass the scheduler's duplicate filter */
  readonly dontFilter: boolean;
  readonly meta: RequestMeta;
}> {
  static make(init: CrawlRequestInit): CrawlRequest {
    return new CrawlRequest({
      url: init.url,
      method: (init.method ?? 'GET').toUpperCase(),
      headers: HttpHeaders.from(init.headers),
      body: toBytes(init.body),
      cookies: init.cookies ?? {},
      priority: init.priority ?? 0,
      dontFilter: init.dontFilter ?? false,
      meta: { ...init.meta },
    });
  }

  /**
   * Derive a new request with some fields replaced
   */
  replace(patch: Partial<CrawlRequestInit>): CrawlRequest {
    return CrawlRequest.make({
      url: this.url,
      method: this.method,
      headers: this.headers,
      body: this.body,
      cookies: this.cookies,
      priority: this.priority,
      dontFilter: this.dontFilter,
      meta: this.meta,
      ...patch,
    });
  }

  /**
   * Derive a new request whose meta is a shallow copy with `patch` applied
   */
  withMeta(patch: RequestMeta): CrawlRequest {
    return this.replace({ meta: { ...this.meta, ...patch } });
  }

  copy(): CrawlRequest {
    return this.replace({});
  }

  get text(): string {
    return decoder.decode(this.body);
  }

  toString(): string {
    return `<${this.method} ${this.url}>`;
  }
}
