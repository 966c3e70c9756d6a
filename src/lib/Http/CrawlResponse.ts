import { Data, Option } from 'effect';
import { CrawlRequest, toBytes } from './CrawlRequest.js';
import { HttpHeaders, type HeaderInit } from './HttpHeaders.js';
import type { RequestMeta } from './RequestMeta.js';

export interface CrawlResponseInit {
  readonly url: string;
  readonly status?: number;
  readonly headers?: HeaderInit | HttpHeaders;
  readonly body?: string | Uint8Array;
  readonly request: CrawlRequest;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];
const HTML_SNIFF = /^\s*(<!doctype\s+html|<html[\s>]|<head[\s>]|<body[\s>])/i;

const decoder = new TextDecoder();

/**
 * A response produced by one transport attempt.
 *
 * Responses are immutable. `meta` reads through to the originating
 * request, so an observer of the response sees the same annotation bag the
 * request phase saw.
 *
 * @group Data Types
 * @public
 */
export class CrawlResponse extends Data.Class<{
  readonly url: string;
  readonly status: number;
  readonly headers: HttpHeaders;
  readonly body: Uint8Array;
  /** The request this response answers */
  readonly request: CrawlRequest;
}> {
  static make(init: CrawlResponseInit): CrawlResponse {
    return new CrawlResponse({
      url: init.url,
      status: init.status ?? 200,
      headers: HttpHeaders.from(init.headers),
      body: toBytes(init.body),
      request: init.request,
    });
  }

  get meta(): RequestMeta {
    return this.request.meta;
  }

  get text(): string {
    return decoder.decode(this.body);
  }

  /**
   * Whether the body is an HTML document, judged by Content-Type or, when the
   * server sent none, by the start of the body.
   */
  get isHtml(): boolean {
    return Option.match(this.headers.get('Content-Type'), {
      onNone: () => HTML_SNIFF.test(this.text.slice(0, 512)),
      onSome: (contentType) => {
        const mimeType = contentType.split(';')[0].trim().toLowerCase();
        return HTML_CONTENT_TYPES.includes(mimeType);
      },
    });
  }

  toString(): string {
    return `<${this.status} ${this.url}>`;
  }
}
