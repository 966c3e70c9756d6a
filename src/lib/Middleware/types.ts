/**
 * Data type definitions for the downloader middleware chain
 * Hook decisions are explicit tagged outcomes rather than thrown signals
 */

import { Data, Effect } from 'effect';
import type { CrawlRequest } from '../Http/CrawlRequest.js';
import type { CrawlResponse } from '../Http/CrawlResponse.js';
import type { SpiderInfo } from '../Spider/SpiderInfo.js';
import type { MiddlewareError } from '../errors.js';

/**
 * The decision a middleware hook takes for the request in hand.
 *
 * - `Continue`: no opinion, let the next hook decide
 * - `Forward`: request phase only, go on with this (replacement) request
 * - `Respond`: a response to hand downstream
 * - `Reschedule`: a brand-new task for the scheduler; the current chain stops
 * - `Abort`: the task is abandoned for `reason`; nothing is delivered
 *
 * @group Data Types
 * @public
 */
export type MiddlewareOutcome = Data.TaggedEnum<{
  Continue: {};
  Forward: { readonly request: CrawlRequest };
  Respond: { readonly response: CrawlResponse };
  Reschedule: { readonly request: CrawlRequest };
  Abort: { readonly request: CrawlRequest; readonly reason: string };
}>;

export const MiddlewareOutcome = Data.taggedEnum<MiddlewareOutcome>();

export type RequestOutcome = MiddlewareOutcome;

export type ResponseOutcome = Extract<
  MiddlewareOutcome,
  { readonly _tag: 'Respond' | 'Reschedule' | 'Abort' }
>;

export type ExceptionOutcome = Exclude<
  MiddlewareOutcome,
  { readonly _tag: 'Forward' }
>;

/**
 * Interface for downloader middleware components.
 *
 * Every hook is optional; a missing hook behaves as `Continue` (request and
 * exception phases) or passes the response through (response phase).
 *
 * @example
 * ```typescript
 * const tagging: DownloaderMiddleware = {
 *   name: 'tagging',
 *   processRequest: (request) =>
 *     Effect.succeed(
 *       MiddlewareOutcome.Forward({
 *         request: request.replace({ headers: request.headers.set('X-Crawl', '1') })
 *       })
 *     )
 * };
 * ```
 *
 * @group Interfaces
 * @public
 */
export interface DownloaderMiddleware {
  /** Registry name, used in logs and errors */
  readonly name: string;

  /**
   * Inspect an outgoing request before it reaches the transport.
   */
  readonly processRequest?: (
    request: CrawlRequest,
    spider: SpiderInfo
  ) => Effect.Effect<RequestOutcome, MiddlewareError>;

  /**
   * Inspect a response on its way back to the spider.
   */
  readonly processResponse?: (
    request: CrawlRequest,
    response: CrawlResponse,
    spider: SpiderInfo
  ) => Effect.Effect<ResponseOutcome, MiddlewareError>;

  /**
   * Handle a failure raised by the transport or by a request hook.
   */
  readonly processException?: (
    request: CrawlRequest,
    error: Error,
    spider: SpiderInfo
  ) => Effect.Effect<ExceptionOutcome, MiddlewareError>;
}

/**
 * Moves bytes for one request. Implementations live outside this package.
 *
 * @group Interfaces
 * @public
 */
export type Transport = (
  request: CrawlRequest
) => Effect.Effect<CrawlResponse, Error>;
