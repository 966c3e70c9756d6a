import { Data, Effect, Option } from 'effect';
import type { CrawlResponse } from '../Http/CrawlResponse.js';
import type { SpiderInfo } from '../Spider/SpiderInfo.js';

/**
 * What becomes of a response once the spider middlewares have seen it.
 *
 * - `Deliver`: hand the response to the spider callbacks
 * - `Drop`: an exception hook absorbed a failure; no callbacks run
 *
 * @group Data Types
 * @public
 */
export type SpiderInputOutcome = Data.TaggedEnum<{
  Deliver: { readonly response: CrawlResponse };
  Drop: { readonly response: CrawlResponse; readonly error: Error };
}>;

export const SpiderInputOutcome = Data.taggedEnum<SpiderInputOutcome>();

/**
 * Interface for middlewares sitting between the downloader and the spider
 * callbacks.
 *
 * @group Interfaces
 * @public
 */
export interface SpiderMiddleware {
  readonly name: string;

  /**
   * Inspect a response before the spider sees it. Failing rejects the
   * response and hands the failure to the exception hooks.
   */
  readonly processSpiderInput?: (
    response: CrawlResponse,
    spider: SpiderInfo
  ) => Effect.Effect<void, Error>;

  /**
   * Handle a failure raised while processing `response`. `Option.some`
   * replaces the spider's output with the given results and stops the
   * failure; `Option.none` lets the next hook try.
   */
  readonly processSpiderException?: (
    response: CrawlResponse,
    error: Error,
    spider: SpiderInfo
  ) => Effect.Effect<Option.Option<readonly unknown[]>>;
}
