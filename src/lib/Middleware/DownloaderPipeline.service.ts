import { Effect, Either } from 'effect';
import type { CrawlRequest } from '../Http/CrawlRequest.js';
import type { CrawlResponse } from '../Http/CrawlResponse.js';
import type { MiddlewareError } from '../errors.js';
import { withSpiderLogs, type SpiderInfo } from '../Spider/SpiderInfo.js';
import { buildDownloaderChain } from './registry.js';
import {
  MiddlewareOutcome,
  type DownloaderMiddleware,
  type ExceptionOutcome,
  type RequestOutcome,
  type ResponseOutcome,
  type Transport,
} from './types.js';

/** Result of a request phase: never `Continue` */
export type RequestResolution = Exclude<RequestOutcome, { readonly _tag: 'Continue' }>;

/** Result of an exception phase that resolved the failure */
export type ExceptionResolution = Exclude<ExceptionOutcome, { readonly _tag: 'Continue' }>;

const inMiddleware =
  (middleware: DownloaderMiddleware) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, 'middleware', middleware.name);

/**
 * Runs requests, responses and failures through the downloader middleware
 * chain.
 *
 * The chain is resolved once, when the service is built, from the
 * `DOWNLOADER_MIDDLEWARES_BASE` and `DOWNLOADER_MIDDLEWARES` settings:
 * - Requests are processed forward through the chain
 * - Responses are processed in reverse order (last middleware first)
 * - Exceptions are processed in reverse order
 *
 * Each phase stops at the first terminal outcome. Every operation also
 * accepts an explicit middleware list in place of the configured chain.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const pipeline = yield* DownloaderPipeline;
 *   const outcome = yield* pipeline.download(
 *     CrawlRequest.make({ url: 'https://example.com/' }),
 *     { name: 'example' },
 *     transport
 *   );
 *   if (outcome._tag === 'Reschedule') {
 *     // hand outcome.request back to the scheduler
 *   }
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class DownloaderPipeline extends Effect.Service<DownloaderPipeline>()(
  '@crawlguard/DownloaderPipeline',
  {
    effect: Effect.gen(function* () {
      const chain: readonly DownloaderMiddleware[] = yield* buildDownloaderChain();

      /**
       * Run request hooks in order, threading `Forward` replacements. When
       * every hook continues, the result is `Forward` with the final request,
       * which is the one to send.
       */
      const processRequest = (
        request: CrawlRequest,
        spider: SpiderInfo,
        middlewares: readonly DownloaderMiddleware[] = chain
      ): Effect.Effect<RequestResolution, MiddlewareError> =>
        Effect.gen(function* () {
          let current = request;
          for (const middleware of middlewares) {
            if (!middleware.processRequest) {
              continue;
            }
            const outcome = yield* middleware
              .processRequest(current, spider)
              .pipe(inMiddleware(middleware));
            switch (outcome._tag) {
              case 'Continue':
                break;
              case 'Forward':
                current = outcome.request;
                break;
              default:
                return outcome;
            }
          }
          return MiddlewareOutcome.Forward({ request: current });
        });

      /**
       * Run response hooks in reverse order, threading the response. Stops at
       * the first `Reschedule` or `Abort`.
       */
      const processResponse = (
        request: CrawlRequest,
        response: CrawlResponse,
        spider: SpiderInfo,
        middlewares: readonly DownloaderMiddleware[] = chain
      ): Effect.Effect<ResponseOutcome, MiddlewareError> =>
        Effect.gen(function* () {
          let current = response;
          for (const middleware of [...middlewares].reverse()) {
            if (!middleware.processResponse) {
              continue;
            }
            const outcome = yield* middleware
              .processResponse(request, current, spider)
              .pipe(inMiddleware(middleware));
            if (outcome._tag !== 'Respond') {
              return outcome;
            }
            current = outcome.response;
          }
          return MiddlewareOutcome.Respond({ response: current });
        });

      /**
       * Run exception hooks in reverse order. Fails with `error` when no hook
       * resolves it.
       */
      const processException = (
        request: CrawlRequest,
        error: Error,
        spider: SpiderInfo,
        middlewares: readonly DownloaderMiddleware[] = chain
      ): Effect.Effect<ExceptionResolution, Error> =>
        Effect.gen(function* () {
          for (const middleware of [...middlewares].reverse()) {
            if (!middleware.processException) {
              continue;
            }
            const outcome = yield* middleware
              .processException(request, error, spider)
              .pipe(inMiddleware(middleware));
            if (outcome._tag !== 'Continue') {
              return outcome;
            }
          }
          return yield* Effect.fail(error);
        });

      /**
       * One full cycle: request phase, transport, then the response phase for
       * whatever response was obtained. A request-phase or transport failure
       * goes through the exception phase first.
       */
      const download = (
        request: CrawlRequest,
        spider: SpiderInfo,
        transport: Transport,
        middlewares: readonly DownloaderMiddleware[] = chain
      ): Effect.Effect<ResponseOutcome, Error> =>
        Effect.gen(function* () {
          const requested = yield* Effect.either(
            processRequest(request, spider, middlewares)
          );

          let sent = request;
          let outcome: ResponseOutcome;
          if (Either.isLeft(requested)) {
            outcome = yield* processException(request, requested.left, spider, middlewares);
          } else {
            const resolution = requested.right;
            if (resolution._tag === 'Forward') {
              sent = resolution.request;
              const fetched = yield* Effect.either(transport(sent));
              outcome = Either.isRight(fetched)
                ? MiddlewareOutcome.Respond({ response: fetched.right })
                : yield* processException(sent, fetched.left, spider, middlewares);
            } else {
              outcome = resolution;
            }
          }

          if (outcome._tag !== 'Respond') {
            return outcome;
          }
          yield* Effect.logDebug(`Crawled ${outcome.response} for ${sent}`);
          return yield* processResponse(sent, outcome.response, spider, middlewares);
        }).pipe(withSpiderLogs(spider));

      return {
        middlewares: chain,
        names: chain.map((middleware) => middleware.name),
        processRequest,
        processResponse,
        processException,
        download,
      };
    }),
  }
) {}
