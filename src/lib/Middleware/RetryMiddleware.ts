import { Effect, Option } from 'effect';
import { Settings } from '../Config/Settings.service.js';
import type { CrawlRequest } from '../Http/CrawlRequest.js';
import { responseStatusMessage } from '../Http/status.js';
import { withSpiderLogs, type SpiderInfo } from '../Spider/SpiderInfo.js';
import { StatsCollector } from '../Stats/StatsCollector.service.js';
import { MiddlewareOutcome, type DownloaderMiddleware } from './types.js';

/**
 * @group Configuration
 * @public
 */
export interface RetryOptions {
  /** Retries allowed per task chain (`RETRY_TIMES`) */
  readonly maxRetryTimes: number;
  /** Response statuses worth another attempt */
  readonly retryHttpCodes: ReadonlySet<number>;
  /** Added to the priority of every retried request */
  readonly priorityAdjust: number;
}

const TRANSIENT_FAILURE_TAGS: ReadonlySet<string> = new Set([
  'TimeoutError',
  'DnsLookupError',
  'ConnectionRefusedError',
  'ConnectionResetError',
  'ConnectionLostError',
  'TunnelError',
  'ResponseFailedError',
]);

// Node.js system error codes for the same conditions
const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
]);

/**
 * Name identifying a failure in logs and counters: the tag of a tagged
 * error, otherwise the error's name.
 */
export const failureName = (error: Error): string =>
  '_tag' in error && typeof error._tag === 'string' ? error._tag : error.name;

/**
 * Whether `error` is a transport failure that may not happen again:
 * timeouts, DNS failures, refused/reset/lost connections, proxy tunnel
 * failures and truncated responses.
 */
export const isTransientFailure = (error: Error): boolean => {
  if (TRANSIENT_FAILURE_TAGS.has(failureName(error))) {
    return true;
  }
  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code);
};

/**
 * Derive the next attempt of `request`, or none once its retry budget is
 * spent. The budget is `meta.maxRetryTimes` when set, otherwise
 * `options.maxRetryTimes`.
 */
export const makeRetrier =
  (options: RetryOptions, stats: StatsCollector) =>
  (
    request: CrawlRequest,
    reason: string | Error,
    spider: SpiderInfo
  ): Effect.Effect<Option.Option<CrawlRequest>> =>
    Effect.gen(function* () {
      const retries = (request.meta.retryTimes ?? 0) + 1;
      const budget = request.meta.maxRetryTimes ?? options.maxRetryTimes;
      const reasonName = typeof reason === 'string' ? reason : failureName(reason);
      const reasonText =
        typeof reason === 'string' ? reason : `${reasonName}: ${reason.message}`;

      if (retries <= budget) {
        yield* Effect.logDebug(
          `Retrying ${request} (failed ${retries} times): ${reasonText}`
        );
        const retried = request
          .replace({
            dontFilter: true,
            priority: request.priority + options.priorityAdjust,
          })
          .withMeta({ retryTimes: retries });

        yield* stats.increment('retry/count');
        yield* stats.increment(`retry/reason_count/${reasonName}`);
        return Option.some(retried);
      }

      yield* stats.increment('retry/max_reached');
      yield* Effect.logDebug(
        `Gave up retrying ${request} (failed ${retries} times): ${reasonText}`
      );
      return Option.none<CrawlRequest>();
    }).pipe(withSpiderLogs(spider));

/**
 * Retries requests that failed for reasons likely to be temporary: a
 * transient transport failure, or a response status in `retryHttpCodes`.
 *
 * When the budget is spent a status-triggered retry hands the original
 * response downstream and an exception-triggered retry lets the failure
 * propagate; a result is never swallowed.
 *
 * @example
 * ```typescript
 * const middleware = makeRetryMiddleware(
 *   { maxRetryTimes: 2, retryHttpCodes: new Set([503]), priorityAdjust: -1 },
 *   stats
 * );
 * ```
 *
 * @group Middleware
 * @public
 */
export const makeRetryMiddleware = (
  options: RetryOptions,
  stats: StatsCollector
): DownloaderMiddleware => {
  const retry = makeRetrier(options, stats);

  return {
    name: 'retry',

    processResponse: (request, response, spider) => {
      if (request.meta.dontRetry || !options.retryHttpCodes.has(response.status)) {
        return Effect.succeed(MiddlewareOutcome.Respond({ response }));
      }
      return retry(request, responseStatusMessage(response.status), spider).pipe(
        Effect.map(
          Option.match({
            onNone: () => MiddlewareOutcome.Respond({ response }),
            onSome: (retried) => MiddlewareOutcome.Reschedule({ request: retried }),
          })
        )
      );
    },

    processException: (request, error, spider) => {
      if (request.meta.dontRetry || !isTransientFailure(error)) {
        return Effect.succeed(MiddlewareOutcome.Continue());
      }
      return retry(request, error, spider).pipe(
        Effect.map(
          Option.match({
            onNone: () => MiddlewareOutcome.Continue(),
            onSome: (retried) => MiddlewareOutcome.Reschedule({ request: retried }),
          })
        )
      );
    },
  };
};

/**
 * Build the retry middleware from settings, or none when `RETRY_ENABLED`
 * is off.
 */
export const retryMiddlewareFromSettings = Effect.gen(function* () {
  const settings = yield* Settings;
  const stats = yield* StatsCollector;

  if (!(yield* settings.getBool('RETRY_ENABLED'))) {
    return Option.none<DownloaderMiddleware>();
  }

  return Option.some(
    makeRetryMiddleware(
      {
        maxRetryTimes: yield* settings.getInt('RETRY_TIMES'),
        retryHttpCodes: new Set(yield* settings.getIntList('RETRY_HTTP_CODES')),
        priorityAdjust: yield* settings.getInt('RETRY_PRIORITY_ADJUST'),
      },
      stats
    )
  );
});
