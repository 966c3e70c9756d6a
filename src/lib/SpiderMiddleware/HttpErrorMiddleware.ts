import { Effect, Option } from 'effect';
import { Settings } from '../Config/Settings.service.js';
import type { CrawlResponse } from '../Http/CrawlResponse.js';
import { isSuccessStatus } from '../Http/status.js';
import { HttpError } from '../errors.js';
import { withSpiderLogs, type SpiderInfo } from '../Spider/SpiderInfo.js';
import { StatsCollector } from '../Stats/StatsCollector.service.js';
import type { SpiderMiddleware } from './types.js';

export interface HttpErrorOptions {
  /** Let every status through (`HTTPERROR_ALLOW_ALL`) */
  readonly allowAll: boolean;
  /** Non-2xx statuses let through by default (`HTTPERROR_ALLOWED_CODES`) */
  readonly allowedCodes: readonly number[];
}

const allowedStatuses = (
  options: HttpErrorOptions,
  response: CrawlResponse,
  spider: SpiderInfo
): readonly number[] | 'all' => {
  const { meta } = response;
  // present at all, whatever its value
  if (meta.handleHttpStatusAll !== undefined) {
    return 'all';
  }
  if (meta.handleHttpStatusList !== undefined) {
    return meta.handleHttpStatusList;
  }
  if (options.allowAll) {
    return 'all';
  }
  return spider.handleHttpStatusList ?? options.allowedCodes;
};

/**
 * Filters out unsuccessful responses so spiders only deal with 2xx ones,
 * unless they ask for more.
 *
 * A filtered response fails the input phase with an {@link HttpError};
 * the exception hook of the same middleware counts it and turns it into an
 * empty result.
 *
 * @group Middleware
 * @public
 */
export const makeHttpErrorMiddleware = (
  options: HttpErrorOptions,
  stats: StatsCollector
): SpiderMiddleware => ({
  name: 'httpError',

  processSpiderInput: (response, spider) => {
    if (isSuccessStatus(response.status)) {
      return Effect.void;
    }
    const allowed = allowedStatuses(options, response, spider);
    if (allowed === 'all' || allowed.includes(response.status)) {
      return Effect.void;
    }
    return Effect.fail(HttpError.ignoring(response));
  },

  processSpiderException: (response, error, spider) => {
    if (!(error instanceof HttpError)) {
      return Effect.succeed(Option.none());
    }
    return Effect.gen(function* () {
      yield* stats.increment('httperror/response_ignored_count');
      yield* stats.increment(
        `httperror/response_ignored_status_count/${response.status}`
      );
      yield* Effect.logInfo(
        `Ignoring response ${response}: HTTP status code is not handled or not allowed`
      );
      return Option.some<readonly unknown[]>([]);
    }).pipe(withSpiderLogs(spider));
  },
});

/**
 * Build the status filter from settings. It has no enabling flag and is
 * always configured.
 */
export const httpErrorMiddlewareFromSettings = Effect.gen(function* () {
  const settings = yield* Settings;
  const stats = yield* StatsCollector;

  return Option.some(
    makeHttpErrorMiddleware(
      {
        allowAll: yield* settings.getBool('HTTPERROR_ALLOW_ALL'),
        allowedCodes: yield* settings.getIntList('HTTPERROR_ALLOWED_CODES'),
      },
      stats
    )
  );
});
