import { Effect, Option } from 'effect';
import { Settings } from '../Config/Settings.service.js';
import type { CrawlRequest } from '../Http/CrawlRequest.js';
import type { CrawlResponse } from '../Http/CrawlResponse.js';
import { withSpiderLogs, type SpiderInfo } from '../Spider/SpiderInfo.js';
import { StatsCollector } from '../Stats/StatsCollector.service.js';
import { getMetaRefresh } from '../utils/MetaRefresh.js';
import { UrlUtils } from '../utils/UrlUtils.js';
import {
  MiddlewareOutcome,
  type DownloaderMiddleware,
  type ResponseOutcome,
} from './types.js';

/**
 * Redirect budget shared by the HTTP and meta-refresh policies.
 *
 * @group Configuration
 * @public
 */
export interface RedirectOptions {
  /** Redirects allowed per task chain (`REDIRECT_MAX_TIMES`) */
  readonly maxRedirectTimes: number;
  /** Added to the priority of every redirected request */
  readonly priorityAdjust: number;
}

export interface MetaRefreshOptions extends RedirectOptions {
  /** Elements whose meta-refresh directives are never honoured */
  readonly ignoreTags: readonly string[];
  /** Refreshes delayed this many seconds or more are left alone */
  readonly maxDelay: number;
}

export const MAX_REDIRECTIONS_REACHED = 'max redirections reached';

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);
const METHOD_PRESERVING_STATUSES: ReadonlySet<number> = new Set([301, 307, 308]);

/**
 * Stamp `candidate` as the next generation of `original`'s redirect chain,
 * or abandon the task once the chain's budget is spent.
 *
 * The chain continues only while the remaining TTL is non-zero and the
 * redirect count stays within `maxRedirectTimes`; a request-level
 * `redirectTtl` can therefore shorten the budget but never extend it.
 */
export const makeRedirector =
  (options: RedirectOptions, stats: StatsCollector) =>
  (
    candidate: CrawlRequest,
    original: CrawlRequest,
    reason: string | number,
    spider: SpiderInfo
  ): Effect.Effect<ResponseOutcome> =>
    Effect.gen(function* () {
      const ttl = original.meta.redirectTtl ?? options.maxRedirectTimes;
      const redirects = (original.meta.redirectTimes ?? 0) + 1;

      if (ttl !== 0 && redirects <= options.maxRedirectTimes) {
        const redirected = candidate
          .replace({
            dontFilter: original.dontFilter,
            priority: original.priority + options.priorityAdjust,
          })
          .withMeta({
            redirectTimes: redirects,
            redirectTtl: ttl - 1,
            redirectUrls: [...(original.meta.redirectUrls ?? []), original.url],
            redirectReasons: [...(original.meta.redirectReasons ?? []), reason],
          });
        yield* Effect.logDebug(
          `Redirecting (${reason}) to ${redirected} from ${original}`
        );
        return MiddlewareOutcome.Reschedule({ request: redirected });
      }

      yield* Effect.logDebug(`Discarding ${original}: ${MAX_REDIRECTIONS_REACHED}`);
      yield* stats.increment('redirect/max_reached');
      return MiddlewareOutcome.Abort({
        request: original,
        reason: MAX_REDIRECTIONS_REACHED,
      });
    }).pipe(withSpiderLogs(spider));

/**
 * Rebuild `request` as a body-less GET to `url`.
 */
export const redirectUsingGet = (request: CrawlRequest, url: string): CrawlRequest =>
  request.replace({
    url,
    method: 'GET',
    body: '',
    headers: request.headers.delete('Content-Type').delete('Content-Length'),
  });

const isHandledStatus = (
  request: CrawlRequest,
  response: CrawlResponse,
  spider: SpiderInfo
): boolean =>
  (spider.handleHttpStatusList ?? []).includes(response.status) ||
  (request.meta.handleHttpStatusList ?? []).includes(response.status) ||
  request.meta.handleHttpStatusAll === true;

/**
 * Follows HTTP 3xx redirects.
 *
 * 301, 307 and 308 (and any redirect of a HEAD request) keep the method and
 * body; 302 and 303 are followed as a GET without a body.
 *
 * @example
 * ```typescript
 * const middleware = makeRedirectMiddleware(
 *   { maxRedirectTimes: 20, priorityAdjust: 2 },
 *   stats
 * );
 * ```
 *
 * @group Middleware
 * @public
 */
export const makeRedirectMiddleware = (
  options: RedirectOptions,
  stats: StatsCollector
): DownloaderMiddleware => {
  const redirect = makeRedirector(options, stats);

  return {
    name: 'redirect',

    processResponse: (request, response, spider) => {
      const passThrough = Effect.succeed(MiddlewareOutcome.Respond({ response }));

      if (request.meta.dontRedirect || isHandledStatus(request, response, spider)) {
        return passThrough;
      }

      const location = response.headers.get('Location');
      if (Option.isNone(location) || !REDIRECT_STATUSES.has(response.status)) {
        return passThrough;
      }

      return Option.match(UrlUtils.resolve(location.value, request.url), {
        onNone: () =>
          Effect.logDebug(
            `Ignoring unresolvable Location ${JSON.stringify(location.value)} in ${response}`
          ).pipe(Effect.zipRight(passThrough), withSpiderLogs(spider)),
        onSome: (redirectedUrl) => {
          const redirected =
            METHOD_PRESERVING_STATUSES.has(response.status) || request.method === 'HEAD'
              ? request.replace({ url: redirectedUrl })
              : redirectUsingGet(request, redirectedUrl);
          return redirect(redirected, request, response.status, spider);
        },
      });
    },
  };
};

/**
 * Follows `<meta http-equiv="refresh">` directives of HTML responses.
 *
 * @group Middleware
 * @public
 */
export const makeMetaRefreshMiddleware = (
  options: MetaRefreshOptions,
  stats: StatsCollector
): DownloaderMiddleware => {
  const redirect = makeRedirector(options, stats);

  return {
    name: 'metaRefresh',

    processResponse: (request, response, spider) => {
      const passThrough = Effect.succeed(MiddlewareOutcome.Respond({ response }));

      if (request.meta.dontRedirect || request.method === 'HEAD' || !response.isHtml) {
        return passThrough;
      }

      const refresh = getMetaRefresh(response.text, response.url, options.ignoreTags);
      if (Option.isSome(refresh) && refresh.value.interval < options.maxDelay) {
        return redirect(
          redirectUsingGet(request, refresh.value.url),
          request,
          'meta refresh',
          spider
        );
      }
      return passThrough;
    },
  };
};

/**
 * Build the HTTP redirect middleware from settings, or none when
 * `REDIRECT_ENABLED` is off.
 */
export const redirectMiddlewareFromSettings = Effect.gen(function* () {
  const settings = yield* Settings;
  const stats = yield* StatsCollector;

  if (!(yield* settings.getBool('REDIRECT_ENABLED'))) {
    return Option.none<DownloaderMiddleware>();
  }

  return Option.some(
    makeRedirectMiddleware(
      {
        maxRedirectTimes: yield* settings.getInt('REDIRECT_MAX_TIMES'),
        priorityAdjust: yield* settings.getInt('REDIRECT_PRIORITY_ADJUST'),
      },
      stats
    )
  );
});

/**
 * Build the meta-refresh middleware from settings, or none when
 * `METAREFRESH_ENABLED` is off.
 */
export const metaRefreshMiddlewareFromSettings = Effect.gen(function* () {
  const settings = yield* Settings;
  const stats = yield* StatsCollector;

  if (!(yield* settings.getBool('METAREFRESH_ENABLED'))) {
    return Option.none<DownloaderMiddleware>();
  }

  const ignoreTags = yield* settings.getList('METAREFRESH_IGNORE_TAGS');
  const fallbackDelay = yield* settings.getInt('METAREFRESH_MAXDELAY');

  return Option.some(
    makeMetaRefreshMiddleware(
      {
        maxRedirectTimes: yield* settings.getInt('REDIRECT_MAX_TIMES'),
        priorityAdjust: yield* settings.getInt('REDIRECT_PRIORITY_ADJUST'),
        ignoreTags: ignoreTags.map((tag) => String(tag).trim()).filter(Boolean),
        maxDelay: yield* settings.getInt('REDIRECT_MAX_METAREFRESH_DELAY', fallbackDelay),
      },
      stats
    )
  );
});
