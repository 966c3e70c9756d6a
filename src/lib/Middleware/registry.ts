/**
 * Middleware registry
 * Resolves the ordered, enabled middleware chains from settings
 */

import { Effect, Option, Order, pipe, Array as Arr } from 'effect';
import { Settings } from '../Config/Settings.service.js';
import type { CookieJarPool } from '../Cookies/CookieJarPool.service.js';
import { ConfigurationError } from '../errors.js';
import { httpErrorMiddlewareFromSettings } from '../SpiderMiddleware/HttpErrorMiddleware.js';
import type { SpiderMiddleware } from '../SpiderMiddleware/types.js';
import type { StatsCollector } from '../Stats/StatsCollector.service.js';
import { cookiesMiddlewareFromSettings } from './CookiesMiddleware.js';
import {
  metaRefreshMiddlewareFromSettings,
  redirectMiddlewareFromSettings,
} from './RedirectMiddleware.js';
import { retryMiddlewareFromSettings } from './RetryMiddleware.js';
import type { DownloaderMiddleware } from './types.js';

/**
 * Builds one middleware from settings, or reports it as not configured.
 */
export type MiddlewareFactory<M, R> = Effect.Effect<
  Option.Option<M>,
  ConfigurationError,
  R
>;

export type DownloaderFactory = MiddlewareFactory<
  DownloaderMiddleware,
  Settings | StatsCollector | CookieJarPool
>;

export type SpiderFactory = MiddlewareFactory<SpiderMiddleware, Settings | StatsCollector>;

export type DownloaderComponents = ReadonlyMap<string, DownloaderFactory>;

export type SpiderComponents = ReadonlyMap<string, SpiderFactory>;

export const DOWNLOADER_COMPONENTS: DownloaderComponents = new Map<string, DownloaderFactory>([
  ['cookies', cookiesMiddlewareFromSettings],
  ['redirect', redirectMiddlewareFromSettings],
  ['metaRefresh', metaRefreshMiddlewareFromSettings],
  ['retry', retryMiddlewareFromSettings],
]);

export const SPIDER_COMPONENTS: SpiderComponents = new Map<string, SpiderFactory>([
  ['httpError', httpErrorMiddlewareFromSettings],
]);

const byOrderThenName = Order.combine(
  Order.mapInput(Order.number, ([, order]: readonly [string, number]) => order),
  Order.mapInput(Order.string, ([name]: readonly [string, number]) => name)
);

/**
 * Merge user orders over the base table and return the enabled names,
 * lowest order first. A `null` order disables the entry; equal orders fall
 * back to name order.
 *
 * @example
 * ```typescript
 * buildMiddlewareList('DOWNLOADER_MIDDLEWARES', { retry: 550, cookies: 700 }, { retry: null, custom: 10 });
 * // Effect.succeed(['custom', 'cookies'])
 * ```
 */
export const buildMiddlewareList = (
  setting: string,
  base: Readonly<Record<string, unknown>>,
  custom: Readonly<Record<string, unknown>>
): Effect.Effect<string[], ConfigurationError> =>
  Effect.forEach(
    Object.entries({ ...base, ...custom }),
    ([name, order]): Effect.Effect<
      Option.Option<readonly [string, number]>,
      ConfigurationError
    > => {
      if (order === null || order === undefined) {
        return Effect.succeed(Option.none());
      }
      return typeof order === 'number' && Number.isFinite(order)
        ? Effect.succeed(Option.some([name, order] as const))
        : Effect.fail(
            ConfigurationError.invalidSetting(`${setting}.${name}`, 'a number or null', order)
          );
    }
  ).pipe(
    Effect.map((entries) =>
      pipe(
        Arr.getSomes(entries),
        Arr.sort(byOrderThenName),
        Arr.map(([name]) => name)
      )
    )
  );

const buildChain = <M, R>(
  kind: string,
  setting: string,
  components: ReadonlyMap<string, MiddlewareFactory<M, R>>
) =>
  Effect.gen(function* () {
    const settings = yield* Settings;
    const names = yield* buildMiddlewareList(
      setting,
      yield* settings.getDict(`${setting}_BASE`),
      yield* settings.getDict(setting)
    );

    const chain: M[] = [];
    for (const name of names) {
      const factory = components.get(name);
      if (factory === undefined) {
        return yield* Effect.fail(
          new ConfigurationError({
            message: `Unknown ${kind} middleware '${name}' in ${setting}`,
            details: { name, known: [...components.keys()] },
          })
        );
      }
      const middleware = yield* factory;
      if (Option.isSome(middleware)) {
        chain.push(middleware.value);
      } else {
        yield* Effect.logDebug(`Middleware '${name}' is not configured`);
      }
    }
    return chain;
  });

/**
 * Resolve the enabled downloader middlewares from
 * `DOWNLOADER_MIDDLEWARES_BASE` and `DOWNLOADER_MIDDLEWARES`.
 */
export const buildDownloaderChain = (
  components: DownloaderComponents = DOWNLOADER_COMPONENTS
) =>
  buildChain('downloader', 'DOWNLOADER_MIDDLEWARES', components).pipe(
    Effect.tap((chain) =>
      Effect.logInfo(
        `Enabled downloader middlewares: ${JSON.stringify(chain.map((m) => m.name))}`
      )
    )
  );

/**
 * Resolve the enabled spider middlewares from `SPIDER_MIDDLEWARES_BASE`
 * and `SPIDER_MIDDLEWARES`.
 */
export const buildSpiderChain = (components: SpiderComponents = SPIDER_COMPONENTS) =>
  buildChain('spider', 'SPIDER_MIDDLEWARES', components).pipe(
    Effect.tap((chain) =>
      Effect.logInfo(
        `Enabled spider middlewares: ${JSON.stringify(chain.map((m) => m.name))}`
      )
    )
  );
