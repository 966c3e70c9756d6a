import { Effect, Option } from 'effect';
import { Settings } from '../Config/Settings.service.js';
import { CookieJarPool } from '../Cookies/CookieJarPool.service.js';
import type { CrawlRequest, RequestCookie } from '../Http/CrawlRequest.js';
import { MiddlewareError } from '../errors.js';
import { withSpiderLogs } from '../Spider/SpiderInfo.js';
import { MiddlewareOutcome, type DownloaderMiddleware } from './types.js';

export interface CookiesOptions {
  /** Log every Cookie sent and Set-Cookie received */
  readonly debug: boolean;
}

/**
 * Normalise the two accepted shapes of `request.cookies` to a list.
 */
export const requestCookieList = (request: CrawlRequest): RequestCookie[] => {
  const { cookies } = request;
  if (Array.isArray(cookies)) {
    return [...cookies];
  }
  return Object.entries(cookies).map(([name, value]) => ({ name, value }));
};

/**
 * Render a request cookie as a `Set-Cookie` value the jar can store.
 */
export const formatRequestCookie = (cookie: RequestCookie): string =>
  [
    `${cookie.name}=${cookie.value}`,
    ...(cookie.domain ? [`Domain=${cookie.domain}`] : []),
    ...(cookie.path ? [`Path=${cookie.path}`] : []),
  ].join('; ');

/**
 * Keeps cookie state per session key.
 *
 * The jar is chosen by `meta.cookieJar` (the default jar when unset).
 * Outgoing requests get the `Cookie` header the jar selects for their URL,
 * after any cookies attached to the request itself have been stored;
 * responses feed their `Set-Cookie` headers back into the same jar.
 * `meta.dontMergeCookies` leaves a request untouched.
 *
 * @group Middleware
 * @public
 */
export const makeCookiesMiddleware = (
  options: CookiesOptions,
  pool: CookieJarPool
): DownloaderMiddleware => ({
  name: 'cookies',

  processRequest: (request, spider) => {
    if (request.meta.dontMergeCookies) {
      return Effect.succeed(MiddlewareOutcome.Continue());
    }

    return Effect.gen(function* () {
      const key = request.meta.cookieJar;

      for (const cookie of requestCookieList(request)) {
        const stored = yield* pool.setCookie(key, formatRequestCookie(cookie), request.url);
        if (!stored) {
          yield* Effect.logDebug(`Rejected cookie '${cookie.name}' attached to ${request}`);
        }
      }

      const header = yield* pool.getCookieHeader(key, request.url);
      const updated = request.replace({
        headers: Option.match(header, {
          onNone: () => request.headers.delete('Cookie'),
          onSome: (value) => request.headers.set('Cookie', value),
        }),
      });

      if (options.debug && Option.isSome(header)) {
        yield* Effect.logDebug(`Sending cookies to: ${updated}\nCookie: ${header.value}`);
      }
      return MiddlewareOutcome.Forward({ request: updated });
    }).pipe(
      Effect.mapError((cause) => MiddlewareError.request('cookies', cause)),
      withSpiderLogs(spider)
    );
  },

  processResponse: (request, response, spider) => {
    const passThrough = MiddlewareOutcome.Respond({ response });
    if (request.meta.dontMergeCookies) {
      return Effect.succeed(passThrough);
    }

    return Effect.gen(function* () {
      const setCookies = response.headers.getAll('Set-Cookie');
      for (const cookie of setCookies) {
        const stored = yield* pool.setCookie(request.meta.cookieJar, cookie, request.url);
        if (!stored) {
          yield* Effect.logDebug(`Ignored invalid Set-Cookie from ${response}`);
        }
      }

      if (options.debug && setCookies.length > 0) {
        yield* Effect.logDebug(
          `Received cookies from: ${response}\n${setCookies
            .map((cookie) => `Set-Cookie: ${cookie}`)
            .join('\n')}`
        );
      }
      return passThrough;
    }).pipe(
      Effect.mapError((cause) => MiddlewareError.response('cookies', cause)),
      withSpiderLogs(spider)
    );
  },
});

/**
 * Build the cookies middleware from settings, or none when
 * `COOKIES_ENABLED` is off.
 */
export const cookiesMiddlewareFromSettings = Effect.gen(function* () {
  const settings = yield* Settings;
  const pool = yield* CookieJarPool;

  if (!(yield* settings.getBool('COOKIES_ENABLED'))) {
    return Option.none<DownloaderMiddleware>();
  }

  return Option.some(
    makeCookiesMiddleware({ debug: yield* settings.getBool('COOKIES_DEBUG') }, pool)
  );
});
