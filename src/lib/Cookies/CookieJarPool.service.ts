/**
 * Cookie Jar Pool Service
 * Keeps one cookie jar per session key for the lifetime of a crawl
 */

import { Data, Effect, MutableHashMap, Option } from 'effect';
import { CookieJar } from 'tough-cookie';

export class CookieJarError extends Data.TaggedError('CookieJarError')<{
  readonly operation: 'store' | 'read';
  readonly url: string;
  readonly cause?: unknown;
}> {
  get message(): string {
    return `Failed to ${this.operation} cookies for ${this.url}: ${this.cause}`;
  }
}

interface JarEntry {
  readonly jar: CookieJar;
  // tough-cookie's jar is not safe under interleaved async updates
  readonly lock: Effect.Semaphore;
}

const DEFAULT_JAR = Symbol.for('@crawlguard/default-jar');

const jarKey = (key: unknown): unknown =>
  key === undefined || key === null ? DEFAULT_JAR : key;

/**
 * Cookie jars keyed by an opaque session key.
 *
 * A request without a key uses the default jar. Jars are created on first
 * use and never shared between keys; keys compare with `Equal`, so strings
 * and numbers select the same jar every time.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const pool = yield* CookieJarPool;
 *   yield* pool.setCookie('session-a', 'sid=1', 'https://example.com/');
 *   return yield* pool.getCookieHeader('session-a', 'https://example.com/');
 *   // Option.some('sid=1')
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class CookieJarPool extends Effect.Service<CookieJarPool>()(
  '@crawlguard/CookieJarPool',
  {
    effect: Effect.sync(() => {
      const jars = MutableHashMap.empty<unknown, JarEntry>();

      const entryFor = (key: unknown) =>
        Effect.sync(() => {
          const id = jarKey(key);
          return Option.getOrElse(MutableHashMap.get(jars, id), () => {
            const entry: JarEntry = {
              jar: new CookieJar(),
              lock: Effect.unsafeMakeSemaphore(1),
            };
            MutableHashMap.set(jars, id, entry);
            return entry;
          });
        });

      return {
        /**
         * Store a `Set-Cookie` value received from `url`. Succeeds with
         * `false` when the jar rejects the cookie (bad domain, malformed).
         */
        setCookie: (key: unknown, cookie: string, url: string) =>
          Effect.gen(function* () {
            const { jar, lock } = yield* entryFor(key);
            const stored = yield* lock.withPermits(1)(
              Effect.tryPromise({
                try: () => jar.setCookie(cookie, url, { ignoreError: true }),
                catch: (cause) => new CookieJarError({ operation: 'store', url, cause }),
              })
            );
            return stored !== undefined;
          }),

        /**
         * The `Cookie` header value the jar selects for `url`, if any.
         */
        getCookieHeader: (key: unknown, url: string) =>
          Effect.gen(function* () {
            const { jar, lock } = yield* entryFor(key);
            const header = yield* lock.withPermits(1)(
              Effect.tryPromise({
                try: () => jar.getCookieString(url),
                catch: (cause) => new CookieJarError({ operation: 'read', url, cause }),
              })
            );
            return header === '' ? Option.none<string>() : Option.some(header);
          }),

        jarCount: () => Effect.sync(() => MutableHashMap.size(jars)),
      };
    }),
  }
) {}
