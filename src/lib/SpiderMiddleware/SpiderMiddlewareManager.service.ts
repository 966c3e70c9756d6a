import { Effect, Either, Option } from 'effect';
import type { CrawlResponse } from '../Http/CrawlResponse.js';
import { buildSpiderChain } from '../Middleware/registry.js';
import { withSpiderLogs, type SpiderInfo } from '../Spider/SpiderInfo.js';
import { SpiderInputOutcome, type SpiderMiddleware } from './types.js';

/**
 * Runs downloaded responses through the spider middlewares before the
 * spider callbacks see them.
 *
 * Input hooks run in order. When one fails, exception hooks run in reverse
 * order and the first that handles the failure drops the response; an
 * unhandled failure propagates.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const manager = yield* SpiderMiddlewareManager;
 *   const outcome = yield* manager.processInput(response, { name: 'example' });
 *   return outcome._tag === 'Deliver';
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class SpiderMiddlewareManager extends Effect.Service<SpiderMiddlewareManager>()(
  '@crawlguard/SpiderMiddlewareManager',
  {
    effect: Effect.gen(function* () {
      const chain: readonly SpiderMiddleware[] = yield* buildSpiderChain();

      const processException = (
        response: CrawlResponse,
        error: Error,
        spider: SpiderInfo,
        middlewares: readonly SpiderMiddleware[]
      ): Effect.Effect<Option.Option<readonly unknown[]>> =>
        Effect.gen(function* () {
          for (const middleware of [...middlewares].reverse()) {
            if (!middleware.processSpiderException) {
              continue;
            }
            const handled = yield* middleware.processSpiderException(response, error, spider);
            if (Option.isSome(handled)) {
              return handled;
            }
          }
          return Option.none();
        });

      const processInput = (
        response: CrawlResponse,
        spider: SpiderInfo,
        middlewares: readonly SpiderMiddleware[] = chain
      ): Effect.Effect<SpiderInputOutcome, Error> =>
        Effect.gen(function* () {
          for (const middleware of middlewares) {
            if (!middleware.processSpiderInput) {
              continue;
            }
            const checked = yield* Effect.either(
              middleware.processSpiderInput(response, spider)
            );
            if (Either.isLeft(checked)) {
              const handled = yield* processException(
                response,
                checked.left,
                spider,
                middlewares
              );
              if (Option.isNone(handled)) {
                return yield* Effect.fail(checked.left);
              }
              return SpiderInputOutcome.Drop({ response, error: checked.left });
            }
          }
          return SpiderInputOutcome.Deliver({ response });
        }).pipe(withSpiderLogs(spider));

      return {
        middlewares: chain,
        names: chain.map((middleware) => middleware.name),
        processInput,
      };
    }),
  }
) {}
