import { Effect, MutableHashMap, Option } from 'effect';

/**
 * Crawl-wide counters.
 *
 * One collector is shared by every middleware and every in-flight request.
 * Each update is a single synchronous step, so concurrent fibers never
 * interleave inside a read-modify-write.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const stats = yield* StatsCollector;
 *   yield* stats.increment('retry/count');
 *   return yield* stats.getValue('retry/count'); // Option.some(1)
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class StatsCollector extends Effect.Service<StatsCollector>()(
  '@crawlguard/StatsCollector',
  {
    effect: Effect.sync(() => {
      const stats = MutableHashMap.empty<string, number>();

      return {
        increment: (key: string, count = 1) =>
          Effect.sync(() => {
            const current = Option.getOrElse(
              MutableHashMap.get(stats, key),
              () => 0
            );
            MutableHashMap.set(stats, key, current + count);
          }),

        setValue: (key: string, value: number) =>
          Effect.sync(() => {
            MutableHashMap.set(stats, key, value);
          }),

        getValue: (key: string) =>
          Effect.sync(() => MutableHashMap.get(stats, key)),

        getStats: () =>
          Effect.sync(
            (): Record<string, number> => Object.fromEntries(Array.from(stats))
          ),
      };
    }),
  }
) {}
