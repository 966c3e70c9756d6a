import { describe, expect, it } from 'vitest';
import { Effect, Option } from 'effect';
import { StatsCollector } from '../../../lib/Stats/StatsCollector.service.js';

const run = <A>(effect: Effect.Effect<A, never, StatsCollector>) =>
  Effect.runPromise(Effect.provide(effect, StatsCollector.Default));

describe('StatsCollector', () => {
  it('should start counters at zero', async () => {
    const value = await run(
      Effect.gen(function* () {
        const stats = yield* StatsCollector;
        yield* stats.increment('retry/count');
        yield* stats.increment('retry/count', 2);
        return yield* stats.getValue('retry/count');
      })
    );
    expect(value).toEqual(Option.some(3));
  });

  it('should report unknown keys as none', async () => {
    const value = await run(
      Effect.flatMap(StatsCollector, (stats) => stats.getValue('missing'))
    );
    expect(value).toEqual(Option.none());
  });

  it('should keep every concurrent increment', async () => {
    const value = await run(
      Effect.gen(function* () {
        const stats = yield* StatsCollector;
        yield* Effect.forEach(
          Array.from({ length: 50 }, (_, i) => i),
          () => stats.increment('hits'),
          { concurrency: 'unbounded' }
        );
        return yield* stats.getValue('hits');
      })
    );
    expect(value).toEqual(Option.some(50));
  });

  it('should overwrite values and list every counter', async () => {
    const all = await run(
      Effect.gen(function* () {
        const stats = yield* StatsCollector;
        yield* stats.increment('a');
        yield* stats.setValue('b', 10);
        yield* stats.setValue('b', 4);
        return yield* stats.getStats();
      })
    );
    expect(all).toEqual({ a: 1, b: 4 });
  });
});
