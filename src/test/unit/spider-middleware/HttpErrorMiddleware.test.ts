/**
 * HttpError Middleware Tests
 * Filtering of unsuccessful responses before the spider callbacks
 */

import { describe, expect, it } from 'vitest';
import { Effect, Either, Option } from 'effect';
import { HttpError } from '../../../lib/errors.js';
import type { CrawlResponse } from '../../../lib/Http/CrawlResponse.js';
import type { RequestMeta } from '../../../lib/Http/RequestMeta.js';
import type { SpiderInfo } from '../../../lib/Spider/SpiderInfo.js';
import {
  httpErrorMiddlewareFromSettings,
  makeHttpErrorMiddleware,
  type HttpErrorOptions,
} from '../../../lib/SpiderMiddleware/HttpErrorMiddleware.js';
import { SpiderMiddlewareManager } from '../../../lib/SpiderMiddleware/SpiderMiddlewareManager.service.js';
import type { SpiderMiddleware } from '../../../lib/SpiderMiddleware/types.js';
import { StatsCollector } from '../../../lib/Stats/StatsCollector.service.js';
import {
  makeRequest,
  makeResponse,
  runEffect,
  runEffectEither,
  testSpider,
} from '../../utils/test-helpers.js';

const DEFAULTS: HttpErrorOptions = { allowAll: false, allowedCodes: [] };

const filter = (
  response: CrawlResponse,
  options: HttpErrorOptions = DEFAULTS,
  spider: SpiderInfo = testSpider
) =>
  Effect.gen(function* () {
    const manager = yield* SpiderMiddlewareManager;
    const stats = yield* StatsCollector;
    const outcome = yield* manager.processInput(response, spider, [
      makeHttpErrorMiddleware(options, stats),
    ]);
    return { outcome: outcome._tag, stats: yield* stats.getStats() };
  });

const responseWith = (status: number, meta: RequestMeta = {}) =>
  makeResponse({ request: makeRequest({ meta }), status });

describe('HttpErrorMiddleware', () => {
  it('should deliver successful responses', async () => {
    for (const status of [200, 201, 204, 299]) {
      expect(await runEffect(filter(responseWith(status)))).toEqual({
        outcome: 'Deliver',
        stats: {},
      });
    }
  });

  it('should treat every 2xx status as success', async () => {
    expect(await runEffect(filter(responseWith(250)))).toEqual({
      outcome: 'Deliver',
      stats: {},
    });
  });

  it('should drop an unsuccessful response and count it exactly once', async () => {
    expect(await runEffect(filter(responseWith(404)))).toEqual({
      outcome: 'Drop',
      stats: {
        'httperror/response_ignored_count': 1,
        'httperror/response_ignored_status_count/404': 1,
      },
    });
  });

  it('should count each status separately', async () => {
    const stats = await runEffect(
      Effect.gen(function* () {
        yield* filter(responseWith(404));
        yield* filter(responseWith(500));
        yield* filter(responseWith(404));
        const collector = yield* StatsCollector;
        return yield* collector.getStats();
      })
    );
    expect(stats).toEqual({
      'httperror/response_ignored_count': 3,
      'httperror/response_ignored_status_count/404': 2,
      'httperror/response_ignored_status_count/500': 1,
    });
  });

  describe('allow-list precedence', () => {
    it('should deliver everything when the request handles every status', async () => {
      const { outcome } = await runEffect(filter(responseWith(503, { handleHttpStatusAll: true })));
      expect(outcome).toBe('Deliver');
    });

    it('should treat the presence of handleHttpStatusAll as handling every status', async () => {
      const { outcome } = await runEffect(
        filter(responseWith(404, { handleHttpStatusAll: false, handleHttpStatusList: [500] }))
      );
      expect(outcome).toBe('Deliver');
    });

    it('should prefer the request list over the allow-all setting', async () => {
      const options = { allowAll: true, allowedCodes: [] };
      expect(
        (await runEffect(filter(responseWith(404, { handleHttpStatusList: [404] }), options)))
          .outcome
      ).toBe('Deliver');
      expect(
        (await runEffect(filter(responseWith(500, { handleHttpStatusList: [404] }), options)))
          .outcome
      ).toBe('Drop');
    });

    it('should deliver everything when allow-all is set', async () => {
      const { outcome } = await runEffect(
        filter(responseWith(500), { allowAll: true, allowedCodes: [] })
      );
      expect(outcome).toBe('Deliver');
    });

    it('should prefer the spider list over the configured codes', async () => {
      const spider = { name: 'lenient', handleHttpStatusList: [410] };
      const options = { allowAll: false, allowedCodes: [404] };
      expect((await runEffect(filter(responseWith(410), options, spider))).outcome).toBe(
        'Deliver'
      );
      expect((await runEffect(filter(responseWith(404), options, spider))).outcome).toBe('Drop');
    });

    it('should fall back to the configured codes', async () => {
      const options = { allowAll: false, allowedCodes: [404] };
      expect((await runEffect(filter(responseWith(404), options))).outcome).toBe('Deliver');
    });
  });

  describe('hooks', () => {
    it('should fail the input phase with an HttpError', async () => {
      const response = responseWith(403);
      const result = await runEffectEither(
        Effect.gen(function* () {
          const stats = yield* StatsCollector;
          const middleware = makeHttpErrorMiddleware(DEFAULTS, stats);
          if (middleware.processSpiderInput) {
            yield* middleware.processSpiderInput(response, testSpider);
          }
        })
      );
      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(HttpError);
        expect(result.left.message).toBe('Ignoring non-200 response');
      }
    });

    it('should leave other failures to other hooks', async () => {
      const handled = await runEffect(
        Effect.gen(function* () {
          const stats = yield* StatsCollector;
          const middleware = makeHttpErrorMiddleware(DEFAULTS, stats);
          return middleware.processSpiderException
            ? yield* middleware.processSpiderException(
                responseWith(200),
                new Error('callback failed'),
                testSpider
              )
            : Option.some([]);
        })
      );
      expect(handled).toEqual(Option.none());
    });
  });

  it('should read its options from settings', async () => {
    const outcome = await runEffect(
      Effect.gen(function* () {
        const middleware = yield* httpErrorMiddlewareFromSettings;
        const manager = yield* SpiderMiddlewareManager;
        return (yield* manager.processInput(responseWith(404), testSpider, Option.toArray(middleware)))
          ._tag;
      }),
      { HTTPERROR_ALLOWED_CODES: [404] }
    );
    expect(outcome).toBe('Deliver');
  });
});

describe('SpiderMiddlewareManager', () => {
  it('should run the status filter by default', async () => {
    const result = await runEffect(
      Effect.gen(function* () {
        const manager = yield* SpiderMiddlewareManager;
        const outcome = yield* manager.processInput(responseWith(404), testSpider);
        return { names: manager.names, outcome: outcome._tag };
      })
    );
    expect(result).toEqual({ names: ['httpError'], outcome: 'Drop' });
  });

  it('should propagate a failure no hook handles', async () => {
    const error = new Error('rejected');
    const rejecting: SpiderMiddleware = {
      name: 'rejecting',
      processSpiderInput: () => Effect.fail(error),
    };
    const result = await runEffectEither(
      Effect.gen(function* () {
        const manager = yield* SpiderMiddlewareManager;
        return yield* manager.processInput(responseWith(200), testSpider, [rejecting]);
      })
    );
    expect(result).toEqual(Either.left(error));
  });

  it('should stop at the first hook that handles the failure', async () => {
    const calls: string[] = [];
    const recorder = (name: string, handles: boolean): SpiderMiddleware => ({
      name,
      processSpiderException: () =>
        Effect.sync(() => {
          calls.push(name);
          return handles ? Option.some([]) : Option.none();
        }),
    });
    const rejecting: SpiderMiddleware = {
      name: 'rejecting',
      processSpiderInput: () => Effect.fail(new Error('rejected')),
    };

    const outcome = await runEffect(
      Effect.gen(function* () {
        const manager = yield* SpiderMiddlewareManager;
        return yield* manager.processInput(responseWith(200), testSpider, [
          recorder('first', true),
          recorder('second', true),
          rejecting,
          recorder('last', false),
        ]);
      })
    );
    expect(outcome._tag).toBe('Drop');
    expect(calls).toEqual(['last', 'second']);
  });
});
