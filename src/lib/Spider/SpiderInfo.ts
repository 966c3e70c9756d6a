import { Effect } from 'effect';

/**
 * What the middlewares need to know about the spider driving a request.
 *
 * @group Interfaces
 * @public
 */
export interface SpiderInfo {
  /** Identity tag attached to every log line */
  readonly name: string;
  /** Non-2xx statuses this spider handles itself */
  readonly handleHttpStatusList?: readonly number[];
}

/**
 * Tag the logs of `effect` with the spider's name.
 */
export const withSpiderLogs =
  (spider: SpiderInfo) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, 'spider', spider.name);
