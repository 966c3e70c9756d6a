/**
 * Annotation bag carried by a request through its redirect/retry generations.
 *
 * The well-known keys form the protocol the downloader middlewares use to
 * talk to each other and to spider code. Any other key may be used to carry
 * extension data. A derived request receives a shallow copy of its parent's
 * meta; history arrays are replaced, never pushed into.
 *
 * @group Data Types
 * @public
 */
export interface RequestMeta {
  /** Skip cookie injection and extraction for this request */
  readonly dontMergeCookies?: boolean;
  /** Selects the cookie jar; absent selects the default jar */
  readonly cookieJar?: unknown;
  /** Disable redirect handling */
  readonly dontRedirect?: boolean;
  /** Treat every status as success */
  readonly handleHttpStatusAll?: boolean;
  /** Additional statuses treated as success */
  readonly handleHttpStatusList?: readonly number[];
  /** Remaining redirects allowed for this task chain */
  readonly redirectTtl?: number;
  /** Redirects already followed */
  readonly redirectTimes?: number;
  /** URLs visited before the current one, oldest first */
  readonly redirectUrls?: readonly string[];
  /** Why each redirect in `redirectUrls` happened */
  readonly redirectReasons?: readonly (string | number)[];
  /** Disable retry handling */
  readonly dontRetry?: boolean;
  /** Retries already attempted */
  readonly retryTimes?: number;
  /** Per-request override of the retry budget */
  readonly maxRetryTimes?: number;
  readonly [key: string]: unknown;
}

export const emptyMeta: RequestMeta = Object.freeze({});
