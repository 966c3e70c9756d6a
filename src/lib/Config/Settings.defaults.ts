/**
 * Default settings.
 * Every middleware reads its configuration from these keys; callers
 * override them through `Settings.Live`.
 */
export const DEFAULT_SETTINGS = Object.freeze({
  COOKIES_ENABLED: true,
  /** Log outgoing Cookie and incoming Set-Cookie headers verbatim */
  COOKIES_DEBUG: false,

  /**
   * Downloader middlewares enabled out of the box. Lower orders run first
   * on the request phase and last on the response phase.
   */
  DOWNLOADER_MIDDLEWARES_BASE: Object.freeze({
    retry: 550,
    metaRefresh: 580,
    redirect: 600,
    cookies: 700,
  }),
  /** User orders, merged over the base table; `null` disables an entry */
  DOWNLOADER_MIDDLEWARES: Object.freeze({}),

  HTTPERROR_ALLOW_ALL: false,
  HTTPERROR_ALLOWED_CODES: Object.freeze([]),

  LOG_LEVEL: 'Info',

  METAREFRESH_ENABLED: true,
  METAREFRESH_IGNORE_TAGS: Object.freeze(['script', 'noscript']),
  /** Meta refreshes with a delay at or above this many seconds are ignored */
  METAREFRESH_MAXDELAY: 100,

  REDIRECT_ENABLED: true,
  /** Firefox's default */
  REDIRECT_MAX_TIMES: 20,
  REDIRECT_PRIORITY_ADJUST: 2,

  RETRY_ENABLED: true,
  /** Initial response + 2 retries = 3 requests */
  RETRY_TIMES: 2,
  RETRY_HTTP_CODES: Object.freeze([500, 502, 503, 504, 522, 524, 408, 429]),
  RETRY_PRIORITY_ADJUST: -1,

  SPIDER_MIDDLEWARES_BASE: Object.freeze({
    httpError: 50,
  }),
  SPIDER_MIDDLEWARES: Object.freeze({}),
});
