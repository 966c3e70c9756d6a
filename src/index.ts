// Request/response model
export {
  CrawlRequest,
  type CrawlRequestInit,
  type RequestCookie,
  type RequestCookies,
} from './lib/Http/CrawlRequest.js';
export { CrawlResponse, type CrawlResponseInit } from './lib/Http/CrawlResponse.js';
export { HttpHeaders, type HeaderInit } from './lib/Http/HttpHeaders.js';
export type { RequestMeta } from './lib/Http/RequestMeta.js';
export { isSuccessStatus, responseStatusMessage } from './lib/Http/status.js';

// Configuration, logging and stats
export {
  Settings,
  makeSettings,
  type SettingsService,
  type SettingsValues,
} from './lib/Config/Settings.service.js';
export { DEFAULT_SETTINGS } from './lib/Config/Settings.defaults.js';
export { LoggingLive, makeLoggingLayer, parseLogLevel } from './lib/Logging/CrawlLogging.js';
export { StatsCollector } from './lib/Stats/StatsCollector.service.js';
export { withSpiderLogs, type SpiderInfo } from './lib/Spider/SpiderInfo.js';

// Errors
export * from './lib/errors.js';

// Downloader middlewares
export {
  MiddlewareOutcome,
  type DownloaderMiddleware,
  type ExceptionOutcome,
  type RequestOutcome,
  type ResponseOutcome,
  type Transport,
} from './lib/Middleware/types.js';
export {
  DownloaderPipeline,
  type ExceptionResolution,
  type RequestResolution,
} from './lib/Middleware/DownloaderPipeline.service.js';
export {
  DOWNLOADER_COMPONENTS,
  SPIDER_COMPONENTS,
  buildDownloaderChain,
  buildMiddlewareList,
  buildSpiderChain,
  type DownloaderComponents,
  type DownloaderFactory,
  type MiddlewareFactory,
  type SpiderComponents,
  type SpiderFactory,
} from './lib/Middleware/registry.js';
export {
  MAX_REDIRECTIONS_REACHED,
  makeMetaRefreshMiddleware,
  makeRedirectMiddleware,
  metaRefreshMiddlewareFromSettings,
  redirectMiddlewareFromSettings,
  type MetaRefreshOptions,
  type RedirectOptions,
} from './lib/Middleware/RedirectMiddleware.js';
export {
  isTransientFailure,
  makeRetryMiddleware,
  retryMiddlewareFromSettings,
  type RetryOptions,
} from './lib/Middleware/RetryMiddleware.js';
export {
  cookiesMiddlewareFromSettings,
  makeCookiesMiddleware,
  type CookiesOptions,
} from './lib/Middleware/CookiesMiddleware.js';
export { CookieJarError, CookieJarPool } from './lib/Cookies/CookieJarPool.service.js';
export { getMetaRefresh, type MetaRefresh } from './lib/utils/MetaRefresh.js';

// Spider middlewares
export {
  SpiderInputOutcome,
  type SpiderMiddleware,
} from './lib/SpiderMiddleware/types.js';
export {
  httpErrorMiddlewareFromSettings,
  makeHttpErrorMiddleware,
  type HttpErrorOptions,
} from './lib/SpiderMiddleware/HttpErrorMiddleware.js';
export { SpiderMiddlewareManager } from './lib/SpiderMiddleware/SpiderMiddlewareManager.service.js';
