import { Data } from 'effect';
import type { CrawlResponse } from './Http/CrawlResponse.js';

/**
 * Configuration errors. Raised while the middleware chain is being built,
 * before any request is processed.
 */
export class ConfigurationError extends Data.TaggedError('ConfigurationError')<{
  readonly message: string;
  readonly details?: unknown;
}> {
  static invalidSetting(
    name: string,
    expected: string,
    value: unknown
  ): ConfigurationError {
    return new ConfigurationError({
      message: `Setting '${name}' must be ${expected}, got ${JSON.stringify(value)}`,
      details: { name, value },
    });
  }
}

/**
 * Middleware processing errors
 */
export class MiddlewareError extends Data.TaggedError('MiddlewareError')<{
  readonly phase: 'request' | 'response' | 'exception';
  readonly middlewareName: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static request(middlewareName: string, cause: unknown): MiddlewareError {
    return new MiddlewareError({
      phase: 'request',
      middlewareName,
      cause,
      message: `Middleware '${middlewareName}' failed while processing a request: ${cause}`,
    });
  }

  static response(middlewareName: string, cause: unknown): MiddlewareError {
    return new MiddlewareError({
      phase: 'response',
      middlewareName,
      cause,
      message: `Middleware '${middlewareName}' failed while processing a response: ${cause}`,
    });
  }
}

// ============================================================================
// Transport failures
// ============================================================================

/**
 * The transport gave up waiting for the server.
 */
export class TimeoutError extends Data.TaggedError('TimeoutError')<{
  readonly url: string;
  readonly timeoutMs?: number;
  readonly message: string;
}> {
  static after(url: string, timeoutMs: number): TimeoutError {
    return new TimeoutError({
      url,
      timeoutMs,
      message: `Request to ${url} timed out after ${timeoutMs}ms`,
    });
  }
}

export class DnsLookupError extends Data.TaggedError('DnsLookupError')<{
  readonly url: string;
  readonly hostname: string;
  readonly message: string;
}> {
  static forUrl(url: string): DnsLookupError {
    const hostname = URL.canParse(url) ? new URL(url).hostname : url;
    return new DnsLookupError({
      url,
      hostname,
      message: `DNS lookup failed: no address for ${hostname}`,
    });
  }
}

export class ConnectionRefusedError extends Data.TaggedError('ConnectionRefusedError')<{
  readonly url: string;
  readonly message: string;
}> {
  static forUrl(url: string): ConnectionRefusedError {
    return new ConnectionRefusedError({
      url,
      message: `Connection to ${url} was refused`,
    });
  }
}

export class ConnectionResetError extends Data.TaggedError('ConnectionResetError')<{
  readonly url: string;
  readonly message: string;
}> {
  static forUrl(url: string): ConnectionResetError {
    return new ConnectionResetError({
      url,
      message: `Connection to ${url} was reset by peer`,
    });
  }
}

export class ConnectionLostError extends Data.TaggedError('ConnectionLostError')<{
  readonly url: string;
  readonly message: string;
}> {
  static forUrl(url: string): ConnectionLostError {
    return new ConnectionLostError({
      url,
      message: `Connection to ${url} was lost in a non-clean fashion`,
    });
  }
}

/**
 * A proxy CONNECT tunnel could not be opened.
 */
export class TunnelError extends Data.TaggedError('TunnelError')<{
  readonly url: string;
  readonly proxy: string;
  readonly message: string;
}> {
  static forProxy(url: string, proxy: string, status?: number): TunnelError {
    return new TunnelError({
      url,
      proxy,
      message: `Could not open CONNECT tunnel with proxy ${proxy}${
        status ? ` [status ${status}]` : ''
      }`,
    });
  }
}

/**
 * The response body was truncated or could not be read to completion.
 */
export class ResponseFailedError extends Data.TaggedError('ResponseFailedError')<{
  readonly url: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(url: string, cause: unknown): ResponseFailedError {
    return new ResponseFailedError({
      url,
      cause,
      message: `Response from ${url} failed: ${cause}`,
    });
  }
}

export type TransportError =
  | TimeoutError
  | DnsLookupError
  | ConnectionRefusedError
  | ConnectionResetError
  | ConnectionLostError
  | TunnelError
  | ResponseFailedError;

// ============================================================================
// Spider boundary
// ============================================================================

/**
 * A non-2xx response was filtered before reaching the spider callbacks.
 */
export class HttpError extends Data.TaggedError('HttpError')<{
  readonly response: CrawlResponse;
  readonly message: string;
}> {
  static ignoring(response: CrawlResponse): HttpError {
    return new HttpError({
      response,
      message: 'Ignoring non-200 response',
    });
  }
}

export type CrawlGuardError =
  | ConfigurationError
  | MiddlewareError
  | TransportError
  | HttpError;
