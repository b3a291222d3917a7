import { request } from 'undici';
import { err, ok, type LookupError, type Result, type SourceName } from '../types/common.js';
import type { ComponentLogger, Logger } from './logger.js';
import { RateLimiter } from './rate-limiter.js';
import { recordSourceRequest } from './telemetry.js';

export const USER_AGENT = 'metabolite-classifier/1.0';

const MAX_REDIRECTIONS = 5;

const TIMEOUT_CODES = new Set([
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export interface HttpResponse {
  status: number;
  data: string;
  headers: Record<string, string>;
}

export interface HttpClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  timeout?: number;
}

export interface GetOptions {
  params?: Record<string, string | number | boolean | undefined>;
  headers?: Record<string, string>;
  timeout?: number;
}

/**
 * Sequential, rate-limited GET client for one upstream source.
 * Never throws: transport failures, deadline breaches and non-2xx statuses
 * come back as typed errors.
 */
export class HttpClient {
  private baseUrl: string;
  private headers: Record<string, string>;
  private timeout: number;
  private logger: ComponentLogger;
  private rateLimiter: RateLimiter;
  private source: SourceName;

  constructor(
    source: SourceName,
    options: HttpClientOptions,
    logger: Logger,
    rateLimiter: RateLimiter
  ) {
    this.source = source;
    this.baseUrl = options.baseUrl;
    this.headers = options.headers ?? {};
    this.timeout = options.timeout ?? 15000;
    this.logger = logger.child('http');
    this.rateLimiter = rateLimiter;
  }

  async get(path: string, options?: GetOptions): Promise<Result<HttpResponse>> {
    const url = this.buildUrl(path, options?.params);
    const timeout = options?.timeout ?? this.timeout;

    await this.rateLimiter.waitForSlot(this.source);
    const startTime = Date.now();
    // Total deadline; the undici timeouts below only bound idle gaps
    const deadline = AbortSignal.timeout(timeout);

    try {
      const response = await request(url, {
        method: 'GET',
        headers: {
          'User-Agent': USER_AGENT,
          ...this.headers,
          ...options?.headers,
        },
        headersTimeout: timeout,
        bodyTimeout: timeout,
        maxRedirections: MAX_REDIRECTIONS,
        signal: deadline,
      });

      const data = await response.body.text();

      this.logger.debug({
        method: 'GET',
        url,
        status: response.statusCode,
        duration_ms: Date.now() - startTime,
        source: this.source,
      });

      if (response.statusCode < 200 || response.statusCode >= 300) {
        recordSourceRequest(this.source, Date.now() - startTime, 'REQUEST_ERROR');
        return err({
          code: 'REQUEST_ERROR',
          message: `HTTP ${response.statusCode} for ${url}`,
          source: this.source,
          status: response.statusCode,
        });
      }

      recordSourceRequest(this.source, Date.now() - startTime, 'ok');
      return ok({
        status: response.statusCode,
        data,
        headers: flattenHeaders(response.headers),
      });
    } catch (error) {
      const lookupError = this.toLookupError(error, url, timeout, deadline.aborted);
      recordSourceRequest(this.source, Date.now() - startTime, lookupError.code);

      this.logger.error({
        action: 'request_failed',
        method: 'GET',
        url,
        code: lookupError.code,
        error: lookupError.message,
        source: this.source,
      });

      return err(lookupError);
    } finally {
      this.rateLimiter.recordRequest(this.source);
    }
  }

  private buildUrl(
    path: string,
    params?: Record<string, string | number | boolean | undefined>
  ): string {
    const url = new URL(path, this.baseUrl);

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  private toLookupError(
    error: unknown,
    url: string,
    timeout: number,
    deadlinePassed: boolean
  ): LookupError {
    if (deadlinePassed || isTimeoutError(error)) {
      return {
        code: 'TIMEOUT',
        message: `Request to ${url} timed out after ${timeout}ms`,
        source: this.source,
      };
    }

    return {
      code: 'REQUEST_ERROR',
      message: error instanceof Error ? error.message : String(error),
      source: this.source,
    };
  }
}

function isTimeoutError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  if ('name' in error && error.name === 'TimeoutError') {
    return true;
  }
  return 'code' in error && typeof error.code === 'string' && TIMEOUT_CODES.has(error.code);
}

function flattenHeaders(
  raw: Record<string, string | string[] | undefined>
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      headers[key] = value;
    } else if (Array.isArray(value)) {
      headers[key] = value.join(', ');
    }
  }
  return headers;
}
