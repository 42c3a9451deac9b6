import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { createLogger, type Logger } from '../utils/logger';
import { PermanentError, TransientError, errorMessage } from '../utils/errors';
import { RateLimiter } from '../utils/rateLimiter';
import { ResponseCache } from '../utils/responseCache';
import { RetryPolicy } from '../utils/retryPolicy';

export type HttpMethod = 'GET' | 'POST';
export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface ClientOptions {
  /** Label used in logs and error messages, e.g. "ninja". */
  name: string;
  baseURL: string;
  requestsPerSecond: number;
  cacheTtlSeconds: number;
  maxCacheEntries: number;
  maxRetries: number;
  timeoutMs?: number;
  userAgent?: string;
  backoffBaseMs?: number;
  maxBackoffMs?: number;
  /** Replaces the network layer; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export interface RequestOptions {
  body?: unknown;
  /** Defaults to true for GET and false for POST. */
  cache?: boolean;
}

export interface ClientStats {
  networkRequests: number;
  cacheHits: number;
  retries: number;
  cacheEntries: number;
  cacheEvictions: number;
}

const NON_RETRYABLE_CODES = new Set(['ENOTFOUND', 'EACCES', 'EPERM', 'ERR_INVALID_URL']);

/**
 * HTTP executor for one external service: paced by its own rate limiter,
 * answered from its own bounded TTL cache when possible, and retried with
 * exponential backoff on transient failures.
 */
export class RateLimitedCachingClient {
  readonly name: string;
  private readonly http: AxiosInstance;
  private readonly limiter: RateLimiter;
  private readonly cache: ResponseCache;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<unknown>>();
  private networkRequests = 0;
  private cacheHits = 0;
  private retries = 0;

  constructor(options: ClientOptions) {
    this.name = options.name;
    this.logger = options.logger ?? createLogger(`http-${options.name}`);

    this.http = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs ?? 10000,
      headers: {
        'User-Agent': options.userAgent ?? 'league-price-resolver/1.0',
        Accept: 'application/json',
      },
      adapter: options.adapter,
    });

    this.limiter = new RateLimiter(options.requestsPerSecond, this.logger);
    this.cache = new ResponseCache({
      ttlSeconds: options.cacheTtlSeconds,
      maxEntries: options.maxCacheEntries,
      logger: this.logger,
    });
    this.retryPolicy = new RetryPolicy({
      maxRetries: options.maxRetries,
      initialDelay: options.backoffBaseMs ?? 1000,
      maxDelay: options.maxBackoffMs ?? 30000,
      logger: this.logger,
      onRetry: () => {
        this.retries++;
      },
    });

    this.logger.info(
      {
        baseURL: options.baseURL,
        requestsPerSecond: options.requestsPerSecond,
        cacheTtlSeconds: options.cacheTtlSeconds,
        maxCacheEntries: options.maxCacheEntries,
        maxRetries: options.maxRetries,
      },
      `Initialized ${options.name} client`
    );
  }

  get(path: string, params?: QueryParams): Promise<unknown> {
    return this.request('GET', path, params);
  }

  post(path: string, body: unknown, params?: QueryParams): Promise<unknown> {
    return this.request('POST', path, params, { body });
  }

  /**
   * Issue a request, answering from cache when a live entry exists.
   * Resolves with the parsed JSON body, which callers validate; rejects
   * with PermanentError.
   */
  async request(
    method: HttpMethod,
    path: string,
    params: QueryParams = {},
    options: RequestOptions = {}
  ): Promise<unknown> {
    const useCache = options.cache ?? method === 'GET';
    const key = RateLimitedCachingClient.cacheKey(method, path, params, options.body);

    if (useCache) {
      const cached = this.cache.get(key);
      if (cached !== undefined) {
        this.cacheHits++;
        this.logger.debug({ key }, 'Cache hit');
        return cached;
      }

      const pending = this.inFlight.get(key);
      if (pending) {
        this.logger.debug({ key }, 'Joining in-flight request');
        return pending;
      }
    }

    const execution = this.retryPolicy.execute(
      async attempt => {
        await this.limiter.acquire();
        this.networkRequests++;
        this.logger.debug({ method, path, params, attempt }, 'Sending request');
        return this.send(method, path, params, options.body);
      },
      `${this.name} ${method} ${path}`
    );

    if (!useCache) {
      return execution;
    }

    this.inFlight.set(key, execution);
    try {
      const data = await execution;
      this.cache.set(key, data);
      return data;
    } finally {
      this.inFlight.delete(key);
    }
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.info('Cache cleared');
  }

  getStats(): ClientStats {
    const cache = this.cache.getStats();
    return {
      networkRequests: this.networkRequests,
      cacheHits: this.cacheHits,
      retries: this.retries,
      cacheEntries: cache.entries,
      cacheEvictions: cache.evictions,
    };
  }

  static cacheKey(method: HttpMethod, path: string, params: QueryParams = {}, body?: unknown): string {
    const query = Object.keys(params)
      .filter(name => params[name] !== undefined)
      .sort()
      .map(name => `${name}=${String(params[name])}`)
      .join('&');
    const bodyPart = body === undefined ? '' : ` ${JSON.stringify(body)}`;

    return `${method} ${path}?${query}${bodyPart}`;
  }

  private async send(method: HttpMethod, path: string, params: QueryParams, body: unknown): Promise<unknown> {
    let response: AxiosResponse<unknown>;

    try {
      response = await this.http.request<unknown>({
        method,
        url: path,
        params: definedParams(params),
        data: body,
        responseType: 'text',
      });
    } catch (error) {
      throw classifyHttpError(error, `${this.name} ${method} ${path}`);
    }

    return parseBody(response.data, `${this.name} ${method} ${path}`);
  }
}

function definedParams(params: QueryParams): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined) {
      result[name] = value;
    }
  }
  return result;
}

function parseBody(data: unknown, context: string): unknown {
  if (typeof data !== 'string') {
    return data;
  }

  try {
    return JSON.parse(data);
  } catch (error) {
    throw new PermanentError(`${context}: malformed response body`, {
      cause: error,
      code: 'MALFORMED_RESPONSE',
    });
  }
}

/**
 * Parse a Retry-After header given either as delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.max(0, value * 1000);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Map an axios failure onto the retry taxonomy: 429, 5xx and connection
 * level failures are transient, everything else is permanent.
 */
export function classifyHttpError(error: unknown, context: string): TransientError | PermanentError {
  if (!axios.isAxiosError(error)) {
    return new PermanentError(`${context}: ${errorMessage(error)}`, { cause: error });
  }

  const status = error.response?.status;

  if (status !== undefined) {
    if (status === 429) {
      return new TransientError(`${context}: rate limited (429)`, {
        status,
        retryAfterMs: parseRetryAfter(error.response?.headers['retry-after']),
        cause: error,
      });
    }
    if (status >= 500) {
      return new TransientError(`${context}: server error (${status})`, { status, cause: error });
    }
    return new PermanentError(`${context}: request rejected (${status})`, {
      status,
      cause: error,
      code: status === 404 ? 'NOT_FOUND' : 'CLIENT_ERROR',
    });
  }

  if (error.code && NON_RETRYABLE_CODES.has(error.code)) {
    return new PermanentError(`${context}: ${error.message}`, { cause: error, code: error.code });
  }

  return new TransientError(`${context}: ${error.code ?? 'network error'} ${error.message}`.trim(), {
    cause: error,
  });
}
