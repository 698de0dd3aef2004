/**
 * Base HTTP client for the upstream translator services
 *
 * Features:
 * - Response caching with LRU eviction
 * - Retry on 429 (honouring Retry-After) and on network failures
 * - Response validation with zod
 */

import type { z } from 'zod';
import { ResolverError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ResponseCache, entryAge } from './cache.js';
import type { QueryParams } from './types.js';

/**
 * Configuration options for ServiceClient
 */
export interface ServiceClientOptions {
  /** User-Agent header (default: 'BiolinkResolverMCP') */
  userAgent?: string;
  /**
   * Response cache, usually one shared by every client of the process.
   * Omitted: the client gets its own default-sized cache; `null` disables caching.
   */
  cache?: ResponseCache | null;
  /** Attempts per request, including the first (default: 3) */
  maxRetries?: number;
  /** Wait before retrying a failed connection, doubled per attempt (default: 500) */
  retryDelayMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export class ServiceApiError extends ResolverError {
  constructor(
    public readonly service: string,
    message: string,
    public readonly statusCode: number,
    public readonly errorBody?: string
  ) {
    super(`${service} API error: ${message}`, 'SERVICE_ERROR', { service, statusCode });
    this.name = 'ServiceApiError';
  }

  get isRateLimited(): boolean {
    return this.statusCode === 429;
  }
}

export interface ServiceResponse<T> {
  data: T;
  cached: boolean;
  cacheAge?: number;
}

export class ServiceClient {
  protected readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly cache: ResponseCache | null;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    readonly service: string,
    baseUrl: string,
    options: ServiceClientOptions = {}
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? 'BiolinkResolverMCP';
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger;
    this.cache = options.cache === undefined ? new ResponseCache() : options.cache;
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getCacheStats() {
    return this.cache?.stats() ?? null;
  }

  /**
   * GET `path` and validate the JSON body against `schema`
   */
  protected async get<T>(
    path: string,
    params: QueryParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<ServiceResponse<T>> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of params) {
      url.searchParams.append(key, value);
    }

    const cacheKey = ResponseCache.keyFor(`${this.baseUrl}${path}`, params);
    const cached = this.cache?.lookup(cacheKey);
    if (cached) {
      this.logger.debug(`${this.service} cache hit for ${path}`);
      return { data: this.validate(schema, cached.body), cached: true, cacheAge: entryAge(cached) };
    }

    const body = await this.request(url);
    const data = this.validate(schema, body);
    this.cache?.store(cacheKey, body);
    return { data, cached: false };
  }

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ServiceApiError(this.service, `unexpected response${where}: ${issue.message}`, 502);
    }
    return result.data;
  }

  private async request(url: URL): Promise<unknown> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      'Accept': 'application/json',
    };

    let lastError: ServiceApiError | null = null;
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      let response: Response;
      try {
        this.logger.debug(`GET ${url.toString()}`);
        response = await this.fetchImpl(url.toString(), { method: 'GET', headers });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        lastError = new ServiceApiError(this.service, `request failed: ${message}`, 0);
        this.logger.warn(`${this.service} request failed (attempt ${attempt + 1}/${this.maxRetries}): ${message}`);
        if (attempt + 1 < this.maxRetries) {
          await this.delay(this.retryDelayMs * 2 ** attempt);
        }
        continue;
      }

      // Handle rate limiting
      if (response.status === 429) {
        const retryAfter = parseInt(response.headers.get('Retry-After') || '1', 10);
        const waitSeconds = Number.isNaN(retryAfter) ? 1 : retryAfter;
        lastError = new ServiceApiError(this.service, `Rate limited, retry after ${waitSeconds}s`, 429);
        this.logger.warn(`${this.service} rate limited, retrying after ${waitSeconds}s`);
        if (attempt + 1 < this.maxRetries) {
          await this.delay(waitSeconds * 1000);
        }
        continue;
      }

      if (!response.ok) {
        const errorBody = await response.text();
        throw new ServiceApiError(
          this.service,
          `${response.status} ${response.statusText}`.trim(),
          response.status,
          errorBody
        );
      }

      try {
        return await response.json();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ServiceApiError(this.service, `invalid JSON response: ${message}`, response.status);
      }
    }

    throw lastError ?? new ServiceApiError(this.service, 'Request failed after retries', 0);
  }
}

export function booleanParam(value: boolean): string {
  return value ? 'true' : 'false';
}
