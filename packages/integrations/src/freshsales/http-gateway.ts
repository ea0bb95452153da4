/**
 * Authenticated JSON transport for the Freshsales REST API.
 *
 * One call is one HTTP round trip: no retries, no backoff. Non-2xx
 * responses surface as `RemoteRequestError` (`NotFoundError` for 404).
 */

import {
  createLogger,
  ExternalServiceError,
  InvalidArgumentError,
  MalformedResponseError,
  NotFoundError,
  redactObject,
  RemoteRequestError,
  scrubSecrets,
  ValidationError,
  type Logger,
} from '@freshsales-sdk/core';
import {
  FreshsalesClientConfigSchema,
  type FreshsalesClientConfig,
  type QueryParams,
} from '@freshsales-sdk/types';

// =============================================================================
// CONSTANTS
// =============================================================================

export const FRESHSALES_SERVICE = 'Freshsales';

export const FRESHSALES_TIMEOUTS = {
  /** Request timeout in milliseconds */
  REQUEST_TIMEOUT_MS: 30000,
} as const;

// =============================================================================
// TYPES
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Transport collaborator; WHATWG `fetch` by default
 */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface FreshsalesGatewayOptions {
  /** Params sent on every call unless overridden per call */
  defaultParams?: QueryParams | undefined;
  logger?: Logger | undefined;
  fetch?: FetchFn | undefined;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Validate client configuration, reporting failures as `ValidationError`
 */
export function parseClientConfig(options: unknown): FreshsalesClientConfig {
  const result = FreshsalesClientConfigSchema.safeParse(options);
  if (!result.success) {
    throw new ValidationError(
      'Invalid Freshsales client configuration',
      result.error.flatten().fieldErrors
    );
  }
  return result.data;
}

/**
 * Merge per-call params over defaults and encode them for the query string.
 * Null and undefined values are dropped; booleans become "true"/"false".
 */
export function encodeQueryParams(
  defaults: QueryParams = {},
  params: QueryParams = {}
): URLSearchParams {
  const merged: QueryParams = { ...defaults };
  for (const [key, value] of Object.entries(params)) {
    if (value !== null && value !== undefined) {
      merged[key] = value;
    }
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(merged)) {
    if (value === null || value === undefined) continue;
    search.append(key, typeof value === 'boolean' ? (value ? 'true' : 'false') : String(value));
  }
  return search;
}

function assertSafePath(path: string): void {
  // Only relative API paths: no absolute URLs, no traversal
  if (!path.startsWith('/')) {
    throw new InvalidArgumentError('path', `"${path}" must start with "/"`);
  }
  if (path.includes('://') || path.includes('..')) {
    throw new InvalidArgumentError('path', `"${path}" is not a safe API path`);
  }
}

// =============================================================================
// GATEWAY
// =============================================================================

/**
 * Transport for one account. Expects a config already checked by
 * `parseClientConfig`.
 */
export class FreshsalesHttpGateway {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly defaultParams: QueryParams;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(config: FreshsalesClientConfig, options: FreshsalesGatewayOptions = {}) {
    this.baseUrl = `https://${config.domain}.freshsales.io/api`;
    this.apiKey = config.apiKey;
    this.defaultParams = { ...options.defaultParams };
    this.timeoutMs = config.timeoutMs ?? FRESHSALES_TIMEOUTS.REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger({ name: 'freshsales' });
    // Resolved per call so a patched global fetch is picked up
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Build the absolute URL for a path and query
   */
  buildUrl(path: string, queryParams?: QueryParams): string {
    assertSafePath(path);
    const query = encodeQueryParams(this.defaultParams, queryParams).toString();
    return query ? `${this.baseUrl}${path}?${query}` : `${this.baseUrl}${path}`;
  }

  /**
   * Issue one request and decode the JSON body
   */
  async request(
    method: HttpMethod,
    path: string,
    queryParams?: QueryParams,
    body?: unknown
  ): Promise<unknown> {
    const url = this.buildUrl(path, queryParams);
    const startedAt = Date.now();

    this.logger.debug({ method, path, params: redactObject(queryParams) }, 'Freshsales request');

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: `Token token=${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body === undefined ? null : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      this.logger.error({ method, path, err: cause }, 'Freshsales transport failure');
      if (cause && (cause.name === 'TimeoutError' || cause.name === 'AbortError')) {
        throw new ExternalServiceError(
          FRESHSALES_SERVICE,
          `Request timeout after ${this.timeoutMs}ms`,
          cause
        );
      }
      throw new ExternalServiceError(FRESHSALES_SERVICE, `${method} ${path} failed`, cause);
    }

    const durationMs = Date.now() - startedAt;

    if (!ok) {
      // Response bodies may contain record data: internal logs only
      this.logger.error(
        { method, path, status, durationMs, errorBody: scrubSecrets(text) },
        'Freshsales API error'
      );
      if (status === 404) {
        throw new NotFoundError(FRESHSALES_SERVICE, text, { method, path });
      }
      throw new RemoteRequestError(FRESHSALES_SERVICE, status, text, { method, path });
    }

    this.logger.debug({ method, path, status, durationMs }, 'Freshsales response');

    try {
      const decoded: unknown = JSON.parse(text);
      return decoded;
    } catch (error) {
      this.logger.error({ method, path, status, err: error }, 'Freshsales response is not JSON');
      throw new MalformedResponseError(FRESHSALES_SERVICE, `${method} ${path} returned invalid JSON`);
    }
  }
}
