/**
 * Search Keys SDK - Main Client
 *
 * This module provides the SearchClient class.
 */

import { KeysResource } from './resources/keys';
import type { Key, KeyBuilder, KeysQuery } from './key';
import type { KeyIdentifier, KeysQueryParams, KeysResults } from './models';
import { loadConfig } from './config';
import { createLogger, type Logger } from './logger';
import { apiErrorBodySchema } from './schemas';
import {
  CommunicationError,
  ConfigurationError,
  InvalidResponseError,
  TimeoutError,
  createErrorFromResponse,
  type ApiErrorBody,
} from './exceptions';

export const VERSION = '1.0.0';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Configuration options for the SearchClient.
 */
export interface SearchClientConfig {
  /** Base URL of the search service, e.g. http://localhost:7700 */
  host: string;
  /** API key sent as a bearer token */
  apiKey?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Custom fetch implementation */
  fetch?: FetchLike;
  /** Logger to use instead of the default pino instance */
  logger?: Logger;
  /** Enable debug logging on the default logger */
  debug?: boolean;
}

export type QueryParams = Record<string, string | number | boolean | null | undefined>;

/**
 * Request options for API calls.
 */
export interface RequestOptions {
  method: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  path: string;
  params?: QueryParams;
  /** Serialized as JSON */
  body?: unknown;
  headers?: Record<string, string>;
  timeout?: number;
}

interface RawResponse {
  response: Response;
  text: string;
}

function parseErrorBody(text: string, status: number): ApiErrorBody {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return { message: text || `HTTP ${status}` };
  }
  const parsed = apiErrorBodySchema.safeParse(data);
  return parsed.success ? parsed.data : { message: text };
}

/**
 * Client for the key-management routes of the search service.
 *
 * Every call is a single request: nothing is retried, and every failure is
 * thrown to the caller.
 *
 * @example
 * ```typescript
 * const client = new SearchClient({ host: 'http://localhost:7700', apiKey: 'masterKey' });
 *
 * const key = await new KeyBuilder()
 *   .withAction(Action.SEARCH)
 *   .withIndex('*')
 *   .execute(client);
 *
 * const page = await client.getKeys(new KeysQuery(client).withLimit(5));
 * ```
 */
export class SearchClient {
  private readonly host: string;
  private readonly apiKey?: string;
  private readonly timeout: number;
  private readonly defaultHeaders: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  /** Resource for managing API keys */
  public readonly keys: KeysResource;

  /**
   * Create a new SearchClient.
   *
   * @throws {ConfigurationError} If no host is provided
   */
  constructor(config: SearchClientConfig) {
    if (!config.host) {
      throw new ConfigurationError('Host is required. Provide it in the config or set SEARCH_HOST.');
    }

    this.host = config.host.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 30000;
    this.defaultHeaders = config.headers ?? {};
    this.fetchImpl = config.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.logger = config.logger ?? createLogger({ level: config.debug ? 'debug' : 'info' });

    this.keys = new KeysResource(this);

    this.logger.debug({ host: this.host }, 'Search client initialized');
  }

  /**
   * Create a client from SEARCH_HOST, SEARCH_API_KEY, SEARCH_TIMEOUT_MS and
   * LOG_LEVEL.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<SearchClientConfig> = {}
  ): SearchClient {
    const config = loadConfig(env);
    return new SearchClient({
      host: config.SEARCH_HOST,
      apiKey: config.SEARCH_API_KEY,
      timeout: config.SEARCH_TIMEOUT_MS,
      logger: overrides.logger ?? createLogger({ level: config.LOG_LEVEL }),
      ...overrides,
    });
  }

  // ===========================================================================
  // Keys
  // ===========================================================================

  async getKeys(query?: KeysQuery | KeysQueryParams): Promise<KeysResults> {
    return this.keys.list(query);
  }

  async executeGetKeys(query: KeysQuery): Promise<KeysResults> {
    return this.keys.list(query);
  }

  /**
   * Fetch one key by its secret or uid.
   */
  async getKey(keyOrUid: KeyIdentifier): Promise<Key> {
    return this.keys.get(keyOrUid);
  }

  async createKey(builder: KeyBuilder): Promise<Key> {
    return this.keys.create(builder);
  }

  async updateKey(key: Key): Promise<Key> {
    return this.keys.update(key);
  }

  async deleteKey(keyOrUid: KeyIdentifier): Promise<void> {
    return this.keys.delete(keyOrUid);
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  /**
   * Make an HTTP request to the API.
   *
   * @returns The decoded JSON body, or `undefined` for an empty response
   * @throws {ApiError} When the server answers with an error status
   * @throws {CommunicationError} When the request fails or the body is not JSON
   */
  async request(options: RequestOptions): Promise<unknown> {
    const { method, path, params, body, headers: customHeaders, timeout = this.timeout } = options;
    const url = this.buildUrl(path, params);

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      'User-Agent': `search-keys-sdk/${VERSION}`,
      ...this.defaultHeaders,
      ...customHeaders,
    };

    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    const requestInit: RequestInit = {
      method,
      headers,
    };

    if (body !== undefined && method !== 'GET') {
      requestInit.body = JSON.stringify(body);
    }

    const startedAt = Date.now();
    this.logger.debug({ method, path }, 'Sending request');

    const { response, text } = await this.send(url, requestInit, timeout);

    this.logger.debug(
      { method, path, status: response.status, durationMs: Date.now() - startedAt },
      'Received response'
    );

    if (!response.ok) {
      const error = createErrorFromResponse(response.status, parseErrorBody(text, response.status), response.headers);
      this.logger.debug({ method, path, status: response.status, code: error.code }, 'Request rejected by server');
      throw error;
    }

    if (response.status === 204 || text.length === 0) {
      return undefined;
    }

    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (error) {
      throw new InvalidResponseError(`Response to ${method} ${path} is not valid JSON`, [], error);
    }
  }

  private async send(url: string, requestInit: RequestInit, timeout: number): Promise<RawResponse> {
    // Create abort controller for timeout
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await this.fetchImpl(url, { ...requestInit, signal: controller.signal });
      const text = await response.text();
      return { response, text };
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger.debug({ url, timeout }, 'Request timed out');
        throw new TimeoutError(`Request timed out after ${timeout}ms`, timeout, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug({ url, reason }, 'Request failed');
      throw new CommunicationError(`Request to ${url} failed: ${reason}`, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildUrl(path: string, params?: QueryParams): string {
    let url = `${this.host}${path}`;
    if (params) {
      const searchParams = new URLSearchParams();
      Object.entries(params).forEach(([key, value]) => {
        if (value !== undefined && value !== null) {
          searchParams.append(key, String(value));
        }
      });
      const queryString = searchParams.toString();
      if (queryString) {
        url += `?${queryString}`;
      }
    }
    return url;
  }
}

export default SearchClient;
