/**
 * HTTP transport for the Thunderstore client.
 * @module client/http
 */

import { z } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';
import { bearerHeader } from '../auth/index.js';
import type { ThunderstoreConfig } from '../config/index.js';
import { ThunderstoreError } from '../error/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';

/**
 * HTTP method types.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Function used to send requests. Defaults to the global `fetch`.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Request options.
 */
export interface RequestOptions {
  /** Request body */
  body?: BodyInit;
  /** Additional headers */
  headers?: Record<string, string>;
  /** Query parameters; undefined values are left out */
  query?: Record<string, string | undefined>;
  /** Request timeout override */
  timeout?: number;
  /** Leave out the Authorization header */
  skipAuth?: boolean;
}

/**
 * Transport options.
 */
export interface HttpClientOptions {
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Shape of error bodies returned by the API.
 */
const errorBodySchema = z.object({
  detail: z.string().optional(),
  message: z.string().optional(),
  non_field_errors: z.array(z.string()).optional(),
});

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Sends requests to the repository and maps failures to
 * {@link ThunderstoreError}.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(
    private readonly config: ThunderstoreConfig,
    options: HttpClientOptions = {}
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Gets the client configuration.
   */
  getConfig(): Readonly<ThunderstoreConfig> {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Builds a URL for a path. Absolute URLs are used as given.
   */
  buildUrl(path: string, query?: Record<string, string | undefined>): string {
    const url = new URL(/^https?:\/\//.test(path) ? path : `${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }

  /**
   * Gets the default headers for a request.
   */
  getHeaders(skipAuth = false): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
    };
    if (this.config.token && !skipAuth) {
      headers['Authorization'] = bearerHeader(this.config.token);
    }
    return headers;
  }

  /**
   * Sends a request and hands the successful response to `read`.
   *
   * The timeout covers `read`, so body reads are bounded too.
   */
  async send<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const url = this.buildUrl(path, options.query);
    const timeout = options.timeout ?? this.config.timeout;
    const headers = {
      ...this.getHeaders(options.skipAuth),
      ...options.headers,
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    this.logger.debug('Sending request', { method, url });

    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body: options.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await this.parseErrorResponse(response);
        this.logger.warn('Request failed', {
          method,
          url,
          status: response.status,
          kind: error.kind,
        });
        throw error;
      }

      return await read(response);
    } catch (error) {
      if (error instanceof ThunderstoreError) {
        throw error;
      }

      if (isAbortError(error)) {
        this.logger.warn('Request timed out', { method, url, timeout });
        throw ThunderstoreError.timeout(`${method} ${url}`, timeout);
      }

      this.logger.warn('Request could not be sent', { method, url });
      throw ThunderstoreError.connectionFailed(url, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Sends a request and returns the raw successful response.
   *
   * The body must be consumed by the caller.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<Response> {
    return this.send(method, path, options, async response => response);
  }

  /**
   * Sends a request and validates the JSON response against `schema`.
   */
  async requestJson<T>(
    method: HttpMethod,
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    return this.send(method, path, options, response => this.decode(response, schema));
  }

  /**
   * GETs JSON and validates it against `schema`.
   */
  async getJson<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    return this.requestJson('GET', path, schema, options);
  }

  /**
   * Sends `body` as JSON and validates the response against `schema`.
   */
  async sendJson<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    return this.requestJson(method, path, schema, {
      ...options,
      body: JSON.stringify(body),
      headers: { 'Content-Type': 'application/json', ...options.headers },
    });
  }

  /**
   * POSTs `body` as JSON and validates the response against `schema`.
   */
  async postJson<T>(
    path: string,
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    return this.sendJson('POST', path, body, schema, options);
  }

  /**
   * GETs a binary body, using the download timeout by default.
   */
  async getBytes(path: string, options: RequestOptions = {}): Promise<Uint8Array> {
    return this.send(
      'GET',
      path,
      { timeout: this.config.downloadTimeout, ...options },
      async response => new Uint8Array(await response.arrayBuffer())
    );
  }

  /**
   * GETs a body as a stream.
   *
   * The timeout only covers the response headers; reading the stream is
   * unbounded.
   */
  async getStream(path: string, options: RequestOptions = {}): Promise<ReadableStream<Uint8Array>> {
    return this.send('GET', path, options, async response => {
      if (!response.body) {
        throw ThunderstoreError.invalidResponse('response has no body');
      }
      return response.body;
    });
  }

  /**
   * Parses a JSON body and validates it against `schema`.
   */
  private async decode<T>(response: Response, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const text = await response.text();

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw ThunderstoreError.invalidResponse('body is not valid JSON', error);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw ThunderstoreError.invalidResponse(issues.join(', '), result.error);
    }
    return result.data;
  }

  /**
   * Builds an error from a non-2xx response, taking the message from the
   * JSON body where there is one.
   */
  private async parseErrorResponse(response: Response): Promise<ThunderstoreError> {
    const status = response.status;
    const text = await response.text();
    let message = `HTTP ${status}`;

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      json = undefined;
    }

    const body = errorBodySchema.safeParse(json);
    if (body.success) {
      const { detail, message: bodyMessage, non_field_errors } = body.data;
      if (detail) {
        message = detail;
      } else if (bodyMessage) {
        message = bodyMessage;
      } else if (non_field_errors && non_field_errors.length > 0) {
        message = non_field_errors.join(', ');
      }
    }

    return ThunderstoreError.fromResponse(status, message);
  }
}
