/**
 * Mock HTTP transport for testing.
 *
 * Tests enqueue responses and then verify the requests the client made, in
 * Arrange-Act-Assert order.
 */

import type { FetchFn } from '../client/http.js';

export interface MockResponse {
  status: number;
  /** Whole body */
  body?: string | Uint8Array;
  /** Body delivered as separate stream chunks */
  chunks?: string[];
  /** Error the body stream fails with once its chunks are read */
  streamError?: Error;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  url: string;
  options: RequestInit;
}

/**
 * Mock transport implementation for testing.
 *
 * @example
 * ```typescript
 * // Arrange
 * const mock = new MockHttpClient();
 * mock.enqueueJsonResponse(200, { markdown: '# Hello' });
 * const client = createClient(ThunderstoreConfig.default(), { fetch: createMockFetch(mock) });
 *
 * // Act
 * const readme = await client.packages.getReadme('Ns-Name-1.0.0');
 *
 * // Assert
 * expect(readme).toBe('# Hello');
 * mock.verifyRequestCount(1);
 * ```
 */
export class MockHttpClient {
  private responses: Array<MockResponse | Error> = [];
  private requests: RecordedRequest[] = [];

  /**
   * Enqueue a raw response to be returned by the next request.
   */
  enqueueResponse(response: MockResponse): void {
    this.responses.push(response);
  }

  /**
   * Enqueue a JSON response with the given status code and body.
   */
  enqueueJsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): void {
    this.enqueueResponse({
      status,
      body: JSON.stringify(body),
      headers: { 'content-type': 'application/json', ...headers },
    });
  }

  /**
   * Enqueue an error response in the API's `{ detail }` shape.
   */
  enqueueErrorResponse(status: number, detail: string): void {
    this.enqueueJsonResponse(status, { detail });
  }

  /**
   * Enqueue a response whose body arrives in the given chunks.
   */
  enqueueStreamingResponse(chunks: string[], status = 200): void {
    this.enqueueResponse({ status, chunks });
  }

  /**
   * Enqueue a response whose body fails with `error` after the given chunks,
   * as a connection dropped mid-transfer would.
   */
  enqueueBrokenStream(chunks: string[], error: Error): void {
    this.enqueueResponse({ status: 200, chunks, streamError: error });
  }

  /**
   * Make the next request fail before any response, as a network error would.
   */
  enqueueFailure(error: Error): void {
    this.responses.push(error);
  }

  /**
   * Get all requests that were made.
   */
  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  /**
   * Get the request at `index`.
   *
   * @throws {Error} If there is no such request
   */
  getRequest(index: number): RecordedRequest {
    const request = this.requests[index];
    if (!request) {
      throw new Error(`No request at index ${index}`);
    }
    return request;
  }

  /**
   * Get the last request that was made.
   */
  getLastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Get a header of the request at `index`.
   */
  getHeader(index: number, headerName: string): string | null {
    return new Headers(this.getRequest(index).options.headers).get(headerName);
  }

  /**
   * Parse the body of the request at `index` as JSON.
   */
  getJsonBody(index: number): unknown {
    const body = this.getRequest(index).options.body;
    if (typeof body !== 'string') {
      throw new Error(`Request ${index} has no text body`);
    }
    return JSON.parse(body);
  }

  /**
   * Verify that exactly the expected number of requests were made.
   *
   * @throws {Error} If the actual count doesn't match expected
   */
  verifyRequestCount(expected: number): void {
    if (this.requests.length !== expected) {
      throw new Error(`Expected ${expected} requests, got ${this.requests.length}`);
    }
  }

  /**
   * Verify that a request was made with the expected method and URL.
   *
   * @throws {Error} If the request doesn't match expectations
   */
  verifyRequest(index: number, method: string, url: string): void {
    const request = this.getRequest(index);
    const actualMethod = request.options.method ?? 'GET';

    if (actualMethod !== method) {
      throw new Error(`Expected method ${method}, got ${actualMethod}`);
    }

    if (request.url !== url) {
      throw new Error(`Expected URL '${url}', got '${request.url}'`);
    }
  }

  /**
   * Verify that a request contains a specific header.
   *
   * @throws {Error} If the header doesn't match expectations
   */
  verifyHeader(index: number, headerName: string, headerValue: string | null): void {
    const actualValue = this.getHeader(index, headerName);

    if (actualValue !== headerValue) {
      throw new Error(
        `Expected header '${headerName}' to be '${headerValue}', got '${actualValue}'`
      );
    }
  }

  /**
   * Clear all recorded requests.
   */
  clearRequests(): void {
    this.requests = [];
  }

  /**
   * Record a request and return the next enqueued response.
   */
  async request(url: string, options: RequestInit = {}): Promise<Response> {
    this.requests.push({ url, options });

    const response = this.responses.shift();
    if (!response) {
      throw new Error('No response configured in MockHttpClient');
    }
    if (response instanceof Error) {
      throw response;
    }

    return new Response(toBody(response), {
      status: response.status,
      headers: response.headers,
    });
  }
}

function toBody(response: MockResponse): BodyInit | null {
  const { chunks, body, streamError } = response;
  if (chunks) {
    const encoder = new TextEncoder();
    const pending = [...chunks];
    return new ReadableStream<Uint8Array>({
      pull(controller) {
        const chunk = pending.shift();
        if (chunk !== undefined) {
          controller.enqueue(encoder.encode(chunk));
        } else if (streamError) {
          controller.error(streamError);
        } else {
          controller.close();
        }
      },
    });
  }
  if (body === undefined) {
    return null;
  }
  return typeof body === 'string' ? body : body.slice();
}

/**
 * Create a fetch function backed by `mockClient`.
 *
 * @example
 * ```typescript
 * const mock = new MockHttpClient();
 * const client = new ThunderstoreClientBuilder().withFetch(createMockFetch(mock)).build();
 * ```
 */
export function createMockFetch(mockClient: MockHttpClient): FetchFn {
  return (url, init) => mockClient.request(url, init);
}
