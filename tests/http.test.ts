/**
 * HTTP transport tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { HttpClient } from '../src/client/http.js';
import { ThunderstoreConfig } from '../src/config/index.js';
import { ThunderstoreErrorKind } from '../src/error/index.js';
import { MockHttpClient, createMockFetch } from '../src/__mocks__/index.js';
import { rejectionOf } from './support/helpers.js';

const CountSchema = z.object({ n: z.number() });

describe('HttpClient', () => {
  let mock: MockHttpClient;
  let http: HttpClient;

  beforeEach(() => {
    mock = new MockHttpClient();
    http = new HttpClient(
      ThunderstoreConfig.builder().baseUrl('https://thunderstore.io/').token('test-secret').build(),
      { fetch: createMockFetch(mock) }
    );
  });

  describe('buildUrl', () => {
    it('should join the path to the base URL and skip undefined query values', () => {
      expect(http.buildUrl('/api/experimental/community', { cursor: 'abc', page: undefined })).toBe(
        'https://thunderstore.io/api/experimental/community?cursor=abc'
      );
    });

    it('should use absolute URLs as given', () => {
      expect(http.buildUrl('https://storage.example.com/part?id=1')).toBe(
        'https://storage.example.com/part?id=1'
      );
    });
  });

  describe('headers', () => {
    it('should send the user agent and bearer token', async () => {
      mock.enqueueJsonResponse(200, { n: 1 });

      await http.getJson('/api/experimental/x', CountSchema);

      mock.verifyHeader(0, 'User-Agent', 'thunderstore-client/0.1.0');
      mock.verifyHeader(0, 'Authorization', 'Bearer test-secret');
    });

    it('should leave out the token when asked to', async () => {
      mock.enqueueJsonResponse(200, { n: 1 });

      await http.getJson('/api/experimental/x', CountSchema, { skipAuth: true });

      mock.verifyHeader(0, 'Authorization', null);
    });

    it('should not send a token when none is configured', async () => {
      const anonymous = new HttpClient(ThunderstoreConfig.default(), {
        fetch: createMockFetch(mock),
      });
      mock.enqueueJsonResponse(200, { n: 1 });

      await anonymous.getJson('/api/experimental/x', CountSchema);

      mock.verifyHeader(0, 'Authorization', null);
    });

    it('should send JSON bodies with a content type', async () => {
      mock.enqueueJsonResponse(200, { n: 2 });

      const result = await http.postJson('/api/experimental/x', { a: 1 }, CountSchema);

      expect(result).toEqual({ n: 2 });
      mock.verifyRequest(0, 'POST', 'https://thunderstore.io/api/experimental/x');
      mock.verifyHeader(0, 'Content-Type', 'application/json');
      expect(mock.getJsonBody(0)).toEqual({ a: 1 });
    });
  });

  describe('error responses', () => {
    it('should take the message from detail', async () => {
      mock.enqueueErrorResponse(404, 'Not found.');

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.NotFound);
      expect(error.message).toBe('Not found.');
      expect(error.statusCode).toBe(404);
    });

    it('should take the message from message', async () => {
      mock.enqueueJsonResponse(403, { message: 'No permission' });

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.Forbidden);
      expect(error.message).toBe('No permission');
    });

    it('should join non-field errors', async () => {
      mock.enqueueJsonResponse(400, { non_field_errors: ['Bad name', 'Bad version'] });

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.BadRequest);
      expect(error.message).toBe('Bad name, Bad version');
    });

    it('should fall back to the status for bodies that are not JSON', async () => {
      mock.enqueueResponse({ status: 502, body: '<html>Bad gateway</html>' });

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.ServerError);
      expect(error.message).toBe('HTTP 502');
      expect(error.isRetryable()).toBe(true);
    });

    it('should map 401 to an invalid token', async () => {
      mock.enqueueErrorResponse(401, 'Invalid token.');

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.ApiTokenInvalid);
    });
  });

  describe('transport failures', () => {
    it('should report connection failures with the URL', async () => {
      mock.enqueueFailure(new TypeError('fetch failed'));

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.ConnectionFailed);
      expect(error.message).toBe('Request failed: fetch failed');
      expect(error.context).toEqual({ url: 'https://thunderstore.io/api/experimental/x' });
    });

    it('should report aborted requests as timeouts', async () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';
      mock.enqueueFailure(abort);

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.Timeout);
      expect(error.message).toBe(
        "Operation 'GET https://thunderstore.io/api/experimental/x' timed out after 30000ms"
      );
    });
  });

  describe('response decoding', () => {
    it('should reject bodies that do not match the schema', async () => {
      mock.enqueueJsonResponse(200, { n: 'one' });

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.InvalidResponse);
      expect(error.message).toBe('Invalid response: n: Expected number, received string');
    });

    it('should reject bodies that are not JSON', async () => {
      mock.enqueueResponse({ status: 200, body: 'plain text' });

      const error = await rejectionOf(http.getJson('/api/experimental/x', CountSchema));

      expect(error.kind).toBe(ThunderstoreErrorKind.InvalidResponse);
      expect(error.message).toBe('Invalid response: body is not valid JSON');
    });

    it('should return binary bodies', async () => {
      mock.enqueueResponse({ status: 200, body: new Uint8Array([1, 2, 3]) });

      const data = await http.getBytes('/package/download/A/B/1.0.0');

      expect([...data]).toEqual([1, 2, 3]);
    });
  });
});
