/**
 * Mock implementations for testing.
 *
 * Lets the Thunderstore client be tested without a network.
 */

export {
  MockHttpClient,
  createMockFetch,
  type MockResponse,
  type RecordedRequest,
} from './http-client.js';
