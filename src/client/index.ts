/**
 * Client interface and factory for the Thunderstore API.
 */

import { ThunderstoreConfig } from '../config/index.js';
import { ThunderstoreClientBuilder } from './builder.js';
import { ThunderstoreClientImpl } from './client.js';
import type { HttpClientOptions } from './http.js';
import type { ThunderstoreClient } from './types.js';

export type { ThunderstoreClient } from './types.js';
export { ThunderstoreClientBuilder } from './builder.js';
export { HttpClient } from './http.js';
export type { FetchFn, HttpClientOptions, HttpMethod, RequestOptions } from './http.js';

/**
 * Create a Thunderstore client. Without a configuration, the client talks
 * to `https://thunderstore.io` anonymously.
 */
export function createClient(
  config: ThunderstoreConfig = ThunderstoreConfig.default(),
  options: HttpClientOptions = {}
): ThunderstoreClient {
  return new ThunderstoreClientImpl(config, options);
}

/**
 * Create a Thunderstore client from environment variables.
 */
export function createClientFromEnv(): ThunderstoreClient {
  return ThunderstoreClientBuilder.fromEnv();
}
