/**
 * Base service class with common functionality for all Thunderstore services.
 */

import type { HttpClient } from '../client/http.js';
import type { Logger } from '../observability/index.js';

/**
 * Prefix of the experimental API.
 */
export const EXPERIMENTAL_PREFIX = '/api/experimental';

/**
 * Abstract base class for all service implementations.
 */
export abstract class BaseService {
  constructor(protected readonly httpClient: HttpClient) {}

  protected get logger(): Logger {
    return this.httpClient.getLogger();
  }

  /**
   * Path of an endpoint under the experimental API.
   */
  protected experimental(path: string): string {
    return `${EXPERIMENTAL_PREFIX}${path}`;
  }
}
