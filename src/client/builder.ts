/**
 * Builder for creating Thunderstore client instances.
 */

import type { SecretString } from '../auth/index.js';
import { ThunderstoreConfig, ThunderstoreConfigBuilder } from '../config/index.js';
import type { LogLevel, Logger } from '../observability/index.js';
import { ConsoleLogger } from '../observability/index.js';
import { ThunderstoreClientImpl } from './client.js';
import type { FetchFn } from './http.js';
import type { ThunderstoreClient } from './types.js';

/**
 * Builder for creating Thunderstore client instances with fluent API.
 *
 * @example
 * ```typescript
 * const client = new ThunderstoreClientBuilder()
 *   .useDevRepo()
 *   .withToken(process.env.THUNDERSTORE_TOKEN ?? '')
 *   .build();
 * ```
 */
export class ThunderstoreClientBuilder {
  private config = new ThunderstoreConfigBuilder();
  private fetchFn?: FetchFn;
  private logger?: Logger;
  private consoleLevel?: LogLevel;

  /**
   * Set the base URL. Defaults to `https://thunderstore.io`.
   */
  withBaseUrl(baseUrl: string): this {
    this.config.baseUrl(baseUrl);
    return this;
  }

  /**
   * Target the development repository instead of the main one.
   */
  useDevRepo(): this {
    this.config.useDevRepo();
    return this;
  }

  /**
   * Set the API token, needed for uploads, submissions and wiki edits.
   */
  withToken(token: string | SecretString): this {
    this.config.token(token);
    return this;
  }

  withTimeout(timeout: number): this {
    this.config.timeout(timeout);
    return this;
  }

  withDownloadTimeout(timeout: number): this {
    this.config.downloadTimeout(timeout);
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.config.userAgent(userAgent);
    return this;
  }

  /**
   * Set the function used to send requests.
   */
  withFetch(fetchFn: FetchFn): this {
    this.fetchFn = fetchFn;
    return this;
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  /**
   * Log to the console at `level`, tagging every line with the base URL.
   * Takes precedence over {@link withLogger}.
   */
  withConsoleLogger(level: LogLevel = 'info'): this {
    this.consoleLevel = level;
    return this;
  }

  /**
   * Build the client.
   */
  build(): ThunderstoreClient {
    const config = this.config.build();
    const logger =
      this.consoleLevel === undefined
        ? this.logger
        : new ConsoleLogger({ level: this.consoleLevel, context: { baseUrl: config.baseUrl } });
    return new ThunderstoreClientImpl(config, {
      fetch: this.fetchFn,
      logger,
    });
  }

  /**
   * Build a client from environment variables.
   */
  static fromEnv(): ThunderstoreClient {
    return new ThunderstoreClientImpl(ThunderstoreConfig.fromEnv());
  }
}
