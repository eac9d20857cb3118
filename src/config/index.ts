/**
 * Configuration for the Thunderstore client.
 * @module config
 */

import { z } from 'zod';
import { SecretString } from '../auth/index.js';
import { ThunderstoreError } from '../error/index.js';

/**
 * Default repository URL.
 */
export const DEFAULT_BASE_URL = 'https://thunderstore.io';

/**
 * Development repository URL.
 */
export const DEV_BASE_URL = 'https://thunderstore.dev';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Default timeout for downloads and part uploads in milliseconds (5 minutes).
 */
export const DEFAULT_DOWNLOAD_TIMEOUT = 300000;

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'thunderstore-client/0.1.0';

/**
 * Thunderstore client configuration.
 */
export interface ThunderstoreConfig {
  /** Repository base URL */
  readonly baseUrl: string;
  /** API token sent as a bearer token */
  readonly token?: SecretString;
  /** Request timeout in milliseconds */
  readonly timeout: number;
  /** Download and upload timeout in milliseconds */
  readonly downloadTimeout: number;
  /** User-Agent header */
  readonly userAgent: string;
}

const configSchema = z.object({
  baseUrl: z.string().url(),
  token: z.instanceof(SecretString).optional(),
  timeout: z.number().int().positive(),
  downloadTimeout: z.number().int().positive(),
  userAgent: z.string().min(1),
});

/**
 * Creates the default configuration.
 */
export function createDefaultConfig(): ThunderstoreConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    timeout: DEFAULT_TIMEOUT,
    downloadTimeout: DEFAULT_DOWNLOAD_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
  };
}

/**
 * Validates a configuration.
 */
export function validateConfig(config: ThunderstoreConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw ThunderstoreError.configError(`Invalid configuration: ${issues.join(', ')}`);
  }
}

/**
 * Partial configuration for `ThunderstoreConfig.from`. The token may be
 * given as a plain string.
 */
export type PartialThunderstoreConfig = Partial<{
  baseUrl: string;
  token: string | SecretString;
  timeout: number;
  downloadTimeout: number;
  userAgent: string;
}>;

function toSecret(token: string | SecretString): SecretString {
  return typeof token === 'string' ? new SecretString(token) : token;
}

/**
 * Configuration builder.
 */
export class ThunderstoreConfigBuilder {
  private config: ThunderstoreConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the repository base URL.
   */
  baseUrl(value: string): this {
    this.config = { ...this.config, baseUrl: value };
    return this;
  }

  /**
   * Targets the development repository.
   */
  useDevRepo(): this {
    return this.baseUrl(DEV_BASE_URL);
  }

  /**
   * Sets the API token.
   */
  token(value: string | SecretString): this {
    this.config = { ...this.config, token: toSecret(value) };
    return this;
  }

  /**
   * Sets the request timeout.
   */
  timeout(value: number): this {
    this.config = { ...this.config, timeout: value };
    return this;
  }

  /**
   * Sets the download and upload timeout.
   */
  downloadTimeout(value: number): this {
    this.config = { ...this.config, downloadTimeout: value };
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(value: string): this {
    this.config = { ...this.config, userAgent: value };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): ThunderstoreConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

/**
 * ThunderstoreConfig namespace with factory methods.
 */
export const ThunderstoreConfig = {
  builder(): ThunderstoreConfigBuilder {
    return new ThunderstoreConfigBuilder();
  },

  default(): ThunderstoreConfig {
    return createDefaultConfig();
  },

  /**
   * Creates configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): ThunderstoreConfig {
    const builder = new ThunderstoreConfigBuilder();

    if (env['THUNDERSTORE_BASE_URL']) {
      builder.baseUrl(env['THUNDERSTORE_BASE_URL']);
    }

    if (env['THUNDERSTORE_TOKEN']) {
      builder.token(env['THUNDERSTORE_TOKEN']);
    }

    if (env['THUNDERSTORE_TIMEOUT_SECS']) {
      builder.timeout(parseInt(env['THUNDERSTORE_TIMEOUT_SECS'], 10) * 1000);
    }

    if (env['THUNDERSTORE_DOWNLOAD_TIMEOUT_SECS']) {
      builder.downloadTimeout(parseInt(env['THUNDERSTORE_DOWNLOAD_TIMEOUT_SECS'], 10) * 1000);
    }

    if (env['THUNDERSTORE_USER_AGENT']) {
      builder.userAgent(env['THUNDERSTORE_USER_AGENT']);
    }

    return builder.build();
  },

  /**
   * Creates configuration from partial values.
   */
  from(partial: PartialThunderstoreConfig): ThunderstoreConfig {
    const defaults = createDefaultConfig();
    return {
      baseUrl: partial.baseUrl ?? defaults.baseUrl,
      token: partial.token === undefined ? undefined : toSecret(partial.token),
      timeout: partial.timeout ?? defaults.timeout,
      downloadTimeout: partial.downloadTimeout ?? defaults.downloadTimeout,
      userAgent: partial.userAgent ?? defaults.userAgent,
    };
  },

  validate(config: ThunderstoreConfig): void {
    validateConfig(config);
  },
};
