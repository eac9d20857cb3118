/**
 * thunderstore-client
 *
 * TypeScript client for the Thunderstore mod repository API.
 *
 * @example
 * ```typescript
 * import { createClient, VersionIdent } from 'thunderstore-client';
 *
 * const client = createClient();
 *
 * // Identifiers can be passed as strings, tuples or parsed values
 * const pkg = await client.packages.getPackage('BepInEx-BepInExPack');
 * const readme = await client.packages.getReadme(['BepInEx', 'BepInExPack', '5.4.2100']);
 *
 * // Stream the package index without buffering it
 * for await (const entry of client.packageIndex.streamPackageIndex()) {
 *   console.log(entry.namespace, entry.name, entry.version_number);
 * }
 * ```
 */

// Identifier exports
export {
  PackageIdent,
  VersionIdent,
  IdentPath,
  intoPackageIdent,
  intoVersionIdent,
  type PackageIdentInput,
  type VersionIdentInput,
} from './ident/index.js';

// Client exports
export {
  createClient,
  createClientFromEnv,
  ThunderstoreClientBuilder,
  HttpClient,
  type ThunderstoreClient,
  type FetchFn,
  type HttpClientOptions,
  type HttpMethod,
  type RequestOptions,
} from './client/index.js';

// Configuration exports
export {
  ThunderstoreConfig,
  ThunderstoreConfigBuilder,
  type PartialThunderstoreConfig,
  createDefaultConfig,
  validateConfig,
  DEFAULT_BASE_URL,
  DEV_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_DOWNLOAD_TIMEOUT,
  DEFAULT_USER_AGENT,
} from './config/index.js';

// Error exports
export {
  ThunderstoreError,
  ThunderstoreErrorKind,
  type ThunderstoreErrorOptions,
  errorKindFromStatus,
  isRetryable,
  isThunderstoreError,
  hasErrorKind,
} from './error/index.js';

// Auth exports
export { SecretString } from './auth/index.js';

// Observability exports
export {
  ConsoleLogger,
  NoopLogger,
  type ConsoleLoggerOptions,
  type Logger,
  type LogLevel,
} from './observability/index.js';

// Service exports
export {
  PROFILE_DATA_PREFIX,
  encodeProfile,
  decodeProfile,
  type PackagesService,
  type PackageIndexService,
  type CommunityV1Service,
  type CommunitiesService,
  type UserMediaService,
  type SubmissionService,
  type WikiService,
  type ProfilesService,
  type FrontendService,
} from './services/index.js';

// Streaming exports
export {
  ChunkedJsonParser,
  NdjsonParser,
  parseStream,
  type StreamParser,
} from './streaming/index.js';

// Type exports
export * from './types/index.js';
