/**
 * Client interface for the Thunderstore API.
 */

import type { ThunderstoreConfig } from '../config/index.js';
import type {
  CommunitiesService,
  CommunityV1Service,
  FrontendService,
  PackageIndexService,
  PackagesService,
  ProfilesService,
  SubmissionService,
  UserMediaService,
  WikiService,
} from '../services/index.js';

/**
 * Entry point to every Thunderstore API operation.
 */
export interface ThunderstoreClient {
  /** Package metadata, readmes and downloads */
  readonly packages: PackagesService;
  /** Index of every package version */
  readonly packageIndex: PackageIndexService;
  /** Community-scoped v1 API */
  readonly v1: CommunityV1Service;
  /** Communities and categories */
  readonly communities: CommunitiesService;
  /** Multi-part uploads and publishing */
  readonly usermedia: UserMediaService;
  /** Submission and validation */
  readonly submission: SubmissionService;
  /** Package wikis */
  readonly wiki: WikiService;
  /** Legacy profile sharing */
  readonly profiles: ProfilesService;
  /** Markdown rendering */
  readonly frontend: FrontendService;

  /**
   * Gets the client configuration.
   */
  getConfig(): Readonly<ThunderstoreConfig>;
}
