/**
 * Implementation of the Thunderstore client.
 */

import type { ThunderstoreConfig } from '../config/index.js';
import { validateConfig } from '../config/index.js';
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
import { CommunitiesServiceImpl } from '../services/communities.js';
import { FrontendServiceImpl } from '../services/frontend.js';
import { PackageIndexServiceImpl } from '../services/package-index.js';
import { PackagesServiceImpl } from '../services/packages.js';
import { ProfilesServiceImpl } from '../services/profiles.js';
import { SubmissionServiceImpl } from '../services/submission.js';
import { UserMediaServiceImpl } from '../services/usermedia.js';
import { CommunityV1ServiceImpl } from '../services/v1.js';
import { WikiServiceImpl } from '../services/wiki.js';
import type { HttpClientOptions } from './http.js';
import { HttpClient } from './http.js';
import type { ThunderstoreClient } from './types.js';

/**
 * Implementation of the Thunderstore client.
 */
export class ThunderstoreClientImpl implements ThunderstoreClient {
  private readonly httpClient: HttpClient;

  // Lazy-initialized services
  private _packages?: PackagesService;
  private _packageIndex?: PackageIndexService;
  private _v1?: CommunityV1Service;
  private _communities?: CommunitiesService;
  private _usermedia?: UserMediaService;
  private _submission?: SubmissionService;
  private _wiki?: WikiService;
  private _profiles?: ProfilesService;
  private _frontend?: FrontendService;

  constructor(config: ThunderstoreConfig, options: HttpClientOptions = {}) {
    validateConfig(config);
    this.httpClient = new HttpClient(config, options);
  }

  getConfig(): Readonly<ThunderstoreConfig> {
    return this.httpClient.getConfig();
  }

  get packages(): PackagesService {
    if (!this._packages) {
      this._packages = new PackagesServiceImpl(this.httpClient);
    }
    return this._packages;
  }

  get packageIndex(): PackageIndexService {
    if (!this._packageIndex) {
      this._packageIndex = new PackageIndexServiceImpl(this.httpClient);
    }
    return this._packageIndex;
  }

  get v1(): CommunityV1Service {
    if (!this._v1) {
      this._v1 = new CommunityV1ServiceImpl(this.httpClient);
    }
    return this._v1;
  }

  get communities(): CommunitiesService {
    if (!this._communities) {
      this._communities = new CommunitiesServiceImpl(this.httpClient);
    }
    return this._communities;
  }

  get usermedia(): UserMediaService {
    if (!this._usermedia) {
      this._usermedia = new UserMediaServiceImpl(this.httpClient, this.submission);
    }
    return this._usermedia;
  }

  get submission(): SubmissionService {
    if (!this._submission) {
      this._submission = new SubmissionServiceImpl(this.httpClient);
    }
    return this._submission;
  }

  get wiki(): WikiService {
    if (!this._wiki) {
      this._wiki = new WikiServiceImpl(this.httpClient);
    }
    return this._wiki;
  }

  get profiles(): ProfilesService {
    if (!this._profiles) {
      this._profiles = new ProfilesServiceImpl(this.httpClient);
    }
    return this._profiles;
  }

  get frontend(): FrontendService {
    if (!this._frontend) {
      this._frontend = new FrontendServiceImpl(this.httpClient);
    }
    return this._frontend;
  }
}
