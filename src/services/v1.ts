/**
 * Community-scoped v1 API.
 */

import type { HttpClient } from '../client/http.js';
import type { PackageIdentInput, VersionIdentInput } from '../ident/index.js';
import { intoPackageIdent, intoVersionIdent } from '../ident/index.js';
import { ChunkedJsonParser, parseStream } from '../streaming/index.js';
import type { PackageMetrics, PackageV1 } from '../types/index.js';
import {
  PackageMetricsSchema,
  PackageV1Schema,
  PackageVersionMetricsSchema,
} from '../types/index.js';
import { BaseService } from './base.js';

/**
 * Service for the v1 API of a single community.
 */
export interface CommunityV1Service {
  /**
   * Fetches download and rating metrics of a package.
   */
  getMetrics(community: string, pkg: PackageIdentInput): Promise<PackageMetrics>;

  /**
   * Fetches the download count of one version.
   */
  getDownloads(community: string, version: VersionIdentInput): Promise<number>;

  /**
   * Streams every package listed in a community.
   */
  streamPackagesV1(community: string): AsyncGenerator<PackageV1, void, undefined>;

  /**
   * Fetches every package listed in a community.
   */
  listPackagesV1(community: string): Promise<PackageV1[]>;
}

export class CommunityV1ServiceImpl extends BaseService implements CommunityV1Service {
  constructor(httpClient: HttpClient) {
    super(httpClient);
  }

  async getMetrics(community: string, pkg: PackageIdentInput): Promise<PackageMetrics> {
    const id = intoPackageIdent(pkg);
    return this.httpClient.getJson(
      this.v1(community, `/package-metrics/${id.path()}`),
      PackageMetricsSchema
    );
  }

  async getDownloads(community: string, version: VersionIdentInput): Promise<number> {
    const id = intoVersionIdent(version);
    const metrics = await this.httpClient.getJson(
      this.v1(community, `/package-metrics/${id.path()}`),
      PackageVersionMetricsSchema
    );
    return metrics.downloads;
  }

  async *streamPackagesV1(community: string): AsyncGenerator<PackageV1, void, undefined> {
    const path = this.v1(community, '/package');
    const body = await this.httpClient.getStream(path);
    yield* parseStream(
      body,
      new ChunkedJsonParser(PackageV1Schema),
      this.httpClient.buildUrl(path)
    );
  }

  async listPackagesV1(community: string): Promise<PackageV1[]> {
    const packages: PackageV1[] = [];
    for await (const pkg of this.streamPackagesV1(community)) {
      packages.push(pkg);
    }
    return packages;
  }

  private v1(community: string, path: string): string {
    return `/c/${encodeURIComponent(community)}/api/v1${path}`;
  }
}
