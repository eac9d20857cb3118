/**
 * Packages service: metadata, readmes and downloads.
 */

import { join } from 'node:path';
import type { HttpClient } from '../client/http.js';
import type { PackageIdentInput, VersionIdentInput } from '../ident/index.js';
import { intoPackageIdent, intoVersionIdent } from '../ident/index.js';
import type { Package, PackageVersion } from '../types/index.js';
import { MarkdownResponseSchema, PackageSchema, PackageVersionSchema } from '../types/index.js';
import { BaseService } from './base.js';
import { writeBytes } from './files.js';

/**
 * Service for package metadata and archives.
 */
export interface PackagesService {
  /**
   * Fetches a package with its latest version and community listings.
   */
  getPackage(ident: PackageIdentInput): Promise<Package>;

  /**
   * Fetches one version of a package.
   */
  getVersion(ident: VersionIdentInput): Promise<PackageVersion>;

  /**
   * Fetches the README of a version as markdown.
   */
  getReadme(ident: VersionIdentInput): Promise<string>;

  /**
   * Fetches the CHANGELOG of a version as markdown.
   */
  getChangelog(ident: VersionIdentInput): Promise<string>;

  /**
   * Downloads the ZIP archive of a version.
   */
  download(ident: VersionIdentInput): Promise<Uint8Array>;

  /**
   * Downloads the archive of a version to `path`.
   */
  downloadToFile(ident: VersionIdentInput, path: string): Promise<void>;

  /**
   * Downloads the archive of a version into `dir` as `{ident}.zip`.
   * @returns The path of the written file
   */
  downloadToDir(ident: VersionIdentInput, dir: string): Promise<string>;
}

export class PackagesServiceImpl extends BaseService implements PackagesService {
  constructor(httpClient: HttpClient) {
    super(httpClient);
  }

  async getPackage(ident: PackageIdentInput): Promise<Package> {
    const id = intoPackageIdent(ident);
    return this.httpClient.getJson(this.experimental(`/package/${id.path()}`), PackageSchema);
  }

  async getVersion(ident: VersionIdentInput): Promise<PackageVersion> {
    const id = intoVersionIdent(ident);
    return this.httpClient.getJson(this.experimental(`/package/${id.path()}`), PackageVersionSchema);
  }

  async getReadme(ident: VersionIdentInput): Promise<string> {
    return this.getMarkdown(ident, 'readme');
  }

  async getChangelog(ident: VersionIdentInput): Promise<string> {
    return this.getMarkdown(ident, 'changelog');
  }

  async download(ident: VersionIdentInput): Promise<Uint8Array> {
    const id = intoVersionIdent(ident);
    this.logger.info('Downloading package', { version: id.toString() });
    return this.httpClient.getBytes(`/package/download/${id.path()}`);
  }

  async downloadToFile(ident: VersionIdentInput, path: string): Promise<void> {
    const data = await this.download(ident);
    await writeBytes(path, data);
  }

  async downloadToDir(ident: VersionIdentInput, dir: string): Promise<string> {
    const id = intoVersionIdent(ident);
    const path = join(dir, `${id}.zip`);
    await this.downloadToFile(id, path);
    return path;
  }

  private async getMarkdown(ident: VersionIdentInput, kind: 'readme' | 'changelog'): Promise<string> {
    const id = intoVersionIdent(ident);
    const response = await this.httpClient.getJson(
      this.experimental(`/package/${id.path()}/${kind}`),
      MarkdownResponseSchema
    );
    return response.markdown;
  }
}
