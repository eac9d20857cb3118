/**
 * Package index service.
 */

import type { HttpClient } from '../client/http.js';
import { NdjsonParser, parseStream } from '../streaming/index.js';
import type { PackageIndexEntry } from '../types/index.js';
import { PackageIndexEntrySchema } from '../types/index.js';
import { BaseService } from './base.js';

/**
 * Service for the index of every package version in the repository.
 */
export interface PackageIndexService {
  /**
   * Streams the index one entry at a time.
   *
   * The index is large; prefer this over {@link getPackageIndex}.
   */
  streamPackageIndex(): AsyncGenerator<PackageIndexEntry, void, undefined>;

  /**
   * Fetches the whole index.
   */
  getPackageIndex(): Promise<PackageIndexEntry[]>;
}

export class PackageIndexServiceImpl extends BaseService implements PackageIndexService {
  constructor(httpClient: HttpClient) {
    super(httpClient);
  }

  async *streamPackageIndex(): AsyncGenerator<PackageIndexEntry, void, undefined> {
    const path = this.experimental('/package-index');
    const body = await this.httpClient.getStream(path);
    yield* parseStream(
      body,
      new NdjsonParser(PackageIndexEntrySchema),
      this.httpClient.buildUrl(path)
    );
  }

  async getPackageIndex(): Promise<PackageIndexEntry[]> {
    const entries: PackageIndexEntry[] = [];
    for await (const entry of this.streamPackageIndex()) {
      entries.push(entry);
    }
    return entries;
  }
}
