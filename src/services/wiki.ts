/**
 * Package wiki service.
 */

import type { HttpClient } from '../client/http.js';
import type { PackageIdentInput } from '../ident/index.js';
import { intoPackageIdent } from '../ident/index.js';
import type { Wiki, WikiPage, WikiPageUpsert, WikisResponse } from '../types/index.js';
import { WikiPageSchema, WikiSchema, WikisResponseSchema } from '../types/index.js';
import { BaseService } from './base.js';

/**
 * Service for package wikis. Writes require an API token.
 */
export interface WikiService {
  /**
   * Fetches the index of every package wiki.
   */
  getWikis(): Promise<WikisResponse>;

  getWiki(pkg: PackageIdentInput): Promise<Wiki>;

  createWikiPage(pkg: PackageIdentInput, title: string, content: string): Promise<WikiPage>;

  updateWikiPage(
    pkg: PackageIdentInput,
    id: string,
    title: string,
    content: string
  ): Promise<WikiPage>;

  /**
   * Creates the page when `upsert.id` is absent, otherwise updates it.
   */
  upsertWikiPage(pkg: PackageIdentInput, upsert: WikiPageUpsert): Promise<WikiPage>;

  deleteWikiPage(pkg: PackageIdentInput, id: string): Promise<void>;

  getWikiPage(id: string): Promise<WikiPage>;
}

export class WikiServiceImpl extends BaseService implements WikiService {
  constructor(httpClient: HttpClient) {
    super(httpClient);
  }

  async getWikis(): Promise<WikisResponse> {
    return this.httpClient.getJson(this.experimental('/package/wikis'), WikisResponseSchema);
  }

  async getWiki(pkg: PackageIdentInput): Promise<Wiki> {
    return this.httpClient.getJson(this.wikiPath(pkg), WikiSchema);
  }

  async createWikiPage(pkg: PackageIdentInput, title: string, content: string): Promise<WikiPage> {
    return this.upsertWikiPage(pkg, { title, markdown_content: content });
  }

  async updateWikiPage(
    pkg: PackageIdentInput,
    id: string,
    title: string,
    content: string
  ): Promise<WikiPage> {
    return this.upsertWikiPage(pkg, { id, title, markdown_content: content });
  }

  async upsertWikiPage(pkg: PackageIdentInput, upsert: WikiPageUpsert): Promise<WikiPage> {
    return this.httpClient.postJson(this.wikiPath(pkg), upsert, WikiPageSchema);
  }

  async deleteWikiPage(pkg: PackageIdentInput, id: string): Promise<void> {
    await this.httpClient.send(
      'DELETE',
      this.wikiPath(pkg),
      {
        body: JSON.stringify({ id }),
        headers: { 'Content-Type': 'application/json' },
      },
      async response => {
        await response.arrayBuffer();
      }
    );
  }

  async getWikiPage(id: string): Promise<WikiPage> {
    return this.httpClient.getJson(
      this.experimental(`/wiki/page/${encodeURIComponent(id)}`),
      WikiPageSchema
    );
  }

  private wikiPath(pkg: PackageIdentInput): string {
    return this.experimental(`/package/${intoPackageIdent(pkg).path()}/wiki`);
  }
}
