/**
 * Communities service.
 */

import type { HttpClient } from '../client/http.js';
import type { Community, CommunityCategory, CursorState, Page } from '../types/index.js';
import { CommunityCategorySchema, CommunitySchema, paginatedSchema } from '../types/index.js';
import { BaseService } from './base.js';

const CommunityPageSchema = paginatedSchema(CommunitySchema);
const CategoryPageSchema = paginatedSchema(CommunityCategorySchema);

/**
 * Service for communities and their categories.
 */
export interface CommunitiesService {
  /**
   * Fetches a page of communities, starting at `cursor` if given.
   */
  getCommunities(cursor?: string): Promise<Page<Community>>;

  /**
   * Fetches a page of the categories of a community.
   */
  getCategories(community: string, cursor?: string): Promise<Page<CommunityCategory>>;

  /**
   * Fetches the community the repository is serving by default.
   */
  getCurrentCommunity(): Promise<Community>;
}

export class CommunitiesServiceImpl extends BaseService implements CommunitiesService {
  constructor(httpClient: HttpClient) {
    super(httpClient);
  }

  async getCommunities(cursor?: string): Promise<Page<Community>> {
    const response = await this.httpClient.getJson(
      this.experimental('/community'),
      CommunityPageSchema,
      { query: { cursor } }
    );
    return { cursor: this.cursorState(response.pagination), items: response.results };
  }

  async getCategories(community: string, cursor?: string): Promise<Page<CommunityCategory>> {
    const response = await this.httpClient.getJson(
      this.experimental(`/community/${encodeURIComponent(community)}`),
      CategoryPageSchema,
      { query: { cursor } }
    );
    return { cursor: this.cursorState(response.pagination), items: response.results };
  }

  async getCurrentCommunity(): Promise<Community> {
    return this.httpClient.getJson(this.experimental('/current-community'), CommunitySchema);
  }

  private cursorState(pagination: {
    next_link?: string | null;
    previous_link?: string | null;
  }): CursorState {
    return {
      next: this.cursorOf(pagination.next_link),
      prev: this.cursorOf(pagination.previous_link),
    };
  }

  /**
   * Extracts the `cursor` query parameter of a pagination link.
   */
  private cursorOf(link: string | null | undefined): string | undefined {
    if (!link) {
      return undefined;
    }
    const url = new URL(link, this.httpClient.buildUrl('/'));
    return url.searchParams.get('cursor') ?? undefined;
  }
}
