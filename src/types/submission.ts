/**
 * Package submission models.
 * @module types/submission
 */

import { z } from 'zod';
import { CommunityCategorySchema, CommunitySchema } from './community.js';
import { PackageVersionSchema } from './package.js';

export const AvailableCommunitySchema = z.object({
  community: CommunitySchema,
  categories: z.array(CommunityCategorySchema),
  url: z.string(),
});
export type AvailableCommunity = z.infer<typeof AvailableCommunitySchema>;

export const PackageSubmissionResultSchema = z.object({
  package_version: PackageVersionSchema,
  available_communities: z.array(AvailableCommunitySchema),
});
export type PackageSubmissionResult = z.infer<typeof PackageSubmissionResultSchema>;

export const ValidatorResponseSchema = z.object({
  success: z.boolean(),
});

/**
 * Wire form of {@link PackageMetadata}.
 */
export interface PackageMetadataBody {
  author_name: string;
  categories: string[];
  communities: string[];
  has_nsfw_content: boolean;
  community_categories: Record<string, string[]>;
  upload_uuid?: string;
}

/**
 * Metadata submitted alongside an uploaded package archive.
 *
 * @example
 * ```typescript
 * const metadata = new PackageMetadata('Author', ['lethal-company'])
 *   .withCategories('lethal-company', ['mods', 'tools']);
 * ```
 */
export class PackageMetadata {
  private readonly author: string;
  private readonly communities: string[];
  private readonly globalCategories: string[] = [];
  private readonly communityCategories = new Map<string, string[]>();
  private nsfw = false;

  constructor(author: string, communities: Iterable<string> = []) {
    this.author = author;
    this.communities = [...communities];
  }

  /**
   * Adds categories that apply regardless of community.
   */
  withGlobalCategories(categories: Iterable<string>): this {
    this.globalCategories.push(...categories);
    return this;
  }

  inCommunity(community: string): this {
    this.communities.push(community);
    return this;
  }

  inCommunities(communities: Iterable<string>): this {
    this.communities.push(...communities);
    return this;
  }

  hasNsfwContent(value = true): this {
    this.nsfw = value;
    return this;
  }

  /**
   * Sets the categories of the package within `community`.
   */
  withCategories(community: string, categories: Iterable<string>): this {
    this.communityCategories.set(community, [...categories]);
    return this;
  }

  toBody(uploadUuid?: string): PackageMetadataBody {
    return {
      author_name: this.author,
      categories: [...this.globalCategories],
      communities: [...this.communities],
      has_nsfw_content: this.nsfw,
      community_categories: Object.fromEntries(this.communityCategories),
      upload_uuid: uploadUuid,
    };
  }
}
