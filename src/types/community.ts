/**
 * Community models.
 * @module types/community
 */

import { z } from 'zod';

export const CommunitySchema = z.object({
  identifier: z.string(),
  name: z.string(),
  discord_url: z.string().nullish(),
  wiki_url: z.string().nullish(),
  require_package_listing_approval: z.boolean(),
});
export type Community = z.infer<typeof CommunitySchema>;

export const CommunityCategorySchema = z.object({
  name: z.string(),
  slug: z.string(),
});
export type CommunityCategory = z.infer<typeof CommunityCategorySchema>;

/**
 * Wraps a schema in the paginated envelope of list endpoints.
 */
export function paginatedSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    pagination: z.object({
      next_link: z.string().nullish(),
      previous_link: z.string().nullish(),
    }),
    results: z.array(item),
  });
}

/**
 * Cursors for the neighbouring pages of a list.
 */
export interface CursorState {
  readonly next?: string;
  readonly prev?: string;
}

/**
 * One page of a cursor-paginated list.
 */
export interface Page<T> {
  readonly cursor: CursorState;
  readonly items: T[];
}
