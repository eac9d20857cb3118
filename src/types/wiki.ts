/**
 * Package wiki models.
 * @module types/wiki
 */

import { z } from 'zod';

export const WikiPageSchema = z.object({
  id: z.string(),
  title: z.string(),
  slug: z.string(),
  datetime_created: z.string(),
  datetime_updated: z.string(),
  markdown_content: z.string().nullish(),
});
export type WikiPage = z.infer<typeof WikiPageSchema>;

export const WikiSchema = z.object({
  id: z.string(),
  title: z.string(),
  slug: z.string(),
  datetime_created: z.string(),
  datetime_updated: z.string(),
  pages: z.array(WikiPageSchema),
});
export type Wiki = z.infer<typeof WikiSchema>;

export const WikisResponseSchema = z.object({
  results: z.array(
    z.object({
      namespace: z.string(),
      name: z.string(),
      wiki: WikiSchema,
    })
  ),
  cursor: z.string(),
  has_more: z.boolean(),
});
export type WikisResponse = z.infer<typeof WikisResponseSchema>;

/**
 * Page to create (no `id`) or update.
 */
export interface WikiPageUpsert {
  id?: string;
  title: string;
  markdown_content: string;
}
