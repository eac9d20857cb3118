/**
 * User media (multi-part upload) models.
 * @module types/usermedia
 */

import { z } from 'zod';

export const UserMediaStatusSchema = z.enum([
  'initial',
  'upload_initiated',
  'upload_created',
  'upload_error',
  'upload_complete',
  'upload_aborted',
]);
export type UserMediaStatus = z.infer<typeof UserMediaStatusSchema>;

export const UserMediaSchema = z.object({
  uuid: z.string().uuid(),
  filename: z.string(),
  size: z.number().int().nonnegative(),
  datetime_created: z.string(),
  expiry: z.string().nullish(),
  status: UserMediaStatusSchema,
});
export type UserMedia = z.infer<typeof UserMediaSchema>;

/**
 * Presigned URL for one part of an upload, covering
 * `[offset, offset + length)` of the file.
 */
export const UploadPartUrlSchema = z.object({
  part_number: z.number().int().positive(),
  url: z.string().url(),
  offset: z.number().int().nonnegative(),
  length: z.number().int().nonnegative(),
});
export type UploadPartUrl = z.infer<typeof UploadPartUrlSchema>;

export const InitiateUploadResponseSchema = z
  .object({
    user_media: UserMediaSchema,
    upload_urls: z.array(UploadPartUrlSchema),
  })
  .transform(r => ({ userMedia: r.user_media, uploadUrls: r.upload_urls }));
export type InitiateUploadResponse = z.infer<typeof InitiateUploadResponseSchema>;

/**
 * A part that has been uploaded, identified by the ETag the storage
 * returned for it.
 */
export interface CompletedPart {
  readonly ETag: string;
  readonly PartNumber: number;
}
