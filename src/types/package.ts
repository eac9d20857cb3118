/**
 * Package and version models.
 * @module types/package
 */

import { z } from 'zod';
import { PackageIdentSchema, VersionIdentSchema } from './ident.js';

/**
 * Review state of a package listing in a community.
 */
export const ReviewStatusSchema = z.enum(['unreviewed', 'approved', 'rejected']);
export type ReviewStatus = z.infer<typeof ReviewStatusSchema>;

/**
 * Listing of a package in one community.
 */
export const PackageListingSchema = z.object({
  has_nsfw_content: z.boolean(),
  categories: z.array(z.string()),
  community: z.string(),
  review_status: ReviewStatusSchema,
});
export type PackageListing = z.infer<typeof PackageListingSchema>;

/**
 * Version as returned by the experimental API.
 */
export const PackageVersionSchema = z.object({
  full_name: VersionIdentSchema,
  description: z.string(),
  icon: z.string(),
  dependencies: z.array(VersionIdentSchema),
  download_url: z.string(),
  downloads: z.number().int().nonnegative(),
  date_created: z.string(),
  website_url: z.string(),
  is_active: z.boolean(),
});
export type PackageVersion = z.infer<typeof PackageVersionSchema>;

/**
 * Package as returned by the experimental API.
 */
export const PackageSchema = z.object({
  full_name: PackageIdentSchema,
  package_url: z.string(),
  date_created: z.string(),
  date_updated: z.string(),
  rating_score: z.number().int(),
  is_pinned: z.boolean(),
  is_deprecated: z.boolean(),
  total_downloads: z.number().int().nonnegative(),
  latest: PackageVersionSchema,
  community_listings: z.array(PackageListingSchema),
});
export type Package = z.infer<typeof PackageSchema>;

/**
 * Version as listed by the community v1 API.
 */
export const PackageVersionV1Schema = z.object({
  uuid4: z.string().uuid(),
  name: z.string(),
  version_number: z.string(),
  full_name: VersionIdentSchema,
  date_created: z.string(),
  dependencies: z.array(VersionIdentSchema),
  description: z.string(),
  download_url: z.string(),
  downloads: z.number().int().nonnegative(),
  file_size: z.number().int().nonnegative(),
  icon: z.string(),
  is_active: z.boolean(),
  website_url: z.string(),
});
export type PackageVersionV1 = z.infer<typeof PackageVersionV1Schema>;

/**
 * Package as listed by the community v1 API. Versions are newest first.
 */
export const PackageV1Schema = z.object({
  uuid4: z.string().uuid(),
  owner: z.string(),
  name: z.string(),
  full_name: PackageIdentSchema,
  categories: z.array(z.string()),
  date_created: z.string(),
  date_updated: z.string(),
  donation_link: z.string().nullish(),
  has_nsfw_content: z.boolean(),
  is_deprecated: z.boolean(),
  is_pinned: z.boolean(),
  package_url: z.string(),
  rating_score: z.number().int(),
  versions: z.array(PackageVersionV1Schema),
});
export type PackageV1 = z.infer<typeof PackageV1Schema>;

/**
 * The newest version of a package, if it has any.
 */
export function latestVersion(pkg: PackageV1): PackageVersionV1 | undefined {
  return pkg.versions[0];
}

export function isModpack(pkg: PackageV1): boolean {
  return pkg.categories.includes('Modpacks');
}

export function versionById(pkg: PackageV1, uuid: string): PackageVersionV1 | undefined {
  return pkg.versions.find(v => v.uuid4 === uuid);
}

export function versionByNumber(pkg: PackageV1, version: string): PackageVersionV1 | undefined {
  return pkg.versions.find(v => v.version_number === version);
}

/**
 * Sum of the download counts of every version.
 */
export function totalDownloads(pkg: PackageV1): number {
  return pkg.versions.reduce((sum, v) => sum + v.downloads, 0);
}

/**
 * One line of the package index.
 */
export const PackageIndexEntrySchema = z.object({
  namespace: z.string(),
  name: z.string(),
  version_number: z.string(),
  file_format: z.string().nullish(),
  file_size: z.number().int().nonnegative(),
  dependencies: z.array(z.string()),
});
export type PackageIndexEntry = z.infer<typeof PackageIndexEntrySchema>;

/**
 * Package metrics from the community v1 API.
 */
export const PackageMetricsSchema = z
  .object({
    downloads: z.number().int().nonnegative(),
    rating_score: z.number().int(),
    latest_version: z.string(),
  })
  .transform(m => ({
    downloads: m.downloads,
    ratingScore: m.rating_score,
    latestVersion: m.latest_version,
  }));
export type PackageMetrics = z.infer<typeof PackageMetricsSchema>;

export const PackageVersionMetricsSchema = z.object({
  downloads: z.number().int().nonnegative(),
});

/**
 * Body of the readme and changelog endpoints.
 */
export const MarkdownResponseSchema = z.object({
  markdown: z.string(),
});
