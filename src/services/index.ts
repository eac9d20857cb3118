/**
 * Service exports for the Thunderstore client.
 */

export type { PackagesService } from './packages.js';
export type { PackageIndexService } from './package-index.js';
export type { CommunityV1Service } from './v1.js';
export type { CommunitiesService } from './communities.js';
export type { UserMediaService } from './usermedia.js';
export type { SubmissionService } from './submission.js';
export type { WikiService } from './wiki.js';
export type { ProfilesService } from './profiles.js';
export type { FrontendService } from './frontend.js';
export { PROFILE_DATA_PREFIX, decodeProfile, encodeProfile } from './profiles.js';
