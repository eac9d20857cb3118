/**
 * Shared test setup: a client wired to a mock transport, and fixtures.
 */

import { createClient, type ThunderstoreClient } from '../../src/client/index.js';
import { ThunderstoreConfig } from '../../src/config/index.js';
import { ThunderstoreError } from '../../src/error/index.js';
import { MockHttpClient, createMockFetch } from '../../src/__mocks__/index.js';

export const BASE_URL = 'https://thunderstore.io';
export const TOKEN = 'test-secret';

export const MEDIA_UUID = '3f2b8c1e-5d4a-4b6c-9e8f-0a1b2c3d4e5f';
export const PACKAGE_UUID = '7c9e6679-7425-40de-944b-e07fc1f90ae7';
export const VERSION_UUID = '9b2f4a10-1c3d-4e5f-8a6b-7c8d9e0f1a2b';

export interface TestContext {
  mock: MockHttpClient;
  client: ThunderstoreClient;
}

export function setup(): TestContext {
  const mock = new MockHttpClient();
  const client = createClient(ThunderstoreConfig.builder().token(TOKEN).build(), {
    fetch: createMockFetch(mock),
  });
  return { mock, client };
}

/**
 * Awaits `promise` and returns the ThunderstoreError it rejects with.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<ThunderstoreError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ThunderstoreError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

export function versionJson(fullName: string, overrides: Record<string, unknown> = {}) {
  return {
    full_name: fullName,
    description: 'A test package',
    icon: `${BASE_URL}/icons/${fullName}.png`,
    dependencies: ['BepInEx-BepInExPack-5.4.2100'],
    download_url: `${BASE_URL}/package/download/${fullName.split('-').join('/')}/`,
    downloads: 120,
    date_created: '2024-01-02T03:04:05Z',
    website_url: '',
    is_active: true,
    ...overrides,
  };
}

export function packageJson(fullName: string, latest: string) {
  return {
    full_name: fullName,
    package_url: `${BASE_URL}/package/${fullName.split('-').join('/')}/`,
    date_created: '2024-01-01T00:00:00Z',
    date_updated: '2024-01-02T03:04:05Z',
    rating_score: 7,
    is_pinned: false,
    is_deprecated: false,
    total_downloads: 450,
    latest: versionJson(latest),
    community_listings: [
      {
        has_nsfw_content: false,
        categories: ['mods'],
        community: 'lethal-company',
        review_status: 'approved',
      },
    ],
  };
}

export function userMediaJson(status: string) {
  return {
    uuid: MEDIA_UUID,
    filename: 'MyMod',
    size: 10,
    datetime_created: '2024-01-01T00:00:00Z',
    expiry: null,
    status,
  };
}

export function submissionResultJson(fullName: string) {
  return {
    package_version: versionJson(fullName),
    available_communities: [
      {
        community: {
          identifier: 'lethal-company',
          name: 'Lethal Company',
          discord_url: null,
          wiki_url: null,
          require_package_listing_approval: false,
        },
        categories: [{ name: 'Mods', slug: 'mods' }],
        url: `${BASE_URL}/c/lethal-company/p/Author/MyMod/`,
      },
    ],
  };
}
