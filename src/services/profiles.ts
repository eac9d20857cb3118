/**
 * Legacy mod manager profile sharing.
 *
 * Profiles are stored as text: a `#r2modman` header line followed by the
 * base64 of the profile archive.
 */

import { z } from 'zod';
import type { HttpClient } from '../client/http.js';
import { ThunderstoreError } from '../error/index.js';
import { BaseService } from './base.js';
import { writeBytes } from './files.js';

/**
 * Header line of an encoded profile.
 */
export const PROFILE_DATA_PREFIX = '#r2modman\n';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const CreateProfileResponseSchema = z.object({
  key: z.string(),
});

/**
 * Service for uploading and fetching shared profiles.
 */
export interface ProfilesService {
  /**
   * Encodes and uploads a profile archive.
   * @returns The key to fetch the profile with
   */
  createProfile(data: Uint8Array): Promise<string>;

  /**
   * Uploads already encoded profile data as-is.
   */
  createProfileRaw(data: Uint8Array | string): Promise<string>;

  /**
   * Fetches the stored profile data without decoding it.
   */
  getProfileRaw(key: string): Promise<Uint8Array>;

  /**
   * Fetches and decodes a profile archive.
   */
  getProfile(key: string): Promise<Uint8Array>;

  /**
   * Fetches a profile archive and writes it to `path`.
   */
  saveProfile(key: string, path: string): Promise<void>;
}

/**
 * Encodes a profile archive in the stored format.
 */
export function encodeProfile(data: Uint8Array): string {
  return PROFILE_DATA_PREFIX + Buffer.from(data).toString('base64');
}

/**
 * Decodes stored profile data back to the archive.
 *
 * @throws {ThunderstoreError} `InvalidProfileData` without the header line or
 * with a malformed base64 body
 */
export function decodeProfile(raw: Uint8Array): Uint8Array {
  const text = Buffer.from(raw).toString('utf8');
  if (!text.startsWith(PROFILE_DATA_PREFIX)) {
    throw ThunderstoreError.invalidProfileData();
  }

  const encoded = text.slice(PROFILE_DATA_PREFIX.length).replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(encoded)) {
    throw ThunderstoreError.invalidProfileData();
  }
  return new Uint8Array(Buffer.from(encoded, 'base64'));
}

export class ProfilesServiceImpl extends BaseService implements ProfilesService {
  constructor(httpClient: HttpClient) {
    super(httpClient);
  }

  async createProfile(data: Uint8Array): Promise<string> {
    return this.createProfileRaw(encodeProfile(data));
  }

  async createProfileRaw(data: Uint8Array | string): Promise<string> {
    const body = typeof data === 'string' ? data : data.slice();
    const response = await this.httpClient.requestJson(
      'POST',
      this.experimental('/legacyprofile/create'),
      CreateProfileResponseSchema,
      { body, headers: { 'Content-Type': 'application/octet-stream' } }
    );
    return response.key;
  }

  async getProfileRaw(key: string): Promise<Uint8Array> {
    return this.httpClient.getBytes(
      this.experimental(`/legacyprofile/get/${encodeURIComponent(key)}`)
    );
  }

  async getProfile(key: string): Promise<Uint8Array> {
    return decodeProfile(await this.getProfileRaw(key));
  }

  async saveProfile(key: string, path: string): Promise<void> {
    await writeBytes(path, await this.getProfile(key));
  }
}
