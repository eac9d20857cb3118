/**
 * User media service: multi-part uploads and publishing.
 */

import { basename, extname } from 'node:path';
import type { HttpClient } from '../client/http.js';
import { ThunderstoreError } from '../error/index.js';
import type {
  CompletedPart,
  InitiateUploadResponse,
  PackageMetadata,
  PackageSubmissionResult,
  UploadPartUrl,
  UserMedia,
} from '../types/index.js';
import { InitiateUploadResponseSchema, UserMediaSchema } from '../types/index.js';
import { BaseService } from './base.js';
import { readBytes } from './files.js';
import type { SubmissionService } from './submission.js';

/**
 * Service for uploading package archives.
 *
 * Every operation except {@link uploadPart} requires an API token.
 */
export interface UserMediaService {
  /**
   * Starts an upload of `size` bytes and returns the presigned part URLs.
   */
  initiateUpload(name: string, size: number): Promise<InitiateUploadResponse>;

  /**
   * Cancels an upload.
   */
  abortUpload(uuid: string): Promise<UserMedia>;

  /**
   * Completes an upload from the ETags of its parts.
   */
  finishUpload(uuid: string, parts: readonly CompletedPart[]): Promise<UserMedia>;

  /**
   * PUTs the slice of `data` covered by `part` to its presigned URL.
   */
  uploadPart(part: UploadPartUrl, data: Uint8Array): Promise<CompletedPart>;

  /**
   * Uploads `data` and submits it as a new package version.
   *
   * If a part fails, the upload is aborted and the part's error rethrown.
   */
  publish(name: string, data: Uint8Array, metadata: PackageMetadata): Promise<PackageSubmissionResult>;

  /**
   * Publishes the archive at `path`, named after the file.
   */
  publishFile(path: string, metadata: PackageMetadata): Promise<PackageSubmissionResult>;
}

export class UserMediaServiceImpl extends BaseService implements UserMediaService {
  constructor(
    httpClient: HttpClient,
    private readonly submission: SubmissionService
  ) {
    super(httpClient);
  }

  async initiateUpload(name: string, size: number): Promise<InitiateUploadResponse> {
    return this.httpClient.postJson(
      this.experimental('/usermedia/initiate-upload'),
      { filename: name, file_size_bytes: size },
      InitiateUploadResponseSchema
    );
  }

  async abortUpload(uuid: string): Promise<UserMedia> {
    return this.httpClient.requestJson(
      'POST',
      this.experimental(`/usermedia/${uuid}/abort-upload`),
      UserMediaSchema
    );
  }

  async finishUpload(uuid: string, parts: readonly CompletedPart[]): Promise<UserMedia> {
    return this.httpClient.postJson(
      this.experimental(`/usermedia/${uuid}/finish-upload`),
      { parts },
      UserMediaSchema
    );
  }

  async uploadPart(part: UploadPartUrl, data: Uint8Array): Promise<CompletedPart> {
    const body = data.slice(part.offset, part.offset + part.length);
    const timeout = this.httpClient.getConfig().downloadTimeout;

    return this.httpClient.send('PUT', part.url, { body, timeout, skipAuth: true }, async response => {
      const tag = response.headers.get('ETag');
      if (!tag) {
        throw ThunderstoreError.missingETag(part.part_number);
      }
      return { ETag: tag, PartNumber: part.part_number };
    });
  }

  async publish(
    name: string,
    data: Uint8Array,
    metadata: PackageMetadata
  ): Promise<PackageSubmissionResult> {
    const { userMedia, uploadUrls } = await this.initiateUpload(name, data.byteLength);
    this.logger.info('Upload initiated', { uuid: userMedia.uuid, parts: uploadUrls.length });

    const parts: CompletedPart[] = [];
    try {
      for (const part of uploadUrls) {
        parts.push(await this.uploadPart(part, data));
      }
    } catch (error) {
      await this.abortUpload(userMedia.uuid).catch((abortError: unknown) => {
        this.logger.error('Failed to abort upload', {
          uuid: userMedia.uuid,
          error: String(abortError),
        });
      });
      throw error;
    }

    await this.finishUpload(userMedia.uuid, parts);
    return this.submission.submitPackage(userMedia.uuid, metadata);
  }

  async publishFile(path: string, metadata: PackageMetadata): Promise<PackageSubmissionResult> {
    const name = basename(path, extname(path));
    const data = await readBytes(path);
    return this.publish(name, data, metadata);
  }
}
