/**
 * Package submission and validation service.
 */

import type { HttpClient } from '../client/http.js';
import type { PackageMetadata, PackageSubmissionResult } from '../types/index.js';
import { PackageSubmissionResultSchema, ValidatorResponseSchema } from '../types/index.js';
import { BaseService } from './base.js';

/**
 * Service for submitting uploaded packages and validating their parts.
 */
export interface SubmissionService {
  /**
   * Submits an uploaded archive as a new package version.
   *
   * Requires an API token.
   */
  submitPackage(uploadUuid: string, metadata: PackageMetadata): Promise<PackageSubmissionResult>;

  /**
   * Checks whether `data` is an acceptable package icon.
   */
  validateIcon(data: Uint8Array): Promise<boolean>;

  /**
   * Checks a `manifest.json` for the given team namespace.
   */
  validateManifestV1(namespace: string, content: string): Promise<boolean>;

  /**
   * Checks a README.
   */
  validateReadme(content: string): Promise<boolean>;
}

export class SubmissionServiceImpl extends BaseService implements SubmissionService {
  constructor(httpClient: HttpClient) {
    super(httpClient);
  }

  async submitPackage(
    uploadUuid: string,
    metadata: PackageMetadata
  ): Promise<PackageSubmissionResult> {
    return this.httpClient.postJson(
      this.experimental('/submission/submit'),
      metadata.toBody(uploadUuid),
      PackageSubmissionResultSchema
    );
  }

  async validateIcon(data: Uint8Array): Promise<boolean> {
    return this.validate('icon', { icon_data: Buffer.from(data).toString('base64') });
  }

  async validateManifestV1(namespace: string, content: string): Promise<boolean> {
    return this.validate('manifest-v1', { namespace, manifest_data: content });
  }

  async validateReadme(content: string): Promise<boolean> {
    return this.validate('readme', { readme_data: content });
  }

  private async validate(kind: string, body: Record<string, string>): Promise<boolean> {
    const response = await this.httpClient.postJson(
      this.experimental(`/submission/validate/${kind}`),
      body,
      ValidatorResponseSchema
    );
    return response.success;
  }
}
