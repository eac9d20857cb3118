/**
 * User media service tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createClient, type ThunderstoreClient } from '../../src/client/index.js';
import { ThunderstoreConfig } from '../../src/config/index.js';
import { ThunderstoreErrorKind } from '../../src/error/index.js';
import type { Logger } from '../../src/observability/index.js';
import { PackageMetadata } from '../../src/types/index.js';
import { MockHttpClient, createMockFetch } from '../../src/__mocks__/index.js';
import {
  BASE_URL,
  MEDIA_UUID,
  TOKEN,
  rejectionOf,
  setup,
  submissionResultJson,
  userMediaJson,
} from '../support/helpers.js';

const PART_1 = 'https://storage.example.com/upload?part=1';
const PART_2 = 'https://storage.example.com/upload?part=2';

const DATA = new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);

function enqueueInitiate(mock: MockHttpClient): void {
  mock.enqueueJsonResponse(201, {
    user_media: userMediaJson('upload_initiated'),
    upload_urls: [
      { part_number: 1, url: PART_1, offset: 0, length: 6 },
      { part_number: 2, url: PART_2, offset: 6, length: 4 },
    ],
  });
}

function enqueuePart(mock: MockHttpClient, etag: string): void {
  mock.enqueueResponse({ status: 200, headers: { ETag: etag } });
}

function metadata(): PackageMetadata {
  return new PackageMetadata('Author', ['lethal-company']).withCategories('lethal-company', ['mods']);
}

describe('UserMediaService', () => {
  let mock: MockHttpClient;
  let client: ThunderstoreClient;

  beforeEach(() => {
    ({ mock, client } = setup());
  });

  describe('initiateUpload', () => {
    it('should send the file name and size', async () => {
      enqueueInitiate(mock);

      const response = await client.usermedia.initiateUpload('MyMod', 10);

      mock.verifyRequest(0, 'POST', `${BASE_URL}/api/experimental/usermedia/initiate-upload`);
      mock.verifyHeader(0, 'Authorization', `Bearer ${TOKEN}`);
      expect(mock.getJsonBody(0)).toEqual({ filename: 'MyMod', file_size_bytes: 10 });
      expect(response.userMedia.uuid).toBe(MEDIA_UUID);
      expect(response.uploadUrls.map(p => p.part_number)).toEqual([1, 2]);
    });
  });

  describe('uploadPart', () => {
    it('should PUT the slice of the data without the token', async () => {
      enqueuePart(mock, '"etag-2"');

      const part = await client.usermedia.uploadPart(
        { part_number: 2, url: PART_2, offset: 6, length: 4 },
        DATA
      );

      expect(part).toEqual({ ETag: '"etag-2"', PartNumber: 2 });
      mock.verifyRequest(0, 'PUT', PART_2);
      mock.verifyHeader(0, 'Authorization', null);
      expect(mock.getRequest(0).options.body).toEqual(new Uint8Array([6, 7, 8, 9]));
    });

    it('should fail when the storage returns no ETag', async () => {
      mock.enqueueResponse({ status: 200 });

      const error = await rejectionOf(
        client.usermedia.uploadPart({ part_number: 1, url: PART_1, offset: 0, length: 6 }, DATA)
      );

      expect(error.kind).toBe(ThunderstoreErrorKind.MissingETag);
      expect(error.context).toEqual({ partNumber: 1 });
    });
  });

  describe('abortUpload and finishUpload', () => {
    it('should abort an upload', async () => {
      mock.enqueueJsonResponse(200, userMediaJson('upload_aborted'));

      const media = await client.usermedia.abortUpload(MEDIA_UUID);

      mock.verifyRequest(
        0,
        'POST',
        `${BASE_URL}/api/experimental/usermedia/${MEDIA_UUID}/abort-upload`
      );
      expect(media.status).toBe('upload_aborted');
    });

    it('should send the completed parts', async () => {
      mock.enqueueJsonResponse(200, userMediaJson('upload_complete'));

      await client.usermedia.finishUpload(MEDIA_UUID, [{ ETag: '"a"', PartNumber: 1 }]);

      mock.verifyRequest(
        0,
        'POST',
        `${BASE_URL}/api/experimental/usermedia/${MEDIA_UUID}/finish-upload`
      );
      expect(mock.getJsonBody(0)).toEqual({ parts: [{ ETag: '"a"', PartNumber: 1 }] });
    });
  });

  describe('publish', () => {
    it('should upload every part, finish and submit', async () => {
      enqueueInitiate(mock);
      enqueuePart(mock, '"etag-1"');
      enqueuePart(mock, '"etag-2"');
      mock.enqueueJsonResponse(200, userMediaJson('upload_complete'));
      mock.enqueueJsonResponse(200, submissionResultJson('Author-MyMod-1.0.0'));

      const result = await client.usermedia.publish('MyMod', DATA, metadata());

      mock.verifyRequestCount(5);
      mock.verifyRequest(1, 'PUT', PART_1);
      expect(mock.getRequest(1).options.body).toEqual(new Uint8Array([0, 1, 2, 3, 4, 5]));
      mock.verifyRequest(2, 'PUT', PART_2);
      expect(mock.getJsonBody(3)).toEqual({
        parts: [
          { ETag: '"etag-1"', PartNumber: 1 },
          { ETag: '"etag-2"', PartNumber: 2 },
        ],
      });
      mock.verifyRequest(4, 'POST', `${BASE_URL}/api/experimental/submission/submit`);
      expect(mock.getJsonBody(4)).toEqual({
        author_name: 'Author',
        categories: [],
        communities: ['lethal-company'],
        has_nsfw_content: false,
        community_categories: { 'lethal-company': ['mods'] },
        upload_uuid: MEDIA_UUID,
      });
      expect(result.package_version.full_name.toString()).toBe('Author-MyMod-1.0.0');
      expect(result.available_communities[0]?.community.identifier).toBe('lethal-company');
    });

    it('should abort the upload and rethrow when a part fails', async () => {
      enqueueInitiate(mock);
      enqueuePart(mock, '"etag-1"');
      mock.enqueueErrorResponse(503, 'Slow down');
      mock.enqueueJsonResponse(200, userMediaJson('upload_aborted'));

      const error = await rejectionOf(client.usermedia.publish('MyMod', DATA, metadata()));

      expect(error.kind).toBe(ThunderstoreErrorKind.ServerError);
      expect(error.message).toBe('Slow down');
      mock.verifyRequestCount(4);
      mock.verifyRequest(
        3,
        'POST',
        `${BASE_URL}/api/experimental/usermedia/${MEDIA_UUID}/abort-upload`
      );
    });

    it('should log a failed abort and still rethrow the part error', async () => {
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const logged = new MockHttpClient();
      const loggedClient = createClient(ThunderstoreConfig.builder().token(TOKEN).build(), {
        fetch: createMockFetch(logged),
        logger,
      });
      enqueueInitiate(logged);
      logged.enqueueResponse({ status: 200 });
      logged.enqueueFailure(new TypeError('fetch failed'));

      const error = await rejectionOf(loggedClient.usermedia.publish('MyMod', DATA, metadata()));

      expect(error.kind).toBe(ThunderstoreErrorKind.MissingETag);
      expect(logger.error).toHaveBeenCalledWith('Failed to abort upload', {
        uuid: MEDIA_UUID,
        error: '[connection_failed] Request failed: fetch failed',
      });
    });
  });

  describe('publishFile', () => {
    it('should name the upload after the file', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'thunderstore-test-'));
      try {
        const path = join(dir, 'MyMod.zip');
        await writeFile(path, DATA);
        enqueueInitiate(mock);
        enqueuePart(mock, '"etag-1"');
        enqueuePart(mock, '"etag-2"');
        mock.enqueueJsonResponse(200, userMediaJson('upload_complete'));
        mock.enqueueJsonResponse(200, submissionResultJson('Author-MyMod-1.0.0'));

        await client.usermedia.publishFile(path, metadata());

        expect(mock.getJsonBody(0)).toEqual({ filename: 'MyMod', file_size_bytes: 10 });
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('should report a missing file as an I/O error', async () => {
      const error = await rejectionOf(
        client.usermedia.publishFile(join(tmpdir(), 'does-not-exist', 'MyMod.zip'), metadata())
      );

      expect(error.kind).toBe(ThunderstoreErrorKind.Io);
      mock.verifyRequestCount(0);
    });
  });
});
