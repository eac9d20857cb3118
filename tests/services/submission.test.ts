/**
 * Submission, wiki and frontend service tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ThunderstoreErrorKind } from '../../src/error/index.js';
import { PackageMetadata } from '../../src/types/index.js';
import type { MockHttpClient } from '../../src/__mocks__/index.js';
import type { ThunderstoreClient } from '../../src/client/index.js';
import { BASE_URL, MEDIA_UUID, rejectionOf, setup, submissionResultJson } from '../support/helpers.js';

function wikiPageJson(id: string, title: string) {
  return {
    id,
    title,
    slug: title.toLowerCase().replace(/\s+/g, '-'),
    datetime_created: '2024-03-01T00:00:00Z',
    datetime_updated: '2024-03-02T00:00:00Z',
    markdown_content: `# ${title}`,
  };
}

describe('SubmissionService', () => {
  let mock: MockHttpClient;
  let client: ThunderstoreClient;

  beforeEach(() => {
    ({ mock, client } = setup());
  });

  it('should submit package metadata for an upload', async () => {
    mock.enqueueJsonResponse(200, submissionResultJson('Author-MyMod-1.0.0'));
    const metadata = new PackageMetadata('Author')
      .inCommunities(['riskofrain2', 'lethal-company'])
      .withGlobalCategories(['tools'])
      .hasNsfwContent();

    await client.submission.submitPackage(MEDIA_UUID, metadata);

    mock.verifyRequest(0, 'POST', `${BASE_URL}/api/experimental/submission/submit`);
    expect(mock.getJsonBody(0)).toEqual({
      author_name: 'Author',
      categories: ['tools'],
      communities: ['riskofrain2', 'lethal-company'],
      has_nsfw_content: true,
      community_categories: {},
      upload_uuid: MEDIA_UUID,
    });
  });

  it('should send icons as base64', async () => {
    mock.enqueueJsonResponse(200, { success: true });

    const valid = await client.submission.validateIcon(new Uint8Array([1, 2, 3]));

    expect(valid).toBe(true);
    mock.verifyRequest(0, 'POST', `${BASE_URL}/api/experimental/submission/validate/icon`);
    expect(mock.getJsonBody(0)).toEqual({ icon_data: 'AQID' });
  });

  it('should validate a manifest for a namespace', async () => {
    mock.enqueueJsonResponse(200, { success: true });

    await client.submission.validateManifestV1('Author', '{"name":"MyMod"}');

    mock.verifyRequest(0, 'POST', `${BASE_URL}/api/experimental/submission/validate/manifest-v1`);
    expect(mock.getJsonBody(0)).toEqual({ namespace: 'Author', manifest_data: '{"name":"MyMod"}' });
  });

  it('should surface validation errors', async () => {
    mock.enqueueJsonResponse(400, { non_field_errors: ['README is empty'] });

    const error = await rejectionOf(client.submission.validateReadme(''));

    expect(error.kind).toBe(ThunderstoreErrorKind.BadRequest);
    expect(error.message).toBe('README is empty');
    expect(mock.getJsonBody(0)).toEqual({ readme_data: '' });
  });
});

describe('WikiService', () => {
  let mock: MockHttpClient;
  let client: ThunderstoreClient;

  beforeEach(() => {
    ({ mock, client } = setup());
  });

  it('should list wikis', async () => {
    mock.enqueueJsonResponse(200, {
      results: [
        {
          namespace: 'Author',
          name: 'MyMod',
          wiki: {
            id: '1',
            title: 'MyMod',
            slug: 'mymod',
            datetime_created: '2024-03-01T00:00:00Z',
            datetime_updated: '2024-03-02T00:00:00Z',
            pages: [wikiPageJson('12', 'Getting Started')],
          },
        },
      ],
      cursor: '2024-03-02T00:00:00Z',
      has_more: false,
    });

    const wikis = await client.wiki.getWikis();

    mock.verifyRequest(0, 'GET', `${BASE_URL}/api/experimental/package/wikis`);
    expect(wikis.results[0]?.wiki.pages[0]?.slug).toBe('getting-started');
    expect(wikis.has_more).toBe(false);
  });

  it('should fetch the wiki of a package', async () => {
    mock.enqueueJsonResponse(200, {
      id: '1',
      title: 'MyMod',
      slug: 'mymod',
      datetime_created: '2024-03-01T00:00:00Z',
      datetime_updated: '2024-03-02T00:00:00Z',
      pages: [],
    });

    const wiki = await client.wiki.getWiki('Author-MyMod');

    mock.verifyRequest(0, 'GET', `${BASE_URL}/api/experimental/package/Author/MyMod/wiki`);
    expect(wiki.pages).toEqual([]);
  });

  it('should create a page without an id', async () => {
    mock.enqueueJsonResponse(200, wikiPageJson('12', 'Install'));

    const page = await client.wiki.createWikiPage('Author-MyMod', 'Install', '# Install');

    mock.verifyRequest(0, 'POST', `${BASE_URL}/api/experimental/package/Author/MyMod/wiki`);
    expect(mock.getJsonBody(0)).toEqual({ title: 'Install', markdown_content: '# Install' });
    expect(page.id).toBe('12');
  });

  it('should update a page by id', async () => {
    mock.enqueueJsonResponse(200, wikiPageJson('12', 'Install'));

    await client.wiki.updateWikiPage(['Author', 'MyMod'], '12', 'Install', 'Updated');

    expect(mock.getJsonBody(0)).toEqual({ id: '12', title: 'Install', markdown_content: 'Updated' });
  });

  it('should delete a page', async () => {
    mock.enqueueResponse({ status: 204 });

    await client.wiki.deleteWikiPage('Author-MyMod', '12');

    mock.verifyRequest(0, 'DELETE', `${BASE_URL}/api/experimental/package/Author/MyMod/wiki`);
    expect(mock.getJsonBody(0)).toEqual({ id: '12' });
  });

  it('should fetch a single page', async () => {
    mock.enqueueJsonResponse(200, wikiPageJson('12', 'Install'));

    const page = await client.wiki.getWikiPage('12');

    mock.verifyRequest(0, 'GET', `${BASE_URL}/api/experimental/wiki/page/12`);
    expect(page.markdown_content).toBe('# Install');
  });
});

describe('FrontendService', () => {
  it('should render markdown to HTML', async () => {
    const { mock, client } = setup();
    mock.enqueueJsonResponse(200, { html: '<h1>Hi</h1>' });

    const html = await client.frontend.renderMarkdown('# Hi');

    expect(html).toBe('<h1>Hi</h1>');
    mock.verifyRequest(0, 'POST', `${BASE_URL}/api/experimental/frontend/render-markdown`);
    expect(mock.getJsonBody(0)).toEqual({ markdown: '# Hi' });
  });
});
