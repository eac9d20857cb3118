/**
 * Frontend helpers exposed by the experimental API.
 */

import { z } from 'zod';
import type { HttpClient } from '../client/http.js';
import { BaseService } from './base.js';

const RenderMarkdownResponseSchema = z.object({
  html: z.string(),
});

export interface FrontendService {
  /**
   * Renders markdown to HTML the way the site does.
   */
  renderMarkdown(markdown: string): Promise<string>;
}

export class FrontendServiceImpl extends BaseService implements FrontendService {
  constructor(httpClient: HttpClient) {
    super(httpClient);
  }

  async renderMarkdown(markdown: string): Promise<string> {
    const response = await this.httpClient.postJson(
      this.experimental('/frontend/render-markdown'),
      { markdown },
      RenderMarkdownResponseSchema
    );
    return response.html;
  }
}
