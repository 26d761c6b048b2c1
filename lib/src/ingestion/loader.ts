/**
 * Web Page Loader
 *
 * Fetches a page over HTTP and reduces it to plain text.
 */

import axios, { type AxiosInstance } from 'axios';

import { extractTitle, htmlToText } from './html.js';
import type { LoadedPage } from './types.js';

export interface WebPageLoaderOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export class WebPageLoader {
  private readonly http: AxiosInstance;

  constructor(options: WebPageLoaderOptions = {}, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        timeout: options.timeoutMs ?? 30000,
        responseType: 'text',
        headers: { 'User-Agent': options.userAgent ?? 'local-adaptive-rag/1.0' },
      });
  }

  /**
   * @throws {Error} When the request fails or the page has no text
   */
  async load(url: string): Promise<LoadedPage> {
    const response = await this.http.get<unknown>(url, { responseType: 'text' });
    const body = typeof response.data === 'string' ? response.data : String(response.data);
    const contentType = String(response.headers['content-type'] ?? '');

    const isHtml = contentType.includes('html') || /<html[\s>]/i.test(body);
    const text = isHtml ? htmlToText(body) : body.trim();
    if (!text) {
      throw new Error(`No text content found at ${url}`);
    }

    return { url, title: isHtml ? extractTitle(body) : undefined, text };
  }
}
