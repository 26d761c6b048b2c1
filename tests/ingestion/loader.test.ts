/**
 * Tests for the web page loader
 */

import { describe, it, expect, vi } from 'vitest';
import type { AxiosInstance } from 'axios';
import { WebPageLoader } from '../../lib/src/ingestion/loader.js';

function loaderReturning(data: unknown, contentType: string) {
  const get = vi.fn().mockResolvedValue({ data, headers: { 'content-type': contentType } });
  return { loader: new WebPageLoader({}, { get } as unknown as AxiosInstance), get };
}

describe('WebPageLoader', () => {
  describe('load', () => {
    it('should extract text and title from an HTML page', async () => {
      const { loader, get } = loaderReturning(
        '<html><head><title>Agents</title></head><body><p>Planning and memory.</p></body></html>',
        'text/html; charset=utf-8'
      );

      const page = await loader.load('https://blog.example.com/agents');

      expect(get).toHaveBeenCalledWith('https://blog.example.com/agents', { responseType: 'text' });
      expect(page.url).toBe('https://blog.example.com/agents');
      expect(page.title).toBe('Agents');
      expect(page.text).toBe('Planning and memory.');
    });

    it('should keep plain text as is', async () => {
      const { loader } = loaderReturning('  Plain notes on prompting.  ', 'text/plain');

      await expect(loader.load('https://notes.example.com/prompting.txt')).resolves.toEqual({
        url: 'https://notes.example.com/prompting.txt',
        title: undefined,
        text: 'Plain notes on prompting.',
      });
    });

    it('should reject a page without text', async () => {
      const { loader } = loaderReturning('<html><body><script>x()</script></body></html>', 'text/html');

      await expect(loader.load('https://empty.example.com')).rejects.toThrow(
        'No text content found at https://empty.example.com'
      );
    });
  });
});
