/**
 * Chunking Types and Schemas
 */

import { z } from 'zod';

/** Rough average for English prose */
export const DEFAULT_CHARS_PER_TOKEN = 4;

/**
 * Tried in order; the empty separator splits into single characters so a
 * piece can always be brought under the chunk size.
 */
export const DEFAULT_SEPARATORS = ['\n\n', '\n', '. ', ' ', ''] as const;

export const TextSplitterConfigSchema = z
  .object({
    /** Maximum chunk length in characters */
    chunkSize: z.number().int().positive().default(4000),
    /** Characters shared between neighbouring chunks */
    chunkOverlap: z.number().int().nonnegative().default(800),
    separators: z.array(z.string()).min(1).default([...DEFAULT_SEPARATORS]),
  })
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type TextSplitterConfig = z.infer<typeof TextSplitterConfigSchema>;
export type TextSplitterConfigInput = z.input<typeof TextSplitterConfigSchema>;

export interface TextChunk {
  content: string;
  /** 0-based position in the document */
  index: number;
}

export function estimateTokens(text: string, charsPerToken = DEFAULT_CHARS_PER_TOKEN): number {
  return Math.ceil(text.length / charsPerToken);
}

export function tokensToChars(tokenCount: number, charsPerToken = DEFAULT_CHARS_PER_TOKEN): number {
  return Math.floor(tokenCount * charsPerToken);
}
