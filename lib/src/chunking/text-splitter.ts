/**
 * Recursive Character Text Splitter
 *
 * Splits text on the coarsest separator present (paragraphs, then lines,
 * sentences, words, characters), merges the pieces back into chunks of at
 * most `chunkSize` characters and carries up to `chunkOverlap` characters
 * of context into the next chunk.
 *
 * @example
 * ```typescript
 * const chunks = splitText(pageText, {
 *   chunkSize: tokensToChars(1000),
 *   chunkOverlap: tokensToChars(200),
 * });
 * ```
 */

import {
  type TextChunk,
  type TextSplitterConfig,
  type TextSplitterConfigInput,
  TextSplitterConfigSchema,
} from './types.js';

export function splitText(text: string, config?: TextSplitterConfigInput): TextChunk[] {
  const parsed = TextSplitterConfigSchema.parse(config ?? {});
  const separators = parsed.separators.includes('')
    ? parsed.separators
    : [...parsed.separators, ''];

  return splitRecursive(text, separators, parsed).map((content, index) => ({
    content,
    index,
  }));
}

function splitRecursive(
  text: string,
  separators: string[],
  config: TextSplitterConfig
): string[] {
  let separator = '';
  let remaining: string[] = [];
  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i] ?? '';
    if (candidate === '' || text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  const pieces = separator === '' ? Array.from(text) : text.split(separator);
  const chunks: string[] = [];
  let fitting: string[] = [];

  for (const piece of pieces) {
    if (piece.length <= config.chunkSize) {
      if (piece.trim() !== '') fitting.push(piece);
      continue;
    }

    if (fitting.length > 0) {
      chunks.push(...mergePieces(fitting, separator, config));
      fitting = [];
    }
    chunks.push(...splitRecursive(piece, remaining, config));
  }

  if (fitting.length > 0) {
    chunks.push(...mergePieces(fitting, separator, config));
  }
  return chunks;
}

/**
 * Greedily packs pieces into chunks. After each emitted chunk, pieces are
 * dropped from the front until what is left fits in the overlap.
 */
function mergePieces(
  pieces: string[],
  separator: string,
  { chunkSize, chunkOverlap }: TextSplitterConfig
): string[] {
  const chunks: string[] = [];
  const window: string[] = [];
  let total = 0;

  const emit = (): void => {
    const chunk = window.join(separator).trim();
    if (chunk) chunks.push(chunk);
  };

  for (const piece of pieces) {
    const joinCost = window.length > 0 ? separator.length : 0;

    if (window.length > 0 && total + joinCost + piece.length > chunkSize) {
      emit();
      while (
        window.length > 0 &&
        (total > chunkOverlap ||
          total + separator.length + piece.length > chunkSize)
      ) {
        const dropped = window.shift() ?? '';
        total -= dropped.length + (window.length > 0 ? separator.length : 0);
      }
    }

    total += (window.length > 0 ? separator.length : 0) + piece.length;
    window.push(piece);
  }

  emit();
  return chunks;
}
