/**
 * Evidence
 *
 * Per-run record of graded documents, deduplicated by content.
 */

import { createHash } from 'node:crypto';

import type { Document } from '../sources/index.js';

type EvidenceStatus = 'pending' | 'accepted' | 'rejected';

interface EvidenceEntry {
  document: Document;
  status: EvidenceStatus;
}

export function contentHash(document: Document): string {
  return createHash('sha256').update(document.content).digest('hex');
}

/**
 * Documents seen during one run. A document is offered once, then accepted
 * or rejected; identical content offered again later is ignored, so a
 * rejected passage never re-enters through another retrieval.
 */
export class EvidenceSet {
  private readonly entries = new Map<string, EvidenceEntry>();

  /**
   * Registers `documents` and returns the ones not seen before, in order.
   */
  offer(documents: readonly Document[]): Document[] {
    const fresh: Document[] = [];
    for (const document of documents) {
      const hash = contentHash(document);
      if (this.entries.has(hash)) continue;
      this.entries.set(hash, { document, status: 'pending' });
      fresh.push(document);
    }
    return fresh;
  }

  accept(document: Document): void {
    this.mark(document, 'accepted');
  }

  reject(document: Document): void {
    this.mark(document, 'rejected');
  }

  isRejected(document: Document): boolean {
    return this.entries.get(contentHash(document))?.status === 'rejected';
  }

  /** Accepted documents in the order they were first offered */
  documents(): Document[] {
    const accepted: Document[] = [];
    for (const entry of this.entries.values()) {
      if (entry.status === 'accepted') accepted.push(entry.document);
    }
    return accepted;
  }

  get size(): number {
    return this.documents().length;
  }

  private mark(document: Document, status: Exclude<EvidenceStatus, 'pending'>): void {
    const hash = contentHash(document);
    const entry = this.entries.get(hash);
    if (!entry) {
      throw new Error('Document was never offered to this evidence set');
    }
    if (entry.status === 'rejected') return;
    entry.status = status;
  }
}

// =============================================================================
// Context Assembly
// =============================================================================

export const CONTEXT_SEPARATOR = '\n\n';

export interface EvidenceContext {
  text: string;
  /** Documents that made it into `text`, the first possibly truncated */
  included: Document[];
}

/**
 * Joins documents into the generation context. Whole documents are taken in
 * order while they fit in `maxChars`; a first document larger than the
 * budget is cut to it.
 *
 * @example
 * ```typescript
 * buildContext([doc('alpha'), doc('beta')], 9).text;
 * // => 'alpha'
 * ```
 */
export function buildContext(documents: readonly Document[], maxChars: number): EvidenceContext {
  const parts: string[] = [];
  const included: Document[] = [];
  let length = 0;

  for (const document of documents) {
    const added = parts.length === 0 ? document.content.length : CONTEXT_SEPARATOR.length + document.content.length;

    if (length + added > maxChars) {
      if (parts.length === 0) {
        parts.push(document.content.slice(0, maxChars));
        included.push(document);
      }
      break;
    }

    parts.push(document.content);
    included.push(document);
    length += added;
  }

  return { text: parts.join(CONTEXT_SEPARATOR), included };
}
