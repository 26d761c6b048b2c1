/**
 * Knowledge Source Types
 *
 * Capability interfaces the workflow depends on. Concrete adapters live
 * beside them; tests substitute in-memory fakes.
 */

// =============================================================================
// Documents
// =============================================================================

export const DocumentSource = {
  LOCAL: 'local',
  WEB: 'web',
} as const;

export type DocumentSource = (typeof DocumentSource)[keyof typeof DocumentSource];

/**
 * A retrieved passage. Frozen on creation.
 */
export interface Document {
  readonly content: string;
  readonly source: DocumentSource;
  readonly metadata: Readonly<Record<string, string>>;
}

export function createDocument(
  content: string,
  source: DocumentSource,
  metadata: Record<string, string> = {}
): Document {
  return Object.freeze({
    content,
    source,
    metadata: Object.freeze({ ...metadata }),
  });
}

// =============================================================================
// Capabilities
// =============================================================================

export interface CallOptions {
  signal?: AbortSignal | undefined;
}

export interface DocumentStore {
  /**
   * Up to `k` documents, most similar first.
   *
   * @throws {RetrievalError}
   */
  search(query: string, k: number, options?: CallOptions): Promise<Document[]>;
}

export interface WebSearch {
  /**
   * @throws {SearchError}
   */
  search(query: string, options?: CallOptions): Promise<Document[]>;
}

export interface ModelCallOptions extends CallOptions {
  /** System-level instructions sent ahead of the prompt */
  instructions?: string | undefined;
}

/**
 * One constrained classification: a label from the allowed set plus the
 * model's free-text rationale. Only the label drives control flow.
 */
export interface Classification<L extends string = string> {
  label: L;
  rationale: string;
}

export interface LanguageModel {
  /**
   * @throws {ModelError}
   */
  complete(prompt: string, options?: ModelCallOptions): Promise<string>;

  /**
   * @throws {ModelError} MALFORMED_OUTPUT when the answer is not one of `labels`
   */
  classify<L extends string>(
    prompt: string,
    labels: readonly L[],
    options?: ModelCallOptions
  ): Promise<Classification<L>>;
}
