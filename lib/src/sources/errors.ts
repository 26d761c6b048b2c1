/**
 * Adapter Errors
 *
 * Failures of the workflow's collaborators. Any of these ends a run with an
 * ADAPTER_ERROR failure; the workflow never retries them.
 */

import axios from 'axios';

import { EmbeddingError, EmbeddingErrorCode } from '../embeddings/index.js';
import { LLMError, LLMErrorCode } from '../llm/index.js';
import { VectorStoreError, VectorStoreErrorCode } from '../qdrant/index.js';

export const AdapterKind = {
  RETRIEVAL: 'retrieval',
  SEARCH: 'search',
  MODEL: 'model',
} as const;

export type AdapterKind = (typeof AdapterKind)[keyof typeof AdapterKind];

export const AdapterErrorCode = {
  TIMEOUT: 'TIMEOUT',
  /** Backend unreachable, not configured, or missing a model/collection */
  UNAVAILABLE: 'UNAVAILABLE',
  /** Model output could not be parsed or was outside the allowed labels */
  MALFORMED_OUTPUT: 'MALFORMED_OUTPUT',
  REQUEST_FAILED: 'REQUEST_FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type AdapterErrorCode = (typeof AdapterErrorCode)[keyof typeof AdapterErrorCode];

export interface AdapterErrorInfo {
  kind: AdapterKind;
  code: AdapterErrorCode;
  message: string;
  cause?: unknown;
}

// =============================================================================
// Error Classes
// =============================================================================

export class AdapterError extends Error {
  readonly kind: AdapterKind;
  readonly code: AdapterErrorCode;
  override readonly cause: unknown;

  constructor(info: AdapterErrorInfo) {
    super(info.message);
    this.name = 'AdapterError';
    this.kind = info.kind;
    this.code = info.code;
    this.cause = info.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class RetrievalError extends AdapterError {
  constructor(code: AdapterErrorCode, message: string, cause?: unknown) {
    super({ kind: AdapterKind.RETRIEVAL, code, message, cause });
    this.name = 'RetrievalError';
  }
}

export class SearchError extends AdapterError {
  constructor(code: AdapterErrorCode, message: string, cause?: unknown) {
    super({ kind: AdapterKind.SEARCH, code, message, cause });
    this.name = 'SearchError';
  }
}

export class ModelError extends AdapterError {
  constructor(code: AdapterErrorCode, message: string, cause?: unknown) {
    super({ kind: AdapterKind.MODEL, code, message, cause });
    this.name = 'ModelError';
  }
}

export function isAdapterError(error: unknown): error is AdapterError {
  return error instanceof AdapterError;
}

export function createAdapterError(
  kind: AdapterKind,
  code: AdapterErrorCode,
  message: string,
  cause?: unknown
): AdapterError {
  switch (kind) {
    case AdapterKind.RETRIEVAL:
      return new RetrievalError(code, message, cause);
    case AdapterKind.SEARCH:
      return new SearchError(code, message, cause);
    case AdapterKind.MODEL:
      return new ModelError(code, message, cause);
  }
}

// =============================================================================
// Mapping Lower-Level Errors
// =============================================================================

function codeForLLMError(error: LLMError): AdapterErrorCode {
  switch (error.code) {
    case LLMErrorCode.TIMEOUT:
      return AdapterErrorCode.TIMEOUT;
    case LLMErrorCode.ABORTED:
      return AdapterErrorCode.CANCELLED;
    case LLMErrorCode.NETWORK_ERROR:
    case LLMErrorCode.MODEL_NOT_FOUND:
    case LLMErrorCode.AUTH_ERROR:
      return AdapterErrorCode.UNAVAILABLE;
    case LLMErrorCode.INVALID_RESPONSE:
      return AdapterErrorCode.MALFORMED_OUTPUT;
    default:
      return AdapterErrorCode.REQUEST_FAILED;
  }
}

function codeForEmbeddingError(error: EmbeddingError): AdapterErrorCode {
  switch (error.code) {
    case EmbeddingErrorCode.TIMEOUT:
      return AdapterErrorCode.TIMEOUT;
    case EmbeddingErrorCode.ABORTED:
      return AdapterErrorCode.CANCELLED;
    case EmbeddingErrorCode.SERVER_UNAVAILABLE:
    case EmbeddingErrorCode.MODEL_NOT_FOUND:
      return AdapterErrorCode.UNAVAILABLE;
    default:
      return AdapterErrorCode.REQUEST_FAILED;
  }
}

function codeForVectorStoreError(error: VectorStoreError): AdapterErrorCode {
  switch (error.code) {
    case VectorStoreErrorCode.TIMEOUT:
      return AdapterErrorCode.TIMEOUT;
    case VectorStoreErrorCode.CONNECTION_ERROR:
    case VectorStoreErrorCode.COLLECTION_NOT_FOUND:
      return AdapterErrorCode.UNAVAILABLE;
    default:
      return AdapterErrorCode.REQUEST_FAILED;
  }
}

function codeForAxiosError(error: unknown): AdapterErrorCode {
  if (axios.isCancel(error)) {
    return AdapterErrorCode.CANCELLED;
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return AdapterErrorCode.TIMEOUT;
    }
    const status = error.response?.status;
    if (status === undefined || status === 401 || status === 403) {
      return AdapterErrorCode.UNAVAILABLE;
    }
  }
  return AdapterErrorCode.REQUEST_FAILED;
}

/**
 * Wraps whatever a backend threw into the `AdapterError` of `kind`. An
 * `AdapterError` of any kind passes through unchanged.
 *
 * @example
 * ```typescript
 * try {
 *   return await this.embedder.embedQuery(query);
 * } catch (error) {
 *   throw toAdapterError(error, 'retrieval', 'Embedding the query failed');
 * }
 * ```
 */
export function toAdapterError(error: unknown, kind: AdapterKind, context: string): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }

  let code: AdapterErrorCode;
  if (error instanceof LLMError) {
    code = codeForLLMError(error);
  } else if (error instanceof EmbeddingError) {
    code = codeForEmbeddingError(error);
  } else if (error instanceof VectorStoreError) {
    code = codeForVectorStoreError(error);
  } else {
    code = codeForAxiosError(error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return createAdapterError(kind, code, `${context}: ${message}`, error);
}
