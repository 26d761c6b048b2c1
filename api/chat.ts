/**
 * Chat API Endpoint
 *
 * POST /api/chat
 * Request: { question: string }
 * Response: { status, answer?, sources: Source[], trace, failure?, metadata }
 *
 * Runs one question through the adaptive RAG workflow.
 *
 * SECURITY CONSIDERATIONS:
 * - Rate limiting: not implemented here. Every request can issue several model
 *   calls; put a limit in front of this endpoint when it is exposed.
 * - CORS: requires ALLOWED_ORIGINS to be set explicitly.
 */

import { randomUUID } from 'node:crypto';

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import {
  type AdaptiveRAGOrchestrator,
  type Document,
  type RunResult,
  FailureReason,
  createLogger,
  createRuntime,
  loadAppConfig,
} from '@local-rag/lib';

// =============================================================================
// Validation Constants
// =============================================================================

/** Maximum question length in characters */
const MAX_QUESTION_LENGTH = 2000;

/** Characters of each document returned as an excerpt */
const EXCERPT_LENGTH = 300;

// =============================================================================
// Request/Response Schemas
// =============================================================================

export const ChatRequestSchema = z
  .object({
    question: z
      .string({
        required_error: 'Question is required',
        invalid_type_error: 'Question must be a string',
      })
      .min(1, 'Question cannot be empty')
      .max(MAX_QUESTION_LENGTH, `Question cannot exceed ${MAX_QUESTION_LENGTH} characters`)
      .refine((q) => q.trim().length > 0, 'Question cannot be only whitespace'),
  })
  .strict();

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export interface Source {
  /** Citation index (1-based) */
  index: number;
  origin: Document['source'];
  url?: string;
  title?: string;
  score?: number;
  excerpt: string;
}

export interface ChatResponse {
  status: RunResult['status'];
  answer?: string;
  sources: Source[];
  trace: RunResult['trace'];
  failure?: { reason: FailureReason; message: string; state: string };
  metadata: {
    requestId: string;
    totalLatencyMs: number;
    retries: RunResult['retries'];
  };
}

export interface ValidationError {
  field: string;
  message: string;
  code: string;
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    requestId?: string;
    validationErrors?: ValidationError[];
  };
}

// =============================================================================
// Helper Functions
// =============================================================================

const logger = createLogger('api:chat');

export function documentsToSources(documents: readonly Document[]): Source[] {
  return documents.map((doc, i) => {
    const { url, title } = doc.metadata;
    const score = Number.parseFloat(doc.metadata['score'] ?? '');
    return {
      index: i + 1,
      origin: doc.source,
      excerpt: doc.content.slice(0, EXCERPT_LENGTH),
      ...(url ? { url } : {}),
      ...(title ? { title } : {}),
      ...(!Number.isNaN(score) && { score }),
    };
  });
}

/**
 * Adapter failures are reported with a generic message; the cause is only
 * logged server-side.
 */
export function formatResponse(result: RunResult, requestId: string, totalLatencyMs: number): ChatResponse {
  const failure = result.failure && {
    reason: result.failure.reason,
    state: result.failure.state,
    message:
      result.failure.reason === FailureReason.ADAPTER_ERROR
        ? 'An upstream service failed while answering'
        : result.failure.message,
  };

  return {
    status: result.status,
    sources: documentsToSources(result.evidence),
    trace: result.trace,
    metadata: { requestId, totalLatencyMs, retries: result.retries },
    ...(result.answer !== undefined && { answer: result.answer }),
    ...(failure && { failure }),
  };
}

function statusFor(result: RunResult): number {
  if (result.failure?.reason === FailureReason.ADAPTER_ERROR) {
    return 502;
  }
  return 200;
}

function transformZodErrors(zodError: z.ZodError): ValidationError[] {
  return zodError.errors.map((err) => ({
    field: err.path.join('.') || 'body',
    message: err.message,
    code: err.code === 'unrecognized_keys' ? 'unexpected_field' : `validation_${err.code}`,
  }));
}

function createErrorResponse(
  res: VercelResponse,
  statusCode: number,
  message: string,
  code: string,
  options?: { requestId?: string; validationErrors?: ValidationError[] }
): void {
  const response: ErrorResponse = {
    error: {
      message,
      code,
      ...(options?.requestId !== undefined && { requestId: options.requestId }),
      ...(options?.validationErrors && { validationErrors: options.validationErrors }),
    },
  };

  res.status(statusCode).json(response);
}

/**
 * SECURITY: never answers with a wildcard; an unset ALLOWED_ORIGINS rejects
 * every cross-origin request.
 */
export function getAllowedOrigin(
  origin: string | undefined,
  allowedOriginsEnv: string | undefined = process.env['ALLOWED_ORIGINS']
): string | null {
  if (!allowedOriginsEnv) {
    logger.warn('ALLOWED_ORIGINS is not set; CORS requests will be rejected');
    return null;
  }

  const allowedOrigins = allowedOriginsEnv.split(',').map((o) => o.trim());
  if (origin && allowedOrigins.includes(origin)) {
    return origin;
  }
  return null;
}

// =============================================================================
// Request Handler
// =============================================================================

export type OrchestratorProvider = () => Promise<AdaptiveRAGOrchestrator>;

let orchestratorPromise: Promise<AdaptiveRAGOrchestrator> | null = null;

async function initializeOrchestrator(): Promise<AdaptiveRAGOrchestrator> {
  return createRuntime(loadAppConfig(), { logger }).orchestrator;
}

/**
 * Builds the runtime on first use.
 */
function getOrchestrator(): Promise<AdaptiveRAGOrchestrator> {
  if (!orchestratorPromise) {
    // a failed start is retried on the next request
    orchestratorPromise = initializeOrchestrator().catch((error: unknown) => {
      orchestratorPromise = null;
      throw error;
    });
  }
  return orchestratorPromise;
}

export function createChatHandler(provider: OrchestratorProvider = getOrchestrator) {
  return async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
    const requestId = randomUUID();

    const allowedOrigin = getAllowedOrigin(req.headers.origin);
    if (allowedOrigin) {
      res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
      res.setHeader('Access-Control-Allow-Methods', 'POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
      res.setHeader('Vary', 'Origin');
    }

    if (req.method === 'OPTIONS') {
      res.status(200).end();
      return;
    }

    if (req.method !== 'POST') {
      createErrorResponse(res, 405, 'Method not allowed', 'METHOD_NOT_ALLOWED', { requestId });
      return;
    }

    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const validationErrors = transformZodErrors(parsed.error);
      createErrorResponse(res, 400, validationErrors[0]?.message ?? 'Invalid request body', 'VALIDATION_ERROR', {
        requestId,
        validationErrors,
      });
      return;
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const orchestrator = await provider();
      const startedAt = Date.now();
      const result = await orchestrator.run(parsed.data.question.trim(), { signal: controller.signal });

      if (result.failure?.cause !== undefined) {
        logger.error('Run failed', result.failure.cause, { requestId, reason: result.failure.reason });
      }
      res.status(statusFor(result)).json(formatResponse(result, requestId, Date.now() - startedAt));
    } catch (error) {
      // SECURITY: internal details stay in the server log
      logger.error('Chat API error', error, { requestId });
      createErrorResponse(res, 500, 'An unexpected error occurred', 'INTERNAL_ERROR', { requestId });
    }
  };
}

export default createChatHandler();
