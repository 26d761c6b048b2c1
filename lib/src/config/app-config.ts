/**
 * Application Configuration
 *
 * Everything the drivers need, assembled from environment variables and
 * validated in one place.
 */

import { z } from 'zod';

import { OllamaEmbedderConfigSchema } from '../embeddings/index.js';
import { DEFAULT_MODELS, LLMProviderSchema, ProviderConfigSchema, type ProviderConfigInput } from '../llm/index.js';
import { QdrantConfigSchema, loadQdrantConfig, validateQdrantEnv } from '../qdrant/index.js';
import { TavilyWebSearchConfigSchema } from '../sources/index.js';
import { WorkflowConfigSchema } from '../workflow/index.js';
import { nonEmpty, parseList, parseOptionalInt, parseOptionalNumber } from './env.js';

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

export const AppConfigSchema = z.object({
  llm: ProviderConfigSchema,
  embedding: OllamaEmbedderConfigSchema,
  qdrant: QdrantConfigSchema,
  /** Absent when no search API key is configured */
  webSearch: TavilyWebSearchConfigSchema.optional(),
  workflow: WorkflowConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

function llmConfigFromEnv(env: NodeJS.ProcessEnv): ProviderConfigInput {
  const provider = LLMProviderSchema.parse(nonEmpty(env['LLM_PROVIDER'])?.toLowerCase() ?? 'ollama');
  const model = nonEmpty(env['LLM_MODEL']) ?? DEFAULT_MODELS[provider];
  const temperature = parseOptionalNumber(env['LLM_TEMPERATURE']);

  if (provider === 'anthropic') {
    return { provider, model, temperature, apiKey: nonEmpty(env['ANTHROPIC_API_KEY']) };
  }
  return {
    provider,
    model,
    temperature,
    baseUrl: nonEmpty(env['OLLAMA_HOST']) ?? DEFAULT_OLLAMA_HOST,
  };
}

/**
 * Loads the application configuration.
 *
 * - LLM_PROVIDER (ollama | anthropic, default ollama), LLM_MODEL,
 *   LLM_TEMPERATURE, OLLAMA_HOST, ANTHROPIC_API_KEY
 * - EMBEDDING_MODEL, EMBEDDING_DIMENSIONS
 * - QDRANT_URL, QDRANT_API_KEY, QDRANT_COLLECTION_NAME
 * - TAVILY_API_KEY, WEB_SEARCH_MAX_RESULTS
 * - RAG_TOP_K, RAG_MAX_RETRIEVAL_RETRIES, RAG_MAX_GENERATION_RETRIES,
 *   RAG_ADAPTER_TIMEOUT_MS, RAG_MAX_EVIDENCE_CHARS, RAG_STORE_TOPICS
 *
 * @throws {z.ZodError} If a variable is set to an invalid value
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const tavilyKey = nonEmpty(env['TAVILY_API_KEY']);

  return AppConfigSchema.parse({
    llm: llmConfigFromEnv(env),
    embedding: {
      model: nonEmpty(env['EMBEDDING_MODEL']),
      baseUrl: nonEmpty(env['OLLAMA_HOST']) ?? DEFAULT_OLLAMA_HOST,
      dimensions: parseOptionalInt(env['EMBEDDING_DIMENSIONS']),
    },
    qdrant: loadQdrantConfig(env),
    webSearch: tavilyKey
      ? { apiKey: tavilyKey, maxResults: parseOptionalInt(env['WEB_SEARCH_MAX_RESULTS']) }
      : undefined,
    workflow: {
      topK: parseOptionalInt(env['RAG_TOP_K']),
      maxRetrievalRetries: parseOptionalInt(env['RAG_MAX_RETRIEVAL_RETRIES']),
      maxGenerationRetries: parseOptionalInt(env['RAG_MAX_GENERATION_RETRIES']),
      adapterTimeoutMs: parseOptionalInt(env['RAG_ADAPTER_TIMEOUT_MS']),
      maxEvidenceChars: parseOptionalInt(env['RAG_MAX_EVIDENCE_CHARS']),
      storeTopics: parseList(env['RAG_STORE_TOPICS']),
    },
  });
}

export interface AppEnvValidation {
  isValid: boolean;
  errors: string[];
  /** Settings that work but disable a feature */
  warnings: string[];
}

/**
 * Checks the environment without throwing.
 */
export function validateAppEnv(env: NodeJS.ProcessEnv = process.env): AppEnvValidation {
  const errors = [...validateQdrantEnv(env).errors];
  const warnings: string[] = [];

  try {
    const config = loadAppConfig(env);
    if (config.llm.provider === 'anthropic' && !config.llm.apiKey) {
      errors.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic');
    }
    if (!config.webSearch) {
      warnings.push('TAVILY_API_KEY is not set; web search is disabled');
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      for (const issue of error.issues) {
        const message = `${issue.path.join('.') || 'config'}: ${issue.message}`;
        if (!errors.includes(message)) errors.push(message);
      }
    } else {
      throw error;
    }
  }

  return { isValid: errors.length === 0, errors, warnings };
}
