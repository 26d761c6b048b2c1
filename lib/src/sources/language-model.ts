/**
 * Language Model
 *
 * `LanguageModel` over an `LLMAdapter`. Classification asks the model for a
 * JSON object and validates the label against the allowed set.
 */

import { z } from 'zod';

import type { LLMAdapter, LLMMessage } from '../llm/index.js';
import { AdapterErrorCode, AdapterKind, ModelError, toAdapterError } from './errors.js';
import type { Classification, LanguageModel, ModelCallOptions } from './types.js';

const ClassificationOutputSchema = z
  .object({
    label: z.union([z.string(), z.number(), z.boolean()]).optional(),
    /** Some models echo the key used in the instructions' examples */
    score: z.union([z.string(), z.number(), z.boolean()]).optional(),
    datasource: z.string().optional(),
    explanation: z.string().optional(),
    rationale: z.string().optional(),
  })
  .passthrough();

function classificationInstruction(labels: readonly string[]): string {
  const options = labels.map((l) => `"${l}"`).join(' or ');
  return (
    `Return a JSON object with two keys: "label", which must be exactly ${options}, ` +
    'and "explanation", a short justification. Return only the JSON object, no preamble.'
  );
}

/**
 * Cuts the outermost `{...}` out of a model reply, ignoring any prose or
 * markdown fences around it.
 */
export function extractJsonObject(text: string): string | undefined {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start >= 0 && end > start ? text.slice(start, end + 1) : undefined;
}

export function matchLabel<L extends string>(
  raw: string,
  labels: readonly L[]
): L | undefined {
  const wanted = raw.trim().toLowerCase();
  return labels.find((label) => label.toLowerCase() === wanted);
}

export class AdapterLanguageModel implements LanguageModel {
  private readonly adapter: LLMAdapter;

  constructor(adapter: LLMAdapter) {
    this.adapter = adapter;
  }

  get model(): string {
    return this.adapter.model;
  }

  async complete(prompt: string, options: ModelCallOptions = {}): Promise<string> {
    try {
      const response = await this.adapter.complete(this.buildMessages(prompt, options.instructions), {
        signal: options.signal,
      });
      return response.content;
    } catch (error) {
      throw toAdapterError(error, AdapterKind.MODEL, 'Language model completion failed');
    }
  }

  async classify<L extends string>(
    prompt: string,
    labels: readonly L[],
    options: ModelCallOptions = {}
  ): Promise<Classification<L>> {
    if (labels.length === 0) {
      throw new ModelError(AdapterErrorCode.MALFORMED_OUTPUT, 'classify() needs at least one label');
    }

    const instructions = [options.instructions, classificationInstruction(labels)]
      .filter((part): part is string => Boolean(part))
      .join('\n\n');

    let content: string;
    try {
      const response = await this.adapter.complete(this.buildMessages(prompt, instructions), {
        responseFormat: 'json',
        signal: options.signal,
      });
      content = response.content;
    } catch (error) {
      throw toAdapterError(error, AdapterKind.MODEL, 'Language model classification failed');
    }

    return parseClassification(content, labels);
  }

  private buildMessages(prompt: string, instructions: string | undefined): LLMMessage[] {
    const messages: LLMMessage[] = [];
    if (instructions) {
      messages.push({ role: 'system', content: instructions });
    }
    messages.push({ role: 'user', content: prompt });
    return messages;
  }
}

/**
 * @throws {ModelError} MALFORMED_OUTPUT
 */
export function parseClassification<L extends string>(
  content: string,
  labels: readonly L[]
): Classification<L> {
  const json = extractJsonObject(content);
  if (json === undefined) {
    throw new ModelError(AdapterErrorCode.MALFORMED_OUTPUT, `Model reply has no JSON object: ${content.slice(0, 200)}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new ModelError(AdapterErrorCode.MALFORMED_OUTPUT, 'Model reply is not valid JSON', error);
  }

  const parsed = ClassificationOutputSchema.safeParse(value);
  if (!parsed.success) {
    throw new ModelError(AdapterErrorCode.MALFORMED_OUTPUT, 'Model reply is not a classification object', parsed.error);
  }

  const rawLabel = parsed.data.label ?? parsed.data.score ?? parsed.data.datasource;
  const label = rawLabel === undefined ? undefined : matchLabel(String(rawLabel), labels);
  if (label === undefined) {
    throw new ModelError(
      AdapterErrorCode.MALFORMED_OUTPUT,
      `Model label ${JSON.stringify(rawLabel ?? null)} is not one of ${labels.join(', ')}`
    );
  }

  return {
    label,
    rationale: parsed.data.explanation ?? parsed.data.rationale ?? '',
  };
}
