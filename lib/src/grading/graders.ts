/**
 * Graders
 *
 * One classification call each. Grading outcomes are decisions, never
 * errors; adapter failures propagate as `ModelError`.
 */

import { createSilentLogger, type Logger } from '../logging/index.js';
import {
  type Document,
  type LanguageModel,
  AdapterErrorCode,
  ModelError,
} from '../sources/index.js';
import {
  type BinaryLabel,
  type Decision,
  AnswerDecision,
  BINARY_LABELS,
  GroundingDecision,
  RelevanceDecision,
  ROUTER_LABELS,
  RouteDecision,
} from './decisions.js';
import {
  answerGraderPrompt,
  generationPrompt,
  hallucinationGraderPrompt,
  retrievalGraderPrompt,
  routerPrompt,
} from './prompts.js';

export interface GradingOptions {
  signal?: AbortSignal | undefined;
}

export interface RouteOptions extends GradingOptions {
  /** Human-readable list of what the local store covers */
  storeTopics: string;
  logger?: Logger | undefined;
}

/**
 * Picks the knowledge source for `question`. Unusable model output falls
 * back to web search.
 *
 * @throws {ModelError} For adapter failures other than malformed output
 */
export async function routeQuery(
  model: LanguageModel,
  question: string,
  options: RouteOptions
): Promise<Decision<RouteDecision>> {
  const logger = options.logger ?? createSilentLogger();
  const { instructions, prompt } = routerPrompt(question, options.storeTopics);

  try {
    const result = await model.classify(prompt, ROUTER_LABELS, {
      instructions,
      signal: options.signal,
    });
    return {
      label: result.label === 'vectorstore' ? RouteDecision.USE_LOCAL_STORE : RouteDecision.USE_WEB_SEARCH,
      rationale: result.rationale,
    };
  } catch (error) {
    if (error instanceof ModelError && error.code === AdapterErrorCode.MALFORMED_OUTPUT) {
      logger.warn('Router output unusable, defaulting to web search', { error: error.message });
      return {
        label: RouteDecision.USE_WEB_SEARCH,
        rationale: `Fallback to web search: ${error.message}`,
      };
    }
    throw error;
  }
}

async function classifyBinary(
  model: LanguageModel,
  template: { instructions: string; prompt: string },
  options: GradingOptions
): Promise<Decision<BinaryLabel>> {
  return model.classify(template.prompt, BINARY_LABELS, {
    instructions: template.instructions,
    signal: options.signal,
  });
}

export async function gradeDocument(
  model: LanguageModel,
  question: string,
  document: Document,
  options: GradingOptions = {}
): Promise<Decision<RelevanceDecision>> {
  const result = await classifyBinary(model, retrievalGraderPrompt(question, document.content), options);
  return {
    label: result.label === 'yes' ? RelevanceDecision.RELEVANT : RelevanceDecision.NOT_RELEVANT,
    rationale: result.rationale,
  };
}

/**
 * @param facts - The exact context the answer was generated from
 */
export async function gradeGrounding(
  model: LanguageModel,
  answer: string,
  facts: string,
  options: GradingOptions = {}
): Promise<Decision<GroundingDecision>> {
  const result = await classifyBinary(model, hallucinationGraderPrompt(facts, answer), options);
  return {
    label: result.label === 'yes' ? GroundingDecision.GROUNDED : GroundingDecision.NOT_GROUNDED,
    rationale: result.rationale,
  };
}

export async function gradeAnswer(
  model: LanguageModel,
  question: string,
  answer: string,
  options: GradingOptions = {}
): Promise<Decision<AnswerDecision>> {
  const result = await classifyBinary(model, answerGraderPrompt(question, answer), options);
  return {
    label: result.label === 'yes' ? AnswerDecision.ADDRESSES_QUESTION : AnswerDecision.DOES_NOT_ADDRESS,
    rationale: result.rationale,
  };
}

/**
 * @throws {ModelError} MALFORMED_OUTPUT when the model returns only whitespace
 */
export async function generateAnswer(
  model: LanguageModel,
  question: string,
  context: string,
  options: GradingOptions = {}
): Promise<string> {
  const answer = (await model.complete(generationPrompt(question, context), { signal: options.signal })).trim();
  if (!answer) {
    throw new ModelError(AdapterErrorCode.MALFORMED_OUTPUT, 'Model returned an empty answer');
  }
  return answer;
}
