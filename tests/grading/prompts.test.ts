import { describe, it, expect } from 'vitest';
import {
  answerGraderPrompt,
  generationPrompt,
  hallucinationGraderPrompt,
  retrievalGraderPrompt,
  routerPrompt,
} from '../../lib/src/grading/prompts.js';

describe('prompts', () => {
  it('should pass the question to the router unchanged', () => {
    const template = routerPrompt('What is chain of thought?', 'agents and prompt engineering');

    expect(template.prompt).toBe('What is chain of thought?');
    expect(template.instructions.split('\n\n')[1]).toBe(
      'The vectorstore contains documents related to agents and prompt engineering.'
    );
  });

  it('should put the document before the question for the relevance grader', () => {
    const { prompt } = retrievalGraderPrompt('Q?', 'DOC');

    expect(prompt.indexOf('DOC')).toBeLessThan(prompt.indexOf('Q?'));
  });

  it('should frame grounding and answer grading as a quiz', () => {
    expect(hallucinationGraderPrompt('F', 'A').instructions.startsWith('You are a teacher grading a quiz.')).toBe(true);
    expect(answerGraderPrompt('Q', 'A').prompt).toBe(
      'QUESTION:\n\nQ\n\nSTUDENT ANSWER: A\n\nLabel "yes" if the STUDENT ANSWER meets the criteria and "no" otherwise.'
    );
  });

  it('should ask for a short answer from the context only', () => {
    const prompt = generationPrompt('Q?', 'CTX');

    expect(prompt).toContain('Here is the context to use to answer the question:\n\nCTX');
    expect(prompt).toContain('Use three sentences maximum and keep the answer concise.');
    expect(prompt.endsWith('Answer:')).toBe(true);
  });
});
