/**
 * Prompt Templates
 *
 * Instructions and user prompts for the router, the three graders and
 * answer generation. Graders follow a "teacher grading a quiz" framing with
 * a binary yes/no label.
 */

export interface PromptTemplate {
  instructions: string;
  prompt: string;
}

export function routerPrompt(question: string, storeTopics: string): PromptTemplate {
  const coverage = storeTopics
    ? `The vectorstore contains documents related to ${storeTopics}.`
    : 'The vectorstore is currently empty.';

  return {
    instructions: [
      'You are an expert at routing a user question to a vectorstore or web search.',
      coverage,
      'Use the vectorstore for questions on these topics. For everything else, and especially for current events, use websearch.',
    ].join('\n\n'),
    prompt: question,
  };
}

export function retrievalGraderPrompt(question: string, document: string): PromptTemplate {
  return {
    instructions: [
      'You are a grader assessing the relevance of a retrieved document to a user question.',
      'If the document contains keywords or semantic meaning related to the question, grade it as relevant.',
    ].join('\n\n'),
    prompt: [
      `Here is the retrieved document:\n\n${document}`,
      `Here is the user question:\n\n${question}`,
      'Carefully and objectively assess whether the document contains at least some information that is relevant to the question.',
      'Label "yes" if it does and "no" if it does not.',
    ].join('\n\n'),
  };
}

const QUIZ_SCORING = [
  'Score:',
  "A score of yes means that the student's answer meets all of the criteria. This is the highest (best) score.",
  "A score of no means that the student's answer does not meet all of the criteria. This is the lowest possible score you can give.",
  'Explain your reasoning step by step to make sure your conclusion is correct. Avoid simply stating the correct answer at the outset.',
].join('\n\n');

export function hallucinationGraderPrompt(facts: string, answer: string): PromptTemplate {
  return {
    instructions: [
      'You are a teacher grading a quiz.',
      'You will be given FACTS and a STUDENT ANSWER.',
      'Grade criteria:\n(1) The STUDENT ANSWER is grounded in the FACTS.\n(2) The STUDENT ANSWER does not contain "hallucinated" information outside the scope of the FACTS.',
      QUIZ_SCORING,
    ].join('\n\n'),
    prompt: [
      `FACTS:\n\n${facts}`,
      `STUDENT ANSWER: ${answer}`,
      'Label "yes" if the STUDENT ANSWER is grounded in the FACTS and "no" otherwise.',
    ].join('\n\n'),
  };
}

export function answerGraderPrompt(question: string, answer: string): PromptTemplate {
  return {
    instructions: [
      'You are a teacher grading a quiz.',
      'You will be given a QUESTION and a STUDENT ANSWER.',
      'Grade criteria:\n(1) The STUDENT ANSWER helps to answer the QUESTION.',
      'The student can receive a score of yes if the answer contains extra information that is not explicitly asked for in the question.',
      QUIZ_SCORING,
    ].join('\n\n'),
    prompt: [
      `QUESTION:\n\n${question}`,
      `STUDENT ANSWER: ${answer}`,
      'Label "yes" if the STUDENT ANSWER meets the criteria and "no" otherwise.',
    ].join('\n\n'),
  };
}

export function generationPrompt(question: string, context: string): string {
  return [
    'You are an assistant for question-answering tasks.',
    `Here is the context to use to answer the question:\n\n${context}`,
    'Think carefully about the above context.',
    `Now, review the user question:\n\n${question}`,
    'Provide an answer to this question using only the above context.',
    'Use three sentences maximum and keep the answer concise.',
    'Answer:',
  ].join('\n\n');
}
