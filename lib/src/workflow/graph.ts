/**
 * Workflow Graph
 *
 * Static description of the state machine, rendered as a Mermaid flowchart
 * for documentation and the `show-graph` script.
 */

import { type WorkflowStateName, WorkflowState } from './types.js';

export interface WorkflowEdge {
  from: WorkflowStateName;
  to: WorkflowStateName;
  label: string;
}

export const WORKFLOW_EDGES: readonly WorkflowEdge[] = [
  { from: WorkflowState.ROUTE, to: WorkflowState.RETRIEVE, label: 'local store / web search' },
  { from: WorkflowState.RETRIEVE, to: WorkflowState.GRADE_DOCS, label: 'documents fetched' },
  { from: WorkflowState.GRADE_DOCS, to: WorkflowState.GENERATE, label: 'evidence found' },
  { from: WorkflowState.GRADE_DOCS, to: WorkflowState.ROUTE, label: 'no local evidence, force web' },
  { from: WorkflowState.GRADE_DOCS, to: WorkflowState.FAIL, label: 'no evidence' },
  { from: WorkflowState.GENERATE, to: WorkflowState.CHECK_GROUNDING, label: 'answer' },
  { from: WorkflowState.CHECK_GROUNDING, to: WorkflowState.CHECK_RELEVANCE, label: 'grounded' },
  { from: WorkflowState.CHECK_GROUNDING, to: WorkflowState.GENERATE, label: 'not grounded, retry' },
  { from: WorkflowState.CHECK_GROUNDING, to: WorkflowState.FAIL, label: 'retries exhausted' },
  { from: WorkflowState.CHECK_RELEVANCE, to: WorkflowState.RETURN, label: 'addresses question' },
  { from: WorkflowState.CHECK_RELEVANCE, to: WorkflowState.ROUTE, label: 'off topic, re-route' },
  { from: WorkflowState.CHECK_RELEVANCE, to: WorkflowState.FAIL, label: 'retries exhausted' },
];

/**
 * @example
 * ```typescript
 * renderWorkflowMermaid().split('\n')[1];
 * // => '  START([start]) --> ROUTE'
 * ```
 */
export function renderWorkflowMermaid(edges: readonly WorkflowEdge[] = WORKFLOW_EDGES): string {
  const lines = ['flowchart TD', `  START([start]) --> ${WorkflowState.ROUTE}`];

  for (const edge of edges) {
    lines.push(`  ${edge.from} -->|${edge.label}| ${edge.to}`);
  }

  lines.push(`  ${WorkflowState.RETURN}([${WorkflowState.RETURN}])`);
  lines.push(`  ${WorkflowState.FAIL}([${WorkflowState.FAIL}])`);
  return lines.join('\n');
}
