#!/usr/bin/env tsx
/**
 * Show Workflow Graph Script
 *
 * Prints the workflow state machine as a Mermaid flowchart. Paste the output
 * into any Mermaid renderer.
 *
 * Usage:
 *   npx tsx scripts/src/show-graph.ts
 */

import { renderWorkflowMermaid } from '@local-rag/lib';

console.log(renderWorkflowMermaid());
