#!/usr/bin/env tsx
/**
 * Ask Script
 *
 * Answers one question with the adaptive RAG workflow and prints the answer,
 * its sources and the state trace.
 *
 * Usage:
 *   npx tsx scripts/src/ask.ts "What is prompt engineering?"
 *
 * Set LOG_LEVEL=debug to see per-step timings.
 */

import { createLogger, createRuntime, loadAppConfig, validateAppEnv } from '@local-rag/lib';

async function main(): Promise<void> {
  const question = process.argv.slice(2).join(' ').trim();
  if (!question) {
    console.log('Usage: npx tsx scripts/src/ask.ts "<question>"');
    process.exit(1);
  }

  const validation = validateAppEnv();
  for (const warning of validation.warnings) {
    console.warn(`WARNING: ${warning}`);
  }
  if (!validation.isValid) {
    console.error('ERROR: Environment configuration is invalid.');
    for (const error of validation.errors) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  const runtime = createRuntime(loadAppConfig(), { logger: createLogger('ask') });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const result = await runtime.orchestrator.run(question, { signal: controller.signal });

  console.log('');
  console.log('='.repeat(60));
  console.log(result.status);
  console.log('='.repeat(60));

  if (result.answer !== undefined) {
    console.log('');
    console.log(result.answer);
  }

  if (result.failure) {
    console.log('');
    console.log(`Failure: ${result.failure.reason} in ${result.failure.state}`);
    console.log(`  ${result.failure.message}`);
  }

  if (result.evidence.length > 0) {
    console.log('');
    console.log('Sources:');
    result.evidence.forEach((doc, i) => {
      const where = doc.metadata['url'] ?? doc.metadata['origin'] ?? doc.source;
      console.log(`  [${i + 1}] (${doc.source}) ${doc.metadata['title'] ?? ''} ${where}`.replace(/\s+/g, ' '));
    });
  }

  console.log('');
  console.log('Trace:');
  for (const entry of result.trace) {
    console.log(`  ${entry.from} -> ${entry.to} (${entry.event}${entry.detail ? `: ${entry.detail}` : ''})`);
  }

  process.exit(result.status === 'SUCCESS' ? 0 : 1);
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
