#!/usr/bin/env tsx
/**
 * Ingest Web Pages Script
 *
 * Loads each URL, splits it into chunks, embeds them with Ollama and stores
 * them in Qdrant under the given topic. Re-ingesting a URL replaces its
 * previous chunks.
 *
 * Usage:
 *   npx tsx scripts/src/ingest-urls.ts <topic> <url> [url...]
 *
 * Example:
 *   npx tsx scripts/src/ingest-urls.ts "prompt engineering" https://example.com/prompting
 */

import { createLogger, createRuntime, loadAppConfig } from '@local-rag/lib';

function printUsage(): void {
  console.log('Usage: npx tsx scripts/src/ingest-urls.ts <topic> <url> [url...]');
}

async function main(): Promise<void> {
  const [topic, ...urls] = process.argv.slice(2);

  if (!topic || urls.length === 0) {
    printUsage();
    process.exit(1);
  }

  const logger = createLogger('ingest');
  const runtime = createRuntime(loadAppConfig(), { logger });

  const exists = await runtime.vectorStore.collectionExists();
  if (!exists) {
    console.error(`Collection '${runtime.vectorStore.collectionName}' does not exist.`);
    console.error('Create it first: npx tsx scripts/src/create-collection.ts');
    process.exit(1);
  }

  console.log(`Ingesting ${urls.length} page(s) under topic "${topic}"...`);
  const summary = await runtime.ingestion.ingestUrls(urls.map((url) => ({ url, topic })));

  for (const result of summary.results) {
    if (result.success) {
      console.log(`  ✓ ${result.url} (${result.chunkCount} chunks)`);
    } else {
      console.error(`  ✗ ${result.url}: ${result.error}`);
    }
  }

  console.log('');
  console.log(`Done: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.totalChunks} chunks stored.`);
  console.log(`Points in collection: ${await runtime.vectorStore.getPointCount()}`);

  if (summary.failed > 0) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
