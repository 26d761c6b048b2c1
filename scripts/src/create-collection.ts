#!/usr/bin/env tsx
/**
 * Create Document Collection Script
 *
 * Creates the chunk collection in Qdrant with the vector size of the
 * embedding model, plus the payload indexes used for filtering:
 * - source (keyword): re-ingesting a URL replaces its chunks
 * - topic (keyword): topic-scoped search and the router's topic list
 *
 * Usage:
 *   npx tsx scripts/src/create-collection.ts
 *
 * Environment variables:
 *   - QDRANT_URL (default http://localhost:6333)
 *   - QDRANT_API_KEY (only for Qdrant Cloud)
 *   - QDRANT_COLLECTION_NAME (default local_rag_documents)
 *   - EMBEDDING_DIMENSIONS (default 768)
 */

import {
  DOCUMENT_PAYLOAD_INDEXES,
  checkClusterHealth,
  createPayloadIndexes,
  createQdrantClient,
  ensureCollection,
  getCollectionInfo,
  loadQdrantConfig,
  validateQdrantEnv,
} from '@local-rag/lib';

async function main(): Promise<void> {
  console.log('='.repeat(60));
  console.log('Create Document Collection');
  console.log('='.repeat(60));
  console.log('');

  // Step 1: Validate environment variables
  console.log('Step 1: Validating environment variables...');
  const validation = validateQdrantEnv();

  if (!validation.isValid) {
    console.error('');
    console.error('ERROR: Environment configuration is invalid.');
    for (const error of validation.errors) {
      console.error(`  - ${error}`);
    }
    console.error('');
    process.exit(1);
  }

  const config = loadQdrantConfig();
  console.log(`  URL: ${config.url}`);
  console.log(`  Collection Name: ${config.collectionName}`);
  console.log(`  Vector Size: ${config.vectorSize}`);
  console.log(`  Distance Metric: ${config.distance}`);
  console.log('');

  // Step 2: Check cluster health
  console.log('Step 2: Checking cluster health...');
  const client = createQdrantClient(config);
  const health = await checkClusterHealth(client);

  if (!health.healthy) {
    console.error('');
    console.error('ERROR: Cluster health check failed.');
    console.error(`  Error: ${health.error}`);
    console.error('');
    process.exit(1);
  }
  console.log('  Cluster is healthy!');
  console.log('');

  // Step 3: Create collection
  console.log('Step 3: Creating collection...');
  const result = await ensureCollection(client, config);

  if (!result.success) {
    console.error('');
    console.error('ERROR: Failed to create collection.');
    console.error(`  Error: ${result.error}`);
    console.error('');
    process.exit(1);
  }
  console.log(
    result.created
      ? `  Collection '${config.collectionName}' created successfully!`
      : `  Collection '${config.collectionName}' already exists.`
  );
  console.log('');

  // Step 4: Payload indexes
  console.log('Step 4: Creating payload indexes...');
  const indexes = await createPayloadIndexes(client, config.collectionName, DOCUMENT_PAYLOAD_INDEXES);
  for (const name of indexes.created) {
    console.log(`  ✓ ${name}`);
  }
  for (const error of indexes.errors) {
    console.error(`  ✗ ${error}`);
  }
  console.log('');

  // Step 5: Verify collection info
  console.log('Step 5: Verifying collection...');
  const info = await getCollectionInfo(client, config.collectionName);

  if (!info.exists) {
    console.error(`WARNING: Could not retrieve collection info: ${info.error}`);
  } else {
    console.log(`  Status: ${info.status}`);
    console.log(`  Points count: ${info.pointsCount}`);
    if (info.vectorSize !== undefined && info.vectorSize !== config.vectorSize) {
      console.error(
        `  WARNING: collection vector size ${info.vectorSize} does not match EMBEDDING_DIMENSIONS ${config.vectorSize}`
      );
    }
  }
  console.log('');

  if (!indexes.success) {
    process.exit(1);
  }

  console.log('Collection is ready. Ingest pages with:');
  console.log('  npx tsx scripts/src/ingest-urls.ts <topic> <url...>');
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
