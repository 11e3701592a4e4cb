/**
 * Standalone ingestion: reads the corpus directory, rebuilds the index and
 * publishes it for the API server to load.
 *
 *   npm run build && npm run ingest
 */

import 'dotenv/config';
import { loadRagConfig, validateRagConfig } from '../config/rag-config.js';
import { loadCorpus } from '../services/rag/corpus.js';
import { createIndexStore, KnowledgeBase, knowledgeBaseOptionsFromConfig } from '../services/rag/knowledge-base.js';
import { createProviders } from '../services/rag/providers.js';
import { errorMessage } from '../utils/errors.js';

async function main(): Promise<void> {
  const config = loadRagConfig();
  validateRagConfig(config);

  const knowledgeBase = new KnowledgeBase(
    {
      ...createProviders(config),
      store: createIndexStore(config),
      loadCorpus: () => loadCorpus(config.corpusDir),
    },
    knowledgeBaseOptionsFromConfig(config),
  );

  const summary = await knowledgeBase.reingest();

  console.log('[Ingestion] Summary:');
  console.log(`   - Documents: ${summary.documents} (${summary.skipped_documents} without text)`);
  console.log(`   - Pages: ${summary.pages}`);
  console.log(`   - Chunks: ${summary.chunks}`);
  console.log(`   - Compression: ${summary.compression.compressed} compressed, ` +
    `${summary.compression.skipped} skipped, ${summary.compression.fallback} fell back ` +
    `(average ratio ${summary.compression.average_ratio.toFixed(2)})`);
  console.log(`   - Embedding space: ${summary.embedding_space}`);
  console.log(`   - Build: ${summary.build_id} in ${config.indexDir}`);
}

main().catch((err: unknown) => {
  console.error(`[Ingestion] Failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});
