import 'dotenv/config';
import { createApp } from './app.js';
import { loadRagConfig, validateRagConfig } from './config/rag-config.js';
import { loadCorpus } from './services/rag/corpus.js';
import { createIndexStore, KnowledgeBase, knowledgeBaseOptionsFromConfig } from './services/rag/knowledge-base.js';
import { createProviders } from './services/rag/providers.js';

// Validate required environment variables
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

const app = createApp(knowledgeBase, {
  frontendUrls: config.frontendUrls,
  version: process.env.npm_package_version,
});

// Load the persisted index before accepting traffic
await knowledgeBase.load();

app.listen(config.port, () => {
  console.log(`Document Q&A API running on port ${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/health`);
});

export default app;
