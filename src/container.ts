import type { AppConfig } from './config';
import type { AssistantDeps } from './core/assistant';
import type { Embedder } from './ports/Embedder';
import type { IndexStore } from './ports/IndexStore';
import { FileSystemDocumentSource } from './adapters/FileSystemDocumentSource';
import { FileIndexStore } from './adapters/FileIndexStore';
import { LocalEmbedder } from './adapters/LocalEmbedder';
import { OpenAiEmbedder } from './adapters/OpenAiEmbedder';
import { OpenAIChatAdapter } from './adapters/OpenAiLLM';
import { PostgresIndexStore, createPool, poolExecutor } from './adapters/PostgresIndexStore';
import { Logger } from './utils/logger';

export function createEmbedder(config: AppConfig, logger: Logger): Embedder {
  switch (config.embedding.provider) {
    case 'local':
      return new LocalEmbedder(config.embedding.model, logger);
    case 'openai':
      return new OpenAiEmbedder(config.embedding.model, { apiKey: config.openaiApiKey });
  }
}

export function createIndexStore(config: AppConfig): IndexStore {
  switch (config.index.store) {
    case 'postgres':
      return new PostgresIndexStore(poolExecutor(createPool(config.index.databaseUrl)), config.index.name);
    case 'file':
      return new FileIndexStore(config.index.path);
  }
}

export function createDependencies(config: AppConfig, logger: Logger): AssistantDeps {
  if (!config.openaiApiKey) {
    logger.warn('⚠️  OPENAI_API_KEY is not set; answers will fall back to the HR contact message');
  }
  return {
    documents: new FileSystemDocumentSource(config.docsDir, logger),
    embedder: createEmbedder(config, logger),
    llm: new OpenAIChatAdapter({ apiKey: config.openaiApiKey }),
    store: createIndexStore(config),
    logger,
  };
}
