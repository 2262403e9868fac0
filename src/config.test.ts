import { describe, expect, it } from 'vitest';
import { loadConfig, toAssistantSettings } from './config';
import { ConfigurationError } from './errors';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      openaiApiKey: undefined,
      embedding: { provider: 'openai', model: 'text-embedding-3-small' },
      chat: { modelCandidates: ['gpt-5-nano', 'gpt-5-mini', 'gpt-4o-mini'], temperature: undefined, maxTokens: 800 },
      retrieval: { relevanceThreshold: 0.4, topK: 3 },
      chunking: { chunkSize: 500, chunkOverlap: 50 },
      docsDir: 'docs',
      index: { store: 'file', path: '.index_store/index.json', checkStaleness: true },
      requestTimeoutMs: 30000,
      fallbackMessage: "I'm not fully sure - please contact HR at hr@company.ch",
      logLevel: 'info',
    });
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      EMBEDDING_PROVIDER: 'LOCAL',
      OPENAI_MODEL: 'primary-model',
      OPENAI_FALLBACK_MODELS: 'backup-a, backup-b,,',
      RELEVANCE_THRESHOLD: '0.75',
      TOP_K: '5',
      CHUNK_SIZE: '',
      INDEX_STALENESS_CHECK: 'off',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.openaiApiKey).toBe('test-key');
    expect(config.embedding).toEqual({ provider: 'local', model: 'Xenova/all-MiniLM-L6-v2' });
    expect(config.chat.modelCandidates).toEqual(['primary-model', 'backup-a', 'backup-b']);
    expect(config.retrieval).toEqual({ relevanceThreshold: 0.75, topK: 5 });
    expect(config.chunking.chunkSize).toBe(500);
    expect(config.index.checkStaleness).toBe(false);
    expect(config.logLevel).toBe('debug');
  });

  it('selects the postgres store when a connection string is given', () => {
    const config = loadConfig({ INDEX_STORE: 'postgres', DATABASE_URL: 'postgres://localhost/policies', INDEX_NAME: 'hr' });

    expect(config.index).toEqual({
      store: 'postgres',
      databaseUrl: 'postgres://localhost/policies',
      name: 'hr',
      checkStaleness: true,
    });
  });

  it('requires a connection string for the postgres store', () => {
    expect(() => loadConfig({ INDEX_STORE: 'postgres' })).toThrow('DATABASE_URL is required when INDEX_STORE=postgres');
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      'CHUNK_OVERLAP must be smaller than CHUNK_SIZE (100)'
    );
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig({ RELEVANCE_THRESHOLD: 'high' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ TOP_K: '2.5' })).toThrow(/TOP_K/);
  });

  it('sends a chat temperature only when one is configured', () => {
    expect(loadConfig({}).chat.temperature).toBeUndefined();
    expect(loadConfig({ CHAT_TEMPERATURE: '0.7' }).chat.temperature).toBe(0.7);
    expect(() => loadConfig({ CHAT_TEMPERATURE: '3' })).toThrow(/CHAT_TEMPERATURE/);
  });

  it('rejects a threshold outside the cosine range', () => {
    expect(() => loadConfig({ RELEVANCE_THRESHOLD: '1.5' })).toThrow(/RELEVANCE_THRESHOLD/);
  });
});

describe('toAssistantSettings', () => {
  it('flattens the parts the assistant needs', () => {
    const settings = toAssistantSettings(loadConfig({ TOP_K: '4', INDEX_STALENESS_CHECK: 'false' }));

    expect(settings).toEqual({
      chunkSize: 500,
      chunkOverlap: 50,
      topK: 4,
      relevanceThreshold: 0.4,
      modelCandidates: ['gpt-5-nano', 'gpt-5-mini', 'gpt-4o-mini'],
      fallbackMessage: "I'm not fully sure - please contact HR at hr@company.ch",
      checkStaleness: false,
      requestTimeoutMs: 30000,
      temperature: undefined,
      maxTokens: 800,
    });
  });
});
