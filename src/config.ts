import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { LogLevel } from './utils/logger';
import { DEFAULT_FALLBACK_MESSAGE } from './prompts/systemPrompt';
import type { AssistantSettings } from './core/assistant';

const DEFAULT_EMBEDDING_MODELS = {
  openai: 'text-embedding-3-small',
  local: 'Xenova/all-MiniLM-L6-v2',
} as const;

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;
const lowercased = (value: unknown) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value);

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const number = (defaultValue: number) => z.preprocess(blankToUndefined, z.coerce.number().finite().default(defaultValue));
const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().finite().optional());
const integer = (defaultValue: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().default(defaultValue));
const boolean = (defaultValue: boolean) =>
  z.preprocess(
    lowercased,
    z
      .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
      .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on')
      .default(defaultValue ? 'true' : 'false')
  );
const csv = (defaultValue: string) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .default(defaultValue)
      .transform((raw) => raw.split(',').map((v) => v.trim()).filter((v) => v.length > 0))
  );

const envSchema = z
  .object({
    OPENAI_API_KEY: optionalString,
    EMBEDDING_PROVIDER: z.preprocess(lowercased, z.enum(['openai', 'local']).default('openai')),
    EMBEDDING_MODEL: optionalString,
    OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().trim().default('gpt-5-nano')),
    OPENAI_FALLBACK_MODELS: csv('gpt-5-mini,gpt-4o-mini'),
    // unset keeps the model's default; gpt-5 models reject any other value
    CHAT_TEMPERATURE: optionalNumber.pipe(z.number().min(0).max(2).optional()),
    CHAT_MAX_TOKENS: integer(800).pipe(z.number().positive()),
    RELEVANCE_THRESHOLD: number(0.4).pipe(z.number().min(-1).max(1)),
    CHUNK_SIZE: integer(500).pipe(z.number().positive()),
    CHUNK_OVERLAP: integer(50).pipe(z.number().nonnegative()),
    TOP_K: integer(3).pipe(z.number().positive()),
    DOCS_DIR: z.preprocess(blankToUndefined, z.string().default('docs')),
    INDEX_STORE: z.preprocess(lowercased, z.enum(['file', 'postgres']).default('file')),
    INDEX_PATH: z.preprocess(blankToUndefined, z.string().default('.index_store/index.json')),
    DATABASE_URL: optionalString,
    INDEX_NAME: z.preprocess(blankToUndefined, z.string().default('default')),
    INDEX_STALENESS_CHECK: boolean(true),
    REQUEST_TIMEOUT_MS: integer(30_000).pipe(z.number().positive()),
    FALLBACK_MESSAGE: z.preprocess(blankToUndefined, z.string().default(DEFAULT_FALLBACK_MESSAGE)),
    LOG_LEVEL: z.preprocess(
      lowercased,
      z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
    ),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: `must be smaller than CHUNK_SIZE (${env.CHUNK_SIZE})`,
      });
    }
    if (env.INDEX_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'is required when INDEX_STORE=postgres',
      });
    }
  });

export type EmbeddingProvider = keyof typeof DEFAULT_EMBEDDING_MODELS;

export interface AppConfig {
  openaiApiKey?: string;
  embedding: { provider: EmbeddingProvider; model: string };
  chat: { modelCandidates: string[]; temperature?: number; maxTokens: number };
  retrieval: { relevanceThreshold: number; topK: number };
  chunking: { chunkSize: number; chunkOverlap: number };
  docsDir: string;
  index:
    | { store: 'file'; path: string; checkStaleness: boolean }
    | { store: 'postgres'; databaseUrl: string; name: string; checkStaleness: boolean };
  requestTimeoutMs: number;
  fallbackMessage: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'} ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`, parsed.error);
  }
  const e = parsed.data;

  const index: AppConfig['index'] =
    e.INDEX_STORE === 'postgres' && e.DATABASE_URL
      ? { store: 'postgres', databaseUrl: e.DATABASE_URL, name: e.INDEX_NAME, checkStaleness: e.INDEX_STALENESS_CHECK }
      : { store: 'file', path: e.INDEX_PATH, checkStaleness: e.INDEX_STALENESS_CHECK };

  return {
    openaiApiKey: e.OPENAI_API_KEY,
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODELS[e.EMBEDDING_PROVIDER],
    },
    chat: {
      modelCandidates: [e.OPENAI_MODEL, ...e.OPENAI_FALLBACK_MODELS],
      temperature: e.CHAT_TEMPERATURE,
      maxTokens: e.CHAT_MAX_TOKENS,
    },
    retrieval: { relevanceThreshold: e.RELEVANCE_THRESHOLD, topK: e.TOP_K },
    chunking: { chunkSize: e.CHUNK_SIZE, chunkOverlap: e.CHUNK_OVERLAP },
    docsDir: e.DOCS_DIR,
    index,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    fallbackMessage: e.FALLBACK_MESSAGE,
    logLevel: e.LOG_LEVEL,
  };
}

export function toAssistantSettings(config: AppConfig): AssistantSettings {
  return {
    chunkSize: config.chunking.chunkSize,
    chunkOverlap: config.chunking.chunkOverlap,
    topK: config.retrieval.topK,
    relevanceThreshold: config.retrieval.relevanceThreshold,
    modelCandidates: config.chat.modelCandidates,
    fallbackMessage: config.fallbackMessage,
    checkStaleness: config.index.checkStaleness,
    requestTimeoutMs: config.requestTimeoutMs,
    temperature: config.chat.temperature,
    maxTokens: config.chat.maxTokens,
  };
}
