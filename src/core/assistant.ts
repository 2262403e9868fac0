import type { DocumentSource } from '../ports/DocumentSource';
import type { Embedder } from '../ports/Embedder';
import type { IndexStore } from '../ports/IndexStore';
import type { LLM } from '../ports/LLM';
import type { VectorIndex } from './vector-index';
import { IngestHandler } from './ingest-handler';
import { Retriever } from './retriever';
import { AnswerSynthesizer } from './answer-synthesizer';
import { Answer, QueryHandler } from './query-handler';
import { Logger, silentLogger } from '../utils/logger';

export interface AssistantDeps {
  documents: DocumentSource;
  embedder: Embedder;
  llm: LLM;
  store: IndexStore;
  logger?: Logger;
}

export interface AssistantSettings {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  relevanceThreshold: number;
  modelCandidates: readonly string[];
  fallbackMessage: string;
  checkStaleness: boolean;
  requestTimeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Owns the index for the lifetime of the process. `start` builds or loads it
 * once; `ask` is the only entry point the UI needs.
 */
export class Assistant {
  private constructor(
    readonly index: VectorIndex,
    private readonly queryHandler: QueryHandler,
    private readonly store: IndexStore,
    private readonly embedder: Embedder
  ) {}

  static async start(deps: AssistantDeps, settings: AssistantSettings, options: { rebuild?: boolean } = {}): Promise<Assistant> {
    const logger = deps.logger ?? silentLogger;
    const ingestion = new IngestHandler(
      deps.store,
      deps.embedder,
      {
        chunkSize: settings.chunkSize,
        chunkOverlap: settings.chunkOverlap,
        checkStaleness: settings.checkStaleness,
        timeoutMs: settings.requestTimeoutMs,
      },
      logger
    );

    const documents = await deps.documents.load();
    logger.debug(`📄 Loaded ${documents.length} documents`);
    const index = options.rebuild ? await ingestion.rebuild(documents) : await ingestion.run(documents);

    const retriever = new Retriever(deps.embedder, { timeoutMs: settings.requestTimeoutMs });
    const synthesizer = new AnswerSynthesizer(
      deps.llm,
      {
        fallbackMessage: settings.fallbackMessage,
        timeoutMs: settings.requestTimeoutMs,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
      },
      logger
    );
    const queryHandler = new QueryHandler(
      index,
      retriever,
      synthesizer,
      {
        topK: settings.topK,
        relevanceThreshold: settings.relevanceThreshold,
        modelCandidates: settings.modelCandidates,
        fallbackMessage: settings.fallbackMessage,
      },
      logger
    );

    return new Assistant(index, queryHandler, deps.store, deps.embedder);
  }

  ask(question: string, options: { signal?: AbortSignal } = {}): Promise<Answer> {
    return this.queryHandler.run(question, options);
  }

  async close(): Promise<void> {
    await this.store.close();
    await this.embedder.close?.();
  }
}
