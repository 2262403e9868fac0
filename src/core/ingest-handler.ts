import type { Document } from '../ports/DocumentSource';
import type { Embedder } from '../ports/Embedder';
import type { IndexStore } from '../ports/IndexStore';
import { chunkDocuments, validateChunkOptions, ChunkOptions } from './chunker';
import { fingerprintDocuments, IndexEntry } from './index-snapshot';
import { VectorIndex } from './vector-index';
import {
  ConfigurationError,
  EmbeddingUnavailableError,
  IndexCorruptError,
  RagError,
  getErrorMessage,
} from '../errors';
import { withDeadline } from '../utils/abort';
import { Logger, silentLogger } from '../utils/logger';

export interface IngestOptions extends ChunkOptions {
  /** Rebuild when the documents no longer match the persisted fingerprint. */
  checkStaleness: boolean;
  timeoutMs: number;
}

export class IngestHandler {
  constructor(
    private readonly store: IndexStore,
    private readonly embedder: Embedder,
    private readonly options: IngestOptions,
    private readonly logger: Logger = silentLogger
  ) {
    validateChunkOptions(options);
  }

  /** Loads the persisted index when it is usable, otherwise builds and saves a new one. */
  public async run(documents: Document[]): Promise<VectorIndex> {
    const fingerprint = fingerprintDocuments(documents, this.options, this.embedder.modelId);
    const persisted = await this.loadPersisted(fingerprint);
    if (persisted) return persisted;
    return this.build(documents, fingerprint);
  }

  /**
   * Embeds everything again without reading the persisted copy. The old copy
   * is only replaced once the new build has been saved.
   */
  public async rebuild(documents: Document[]): Promise<VectorIndex> {
    this.logger.info(`🔁 Rebuilding index at ${this.store.location}`);
    return this.build(documents, fingerprintDocuments(documents, this.options, this.embedder.modelId));
  }

  private async loadPersisted(fingerprint: string): Promise<VectorIndex | null> {
    if (!(await this.store.exists())) {
      this.logger.info(`📭 No persisted index at ${this.store.location}`);
      return null;
    }

    let index: VectorIndex;
    try {
      index = VectorIndex.fromSnapshot(await this.store.load());
    } catch (error) {
      if (error instanceof IndexCorruptError) {
        this.logger.warn(`⚠️  ${error.message}; rebuilding`);
        return null;
      }
      throw error;
    }

    if (index.metadata.embeddingModel !== this.embedder.modelId) {
      throw new ConfigurationError(
        `Persisted index at ${this.store.location} was built with ${index.metadata.embeddingModel} but the configured embedding model is ${this.embedder.modelId}; delete it or rebuild the index`
      );
    }

    if (this.options.checkStaleness && index.metadata.fingerprint !== fingerprint) {
      this.logger.warn('⚠️  Documents changed since the index was built; rebuilding');
      return null;
    }

    this.logger.success(`✅ Loaded index with ${index.size} chunks from ${this.store.location}`);
    return index;
  }

  private async build(documents: Document[], fingerprint: string): Promise<VectorIndex> {
    const chunks = chunkDocuments(documents, this.options);
    this.logger.info(`📦 Created ${chunks.length} chunks from ${documents.length} documents`);

    const entries: IndexEntry[] = [];
    for (const chunk of chunks) {
      this.logger.debug(`🔄 Embedding ${chunk.id}`);
      const vector = await this.embed(chunk.text, chunk.id);
      if (entries.length > 0 && vector.length !== entries[0].vector.length) {
        throw new ConfigurationError(
          `Embedding dimension changed mid-build: ${entries[0].vector.length} before ${chunk.id}, ${vector.length} for it`
        );
      }
      entries.push({ chunk, vector });
    }

    const index = new VectorIndex(entries, {
      embeddingModel: this.embedder.modelId,
      fingerprint,
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
      createdAt: new Date().toISOString(),
    });

    this.logger.info(`💾 Saving ${index.size} chunks to ${this.store.location}`);
    await this.store.save(index.toSnapshot());
    this.logger.success(`✅ Index built with ${index.size} chunks`);
    return index;
  }

  private async embed(text: string, chunkId: string): Promise<number[]> {
    const deadline = withDeadline(this.options.timeoutMs);
    try {
      return await this.embedder.getEmbeddings(text, { signal: deadline.signal });
    } catch (error) {
      if (deadline.timedOut()) {
        throw new EmbeddingUnavailableError(`Embedding ${chunkId} timed out after ${this.options.timeoutMs}ms`, error);
      }
      if (error instanceof RagError) throw error;
      throw new EmbeddingUnavailableError(`Failed to embed ${chunkId}: ${getErrorMessage(error)}`, error);
    } finally {
      deadline.dispose();
    }
  }
}
