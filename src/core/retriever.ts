import type { Embedder } from '../ports/Embedder';
import type { VectorIndex, QueryResult } from './vector-index';
import { CancelledError, EmbeddingUnavailableError, RagError, getErrorMessage } from '../errors';
import { withDeadline } from '../utils/abort';

export interface RetrieverOptions {
  timeoutMs: number;
}

export interface RetrieveOptions {
  signal?: AbortSignal;
  /** Called once the question has been embedded. */
  onEmbedded?: () => void;
}

export class Retriever {
  constructor(private readonly embedder: Embedder, private readonly options: RetrieverOptions) {}

  async query(index: VectorIndex, question: string, k: number, options: RetrieveOptions = {}): Promise<QueryResult> {
    if (index.isEmpty()) return [];

    const queryEmbedding = await this.embed(question, options.signal);
    options.onEmbedded?.();

    return index.search(queryEmbedding, k);
  }

  private async embed(question: string, signal?: AbortSignal): Promise<number[]> {
    const deadline = withDeadline(this.options.timeoutMs, signal);
    try {
      return await this.embedder.getEmbeddings(question, { signal: deadline.signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError('Question cancelled while embedding', error);
      }
      if (deadline.timedOut()) {
        throw new EmbeddingUnavailableError(`Embedding timed out after ${this.options.timeoutMs}ms`, error);
      }
      if (error instanceof RagError) throw error;
      throw new EmbeddingUnavailableError(`Failed to embed question: ${getErrorMessage(error)}`, error);
    } finally {
      deadline.dispose();
    }
  }
}
