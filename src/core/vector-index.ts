import type { Chunk } from './chunker';
import type { IndexEntry, IndexSnapshot } from './index-snapshot';
import { SNAPSHOT_VERSION } from './index-snapshot';
import { ConfigurationError } from '../errors';

export interface ScoredChunk {
  chunk: Chunk;
  /** Cosine similarity in [-1, 1]. */
  score: number;
}

export type QueryResult = ScoredChunk[];

export interface IndexedChunk {
  readonly chunk: Readonly<Chunk>;
  readonly vector: readonly number[];
}

export interface VectorIndexMetadata {
  embeddingModel: string;
  fingerprint: string;
  chunkSize: number;
  chunkOverlap: number;
  createdAt?: string;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ConfigurationError(`Cannot compare vectors of dimension ${a.length} and ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // rounding can push this slightly past the bounds
  return Math.max(-1, Math.min(1, similarity));
}

/**
 * Immutable collection of chunk/vector pairs with brute-force nearest
 * neighbour search. Built once at startup and shared by every question.
 */
export class VectorIndex {
  readonly entries: readonly IndexedChunk[];
  readonly dimension: number | null;
  readonly metadata: Readonly<VectorIndexMetadata>;

  constructor(entries: IndexEntry[], metadata: VectorIndexMetadata) {
    const dimension = entries.length > 0 ? entries[0].vector.length : null;
    entries.forEach((entry) => {
      if (entry.vector.length !== dimension) {
        throw new ConfigurationError(
          `Embedding dimension mismatch in ${entry.chunk.id}: expected ${dimension}, got ${entry.vector.length}`
        );
      }
    });
    this.entries = Object.freeze(
      entries.map((entry): IndexedChunk => ({
        chunk: Object.freeze({ ...entry.chunk }),
        vector: Object.freeze([...entry.vector]),
      }))
    );
    this.dimension = dimension;
    this.metadata = Object.freeze({ ...metadata });
  }

  static fromSnapshot(snapshot: IndexSnapshot): VectorIndex {
    return new VectorIndex(snapshot.entries, {
      embeddingModel: snapshot.embeddingModel,
      fingerprint: snapshot.fingerprint,
      chunkSize: snapshot.chunkSize,
      chunkOverlap: snapshot.chunkOverlap,
      createdAt: snapshot.createdAt,
    });
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /** Top `k` entries by descending similarity; ties keep index order. */
  search(queryVector: readonly number[], k: number): QueryResult {
    if (this.isEmpty() || k <= 0) return [];
    if (queryVector.length !== this.dimension) {
      throw new ConfigurationError(
        `Query embedding has dimension ${queryVector.length} but the index was built with ${this.dimension} (model ${this.metadata.embeddingModel})`
      );
    }

    return this.entries
      .map((entry, position) => ({ entry, position, score: cosineSimilarity(queryVector, entry.vector) }))
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, k)
      .map(({ entry, score }) => ({ chunk: entry.chunk, score }));
  }

  toSnapshot(): IndexSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      createdAt: this.metadata.createdAt ?? new Date().toISOString(),
      embeddingModel: this.metadata.embeddingModel,
      dimension: this.dimension,
      fingerprint: this.metadata.fingerprint,
      chunkSize: this.metadata.chunkSize,
      chunkOverlap: this.metadata.chunkOverlap,
      entries: this.entries.map((entry) => ({ chunk: { ...entry.chunk }, vector: [...entry.vector] })),
    };
  }
}
