import type { Document } from '../ports/DocumentSource';
import { ConfigurationError } from '../errors';

export interface Chunk {
  id: string;
  source: string;
  ordinal: number;
  text: string;
  /** Offsets into the document text, end exclusive. */
  start: number;
  end: number;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 500,
  chunkOverlap: 50,
};

export function validateChunkOptions({ chunkSize, chunkOverlap }: ChunkOptions): void {
  if (!Number.isInteger(chunkSize) || !Number.isInteger(chunkOverlap)) {
    throw new ConfigurationError(`Chunk size and overlap must be integers (got ${chunkSize}/${chunkOverlap})`);
  }
  if (chunkOverlap < 0 || chunkSize <= chunkOverlap) {
    throw new ConfigurationError(
      `Chunk size must be greater than overlap and overlap must not be negative (got ${chunkSize}/${chunkOverlap})`
    );
  }
}

/**
 * Slides a fixed window over the raw text. Consecutive chunks share exactly
 * `chunkOverlap` characters; only the last chunk may be shorter than
 * `chunkSize`.
 */
export function chunkDocument(document: Document, options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): Chunk[] {
  validateChunkOptions(options);
  const { chunkSize, chunkOverlap } = options;
  const text = document.text;
  const step = chunkSize - chunkOverlap;
  const chunks: Chunk[] = [];

  let start = 0;
  while (start < text.length) {
    const end = Math.min(start + chunkSize, text.length);
    const ordinal = chunks.length;
    chunks.push({
      id: `${document.id}#${ordinal}`,
      source: document.id,
      ordinal,
      text: text.slice(start, end),
      start,
      end,
    });
    if (end === text.length) break;
    start += step;
  }

  return chunks;
}

export function chunkDocuments(documents: Document[], options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): Chunk[] {
  return documents.flatMap((document) => chunkDocument(document, options));
}

/** Inverse of chunkDocument for the chunks of a single document. */
export function reassembleChunks(chunks: Chunk[], chunkOverlap: number): string {
  return chunks.map((chunk, index) => (index === 0 ? chunk.text : chunk.text.slice(chunkOverlap))).join('');
}
