import type { Document, DocumentSource } from '../ports/DocumentSource';
import type { Embedder, EmbedOptions } from '../ports/Embedder';
import type { ChatMessage, CompletionOptions, LLM } from '../ports/LLM';
import type { IndexStore } from '../ports/IndexStore';
import type { IndexSnapshot } from '../core/index-snapshot';
import { EmbeddingUnavailableError, GenerationUnavailableError, IndexCorruptError } from '../errors';

export class StaticDocumentSource implements DocumentSource {
  constructor(public documents: Document[]) {}

  async load(): Promise<Document[]> {
    return this.documents;
  }
}

/**
 * Maps text to vectors through a caller-supplied function and records every
 * call, so tests can assert how often the embedding capability was used.
 */
export class FakeEmbedder implements Embedder {
  readonly calls: string[] = [];
  failWith: Error | null = null;

  constructor(private readonly vectorFor: (text: string) => number[], readonly modelId = 'fake-embedding') {}

  async getEmbeddings(text: string, options: EmbedOptions = {}): Promise<number[]> {
    this.calls.push(text);
    if (options.signal?.aborted) throw new Error('aborted');
    if (this.failWith) throw this.failWith;
    return this.vectorFor(text);
  }
}

/** Embeds by counting keyword occurrences; the vector has one slot per keyword. */
export function keywordEmbedder(keywords: string[], modelId?: string): FakeEmbedder {
  return new FakeEmbedder(
    (text) => keywords.map((keyword) => (text.toLowerCase().includes(keyword) ? 1 : 0)),
    modelId
  );
}

export class UnreachableEmbedder implements Embedder {
  readonly modelId = 'fake-embedding';
  calls = 0;

  async getEmbeddings(): Promise<number[]> {
    this.calls += 1;
    throw new EmbeddingUnavailableError('connection refused');
  }
}

export interface RecordedCompletion {
  messages: ChatMessage[];
  options: CompletionOptions;
}

/** Answers per model: a string is returned, an Error is thrown. */
export class FakeLLM implements LLM {
  readonly calls: RecordedCompletion[] = [];

  constructor(private readonly responses: Record<string, string | Error | ((messages: ChatMessage[]) => string)> = {}) {}

  get models(): string[] {
    return this.calls.map((call) => call.options.model);
  }

  async generateCompletion(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    this.calls.push({ messages, options });
    const response = this.responses[options.model];
    if (response === undefined) throw new GenerationUnavailableError(`model ${options.model} not found`);
    if (response instanceof Error) throw response;
    if (typeof response === 'function') return response(messages);
    return response;
  }
}

export class MemoryIndexStore implements IndexStore {
  readonly location = 'memory';
  snapshot: IndexSnapshot | null = null;
  /** Set to make `load` fail the way a damaged file would. */
  corrupt = false;
  saves = 0;
  closed = false;

  async exists(): Promise<boolean> {
    return this.snapshot !== null || this.corrupt;
  }

  async load(): Promise<IndexSnapshot> {
    if (this.corrupt || !this.snapshot) throw new IndexCorruptError('memory snapshot unreadable');
    return structuredClone(this.snapshot);
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
    this.corrupt = false;
    this.saves += 1;
  }

  async delete(): Promise<void> {
    this.snapshot = null;
    this.corrupt = false;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
