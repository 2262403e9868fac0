export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface Embedder {
  /** Identifier of the embedding model; stored with the index it built. */
  readonly modelId: string;
  getEmbeddings: (text: string, options?: EmbedOptions) => Promise<number[]>;
  close?: () => Promise<void>;
}
