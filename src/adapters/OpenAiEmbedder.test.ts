import { describe, expect, it, vi } from 'vitest';
import { EmbeddingsClient, OpenAiEmbedder } from './OpenAiEmbedder';
import { EmbeddingUnavailableError } from '../errors';

function fakeClient(create: EmbeddingsClient['embeddings']['create']): EmbeddingsClient {
  return { embeddings: { create } };
}

describe('OpenAiEmbedder', () => {
  it('requests one embedding with the configured model', async () => {
    const create = vi.fn(async () => ({ data: [{ embedding: [0.1, 0.2, 0.3] }] }));
    const embedder = new OpenAiEmbedder('text-embedding-3-small', { client: fakeClient(create) });

    const vector = await embedder.getEmbeddings('Vacation policy');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    expect(embedder.modelId).toBe('text-embedding-3-small');
    expect(create).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: 'Vacation policy' }, { signal: undefined });
  });

  it('reports request failures as EmbeddingUnavailableError', async () => {
    const embedder = new OpenAiEmbedder('text-embedding-3-small', {
      client: fakeClient(async () => {
        throw new Error('getaddrinfo ENOTFOUND api.openai.com');
      }),
    });

    await expect(embedder.getEmbeddings('Vacation policy')).rejects.toThrow(
      new EmbeddingUnavailableError('OpenAI embeddings request failed: getaddrinfo ENOTFOUND api.openai.com')
    );
  });

  it('rejects a response without vectors', async () => {
    const embedder = new OpenAiEmbedder('text-embedding-3-small', { client: fakeClient(async () => ({ data: [] })) });

    await expect(embedder.getEmbeddings('Vacation policy')).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });

  it('requires an API key when no client is given', () => {
    expect(() => new OpenAiEmbedder('text-embedding-3-small')).toThrow(EmbeddingUnavailableError);
  });
});
