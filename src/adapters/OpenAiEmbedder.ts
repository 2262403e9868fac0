import OpenAI from 'openai';
import { Embedder, EmbedOptions } from '../ports/Embedder';
import { EmbeddingUnavailableError } from '../errors';
import { describeOpenAiError } from './openAiErrors';

/** The slice of the OpenAI client this adapter calls. */
export interface EmbeddingsClient {
    embeddings: {
        create(
            body: { model: string; input: string },
            options?: { signal?: AbortSignal }
        ): Promise<{ data: Array<{ embedding: number[] }> }>;
    };
}

export class OpenAiEmbedder implements Embedder {
    private readonly client: EmbeddingsClient;

    constructor(readonly modelId: string = 'text-embedding-3-small', options: { apiKey?: string; client?: EmbeddingsClient } = {}) {
        if (options.client) {
            this.client = options.client;
            return;
        }
        if (!options.apiKey) {
            throw new EmbeddingUnavailableError('OPENAI_API_KEY is not set');
        }
        this.client = new OpenAI({
            apiKey: options.apiKey,
        });
    }

    async getEmbeddings(text: string, options: EmbedOptions = {}): Promise<number[]> {
        let response: { data: Array<{ embedding: number[] }> };
        try {
            response = await this.client.embeddings.create(
                {
                    model: this.modelId,
                    input: text,
                },
                { signal: options.signal }
            );
        } catch (error) {
            throw new EmbeddingUnavailableError(`OpenAI embeddings request failed: ${describeOpenAiError(error)}`, error);
        }

        const embedding = response.data[0]?.embedding;
        if (!embedding || embedding.length === 0) {
            throw new EmbeddingUnavailableError(`OpenAI returned no embedding for model ${this.modelId}`);
        }
        return embedding;
    }
}
