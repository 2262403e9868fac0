import { pipeline, type FeatureExtractionPipeline } from '@huggingface/transformers';
import { Embedder, EmbedOptions } from '../ports/Embedder';
import { CancelledError, EmbeddingUnavailableError, getErrorMessage } from '../errors';
import { Logger, silentLogger } from '../utils/logger';

/**
 * Runs a sentence-transformers model in process. The model is downloaded on
 * first use and cached by transformers.js.
 */
export class LocalEmbedder implements Embedder {
  private model: FeatureExtractionPipeline | null = null;
  private loading: Promise<FeatureExtractionPipeline> | null = null;

  constructor(readonly modelId: string = 'Xenova/all-MiniLM-L6-v2', private readonly logger: Logger = silentLogger) {}

  private async initializeModel(): Promise<FeatureExtractionPipeline> {
    if (this.model) return this.model;
    if (!this.loading) {
      this.logger.info('🤖 Loading local embedding model...');
      this.loading = (pipeline('feature-extraction', this.modelId) as Promise<FeatureExtractionPipeline>)
        .then((model) => {
          this.model = model;
          this.logger.success('✅ Local embedding model loaded successfully');
          return model;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  async getEmbeddings(text: string, options: EmbedOptions = {}): Promise<number[]> {
    if (options.signal?.aborted) {
      throw new CancelledError('Embedding cancelled', options.signal.reason);
    }

    let model: FeatureExtractionPipeline;
    try {
      model = await this.initializeModel();
    } catch (error) {
      throw new EmbeddingUnavailableError(`Failed to load ${this.modelId}: ${getErrorMessage(error)}`, error);
    }

    try {
      // Generate embeddings with mean pooling and normalization
      const result = await model(text, {
        pooling: 'mean',
        normalize: true,
      });
      const embeddings = Array.from(result.data, (value) => Number(value));
      if (embeddings.length === 0) {
        throw new Error('model returned an empty vector');
      }
      if (options.signal?.aborted) {
        throw new CancelledError('Embedding cancelled', options.signal.reason);
      }
      return embeddings;
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      throw new EmbeddingUnavailableError(`Failed to generate embeddings: ${getErrorMessage(error)}`, error);
    }
  }

  async close(): Promise<void> {
    const model = this.model;
    this.model = null;
    await model?.dispose();
  }
}
