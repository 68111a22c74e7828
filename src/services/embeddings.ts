/**
 * Embedding backends
 */

import OpenAI from 'openai';
import { SemanticConfig } from '../config.js';
import { EmbeddingUnavailableError } from '../utils/errors.js';
import { describeError } from '../utils/logger.js';

export interface EmbeddingProvider {
  readonly model: string;
  /** @throws EmbeddingUnavailableError when the backend cannot produce a vector */
  embed(text: string): Promise<number[]>;
}

/**
 * Embeddings from any OpenAI-compatible endpoint (OpenAI itself, or a local
 * Ollama server's /v1 API)
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private openai: OpenAI;
  readonly model: string;

  constructor(config: Pick<SemanticConfig, 'embeddingModel' | 'baseURL' | 'apiKey'>) {
    this.model = config.embeddingModel;
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 1
    });
  }

  async embed(text: string): Promise<number[]> {
    try {
      const response = await this.openai.embeddings.create({
        model: this.model,
        input: text
      });

      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new EmbeddingUnavailableError(`Embedding model ${this.model} returned no vector`);
      }
      return embedding;
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) throw error;
      throw new EmbeddingUnavailableError(`Embedding request failed: ${describeError(error)}`, { cause: error });
    }
  }
}
