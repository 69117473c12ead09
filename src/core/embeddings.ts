import type { IEmbeddingFunction } from 'chromadb';
import { config } from '../config';
import { OllamaClient, ollamaClient } from '../ollama/client';
import { ExternalServiceError, errorMessage } from './errors';

const BATCH_SIZE = 50;

export type EmbeddingBackend = Pick<OllamaClient, 'embed'>;

/**
 * Sentence embeddings from an Ollama embedding model. Chroma calls generate()
 * both when chunks are written and when a question is searched.
 */
export class OllamaEmbeddingService implements IEmbeddingFunction {
  private backend: EmbeddingBackend;
  private modelName: string;
  private cache = new Map<string, number[]>();
  private initialized = false;

  constructor(modelName: string = config.rag.embeddingModel, backend: EmbeddingBackend = ollamaClient) {
    this.modelName = modelName;
    this.backend = backend;
  }

  async generate(texts: string[]): Promise<number[][]> {
    const startTime = Date.now();
    const missing = [...new Set(texts.filter((text) => !this.cache.has(text)))];

    for (let start = 0; start < missing.length; start += BATCH_SIZE) {
      const batch = missing.slice(start, start + BATCH_SIZE);

      let vectors: number[][];
      try {
        vectors = await this.backend.embed(batch, this.modelName);
      } catch (error) {
        console.error('Embedding generation failed', error);
        throw new ExternalServiceError('embeddings', `Failed to generate embeddings: ${errorMessage(error)}`);
      }

      batch.forEach((text, i) => this.cache.set(text, vectors[i]));
      this.initialized = true;
    }

    if (missing.length > 1) {
      console.log(`Embedded ${missing.length} texts in ${Date.now() - startTime}ms`);
    }

    return texts.map((text) => {
      const vector = this.cache.get(text);
      if (!vector) {
        throw new ExternalServiceError('embeddings', 'Embedding missing after generation');
      }
      return vector;
    });
  }

  /**
   * initialized turns true once the model has answered a request
   */
  getModelInfo(): { name: string; initialized: boolean } {
    return {
      name: this.modelName,
      initialized: this.initialized
    };
  }

  clearCache(): void {
    this.cache.clear();
  }
}

export const embeddingService = new OllamaEmbeddingService();
