import { z } from 'zod';
import type { RagConfig, OllamaConfig } from '../types';

const envSchema = z.object({
  DATA_PATH: z.string().min(1).default('./data/collections'),
  RAG_CHUNK_SIZE: z.coerce.number().int().default(1000),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().default(200),
  RAG_TOP_K_PER_KNOWLEDGE: z.coerce.number().int().default(3),
  RAG_FINAL_TOP_K: z.coerce.number().int().default(5),
  RAG_PREVIEW_LENGTH: z.coerce.number().int().positive().default(100),
  EMBEDDING_MODEL: z.string().min(1).default('paraphrase-multilingual'),
  CHROMA_URL: z.string().url().default('http://localhost:8000'),
  MAX_FILE_SIZE_MB: z.coerce.number().positive().default(50),
  OLLAMA_ENDPOINT: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('qwen3:1.7b'),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().default(120000),
  ENABLE_THINKING: z.string().optional().transform((value) => value === 'true')
});

export class Config {
  private static instance: Config;
  public readonly rag: RagConfig;
  public readonly ollama: OllamaConfig;

  private constructor(env: NodeJS.ProcessEnv) {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`Invalid environment: ${details}`);
    }
    const vars = parsed.data;

    this.rag = {
      dataPath: vars.DATA_PATH,
      chunkSize: vars.RAG_CHUNK_SIZE,
      chunkOverlap: vars.RAG_CHUNK_OVERLAP,
      topKPerKnowledge: vars.RAG_TOP_K_PER_KNOWLEDGE,
      finalTopK: vars.RAG_FINAL_TOP_K,
      previewLength: vars.RAG_PREVIEW_LENGTH,
      embeddingModel: vars.EMBEDDING_MODEL,
      chromaUrl: vars.CHROMA_URL,
      maxFileSizeMb: vars.MAX_FILE_SIZE_MB
    };

    this.ollama = {
      endpoint: vars.OLLAMA_ENDPOINT,
      model: vars.OLLAMA_MODEL,
      timeoutMs: vars.OLLAMA_TIMEOUT_MS,
      enableThinking: vars.ENABLE_THINKING
    };
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config(process.env);
    }
    return Config.instance;
  }

  /**
   * Cross-field checks; request-level limits must accept the configured defaults
   */
  public validate(): void {
    const { chunkSize, chunkOverlap, topKPerKnowledge, finalTopK } = this.rag;

    if (chunkSize <= 0) {
      throw new Error('RAG_CHUNK_SIZE must be positive');
    }
    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new Error('RAG_CHUNK_OVERLAP must be at least 0 and less than RAG_CHUNK_SIZE');
    }
    if (topKPerKnowledge < 1 || topKPerKnowledge > 10) {
      throw new Error('RAG_TOP_K_PER_KNOWLEDGE must be between 1 and 10');
    }
    if (finalTopK < 1 || finalTopK > 20) {
      throw new Error('RAG_FINAL_TOP_K must be between 1 and 20');
    }
    if (this.ollama.timeoutMs <= 0) {
      throw new Error('OLLAMA_TIMEOUT_MS must be positive');
    }
  }
}

export const config = Config.getInstance();
