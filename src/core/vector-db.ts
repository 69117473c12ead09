import { ChromaClient, IncludeEnum, type IEmbeddingFunction } from 'chromadb';
import { z } from 'zod';
import { config } from '../config';
import { embeddingService } from './embeddings';
import { ExternalServiceError, errorMessage } from './errors';
import type { ChunkMetadata, DocumentChunk, IndexMatch, VectorIndex } from '../types';

export const ADD_BATCH_SIZE = 100;
export const GET_PAGE_SIZE = 1000;

// Similarity is derived from cosine distance, so every index uses the cosine space
const COLLECTION_METADATA = { 'hnsw:space': 'cosine' };

export const chunkMetadataSchema = z.object({
  source: z.string(),
  kind: z.enum(['pdf', 'tabular']),
  collection: z.string(),
  chunkIndex: z.number().int(),
  start: z.number().int(),
  end: z.number().int(),
  page: z.number().int().optional(),
  description: z.string().optional(),
  columns: z.string().optional()
});

type ChromaMetadata = Record<string, unknown> | null;

/**
 * The parts of a Chroma collection the index uses
 */
export interface IndexCollection {
  query(params: { queryTexts: string[]; nResults: number; include: IncludeEnum[] }): Promise<{
    ids: string[][];
    documents?: (string | null)[][] | null;
    metadatas?: ChromaMetadata[][] | null;
    distances?: (number | null)[][] | null;
  }>;
  get(params: { limit: number; offset: number; include: IncludeEnum[] }): Promise<{
    ids: string[];
    metadatas?: ChromaMetadata[] | null;
  }>;
  upsert(params: { ids: string[]; documents: string[]; metadatas: Record<string, string | number>[] }): Promise<unknown>;
  count(): Promise<number>;
}

interface CollectionParams {
  name: string;
  metadata?: Record<string, string>;
  embeddingFunction: IEmbeddingFunction;
}

/**
 * The parts of ChromaClient the index uses
 */
export interface ChromaApi {
  heartbeat(): Promise<unknown>;
  getCollection(params: CollectionParams): Promise<IndexCollection>;
  createCollection(params: CollectionParams): Promise<IndexCollection>;
  getOrCreateCollection(params: CollectionParams): Promise<IndexCollection>;
  deleteCollection(params: { name: string }): Promise<unknown>;
}

export interface ChromaVectorDBOptions {
  chromaUrl?: string;
  client?: ChromaApi;
  embeddingFunction?: IEmbeddingFunction;
}

// Chroma signals a missing collection with an error; the status code differs between server versions
export function isMissingCollectionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === 'ChromaNotFoundError' || /does not exist|not found/i.test(error.message);
}

function toChromaMetadata(metadata: ChunkMetadata): Record<string, string | number> {
  const record: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === 'string' || typeof value === 'number') {
      record[key] = value;
    }
  }
  return record;
}

export class ChromaVectorDB implements VectorIndex {
  private client: ChromaApi;
  private embeddingFunction: IEmbeddingFunction;
  private initialized = false;

  constructor(options: ChromaVectorDBOptions = {}) {
    // Chroma requires a server
    this.client = options.client ?? new ChromaClient({ path: options.chromaUrl ?? config.rag.chromaUrl });
    this.embeddingFunction = options.embeddingFunction ?? embeddingService;
  }

  /**
   * Check the server connection
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      await this.client.heartbeat();
      this.initialized = true;
    } catch (error) {
      console.error('Failed to connect to Chroma', error);
      throw new ExternalServiceError('chroma', `Vector DB initialization failed: ${errorMessage(error)}`);
    }
  }

  async exists(indexId: string): Promise<boolean> {
    return (await this.findCollection(indexId)) !== null;
  }

  /**
   * Replace the index with a fresh one holding exactly these chunks
   */
  async create(indexId: string, chunks: DocumentChunk[]): Promise<void> {
    await this.delete(indexId);

    const collection = await this.run(`create index ${indexId}`, () =>
      this.client.createCollection({
        name: indexId,
        metadata: COLLECTION_METADATA,
        embeddingFunction: this.embeddingFunction
      })
    );
    console.log(`Created index: ${indexId}`);

    await this.addChunks(indexId, collection, chunks);
  }

  /**
   * Add chunks to the index, creating it when missing
   */
  async upsert(indexId: string, chunks: DocumentChunk[]): Promise<void> {
    await this.initialize();

    const collection = await this.run(`open index ${indexId}`, () =>
      this.client.getOrCreateCollection({
        name: indexId,
        metadata: COLLECTION_METADATA,
        embeddingFunction: this.embeddingFunction
      })
    );

    await this.addChunks(indexId, collection, chunks);
  }

  async query(indexId: string, text: string, k: number): Promise<IndexMatch[]> {
    const collection = await this.findCollection(indexId);
    if (!collection) {
      throw new ExternalServiceError('chroma', `Index ${indexId} does not exist`);
    }

    const results = await this.run(`query index ${indexId}`, () =>
      collection.query({
        queryTexts: [text],
        nResults: k,
        include: [IncludeEnum.Documents, IncludeEnum.Metadatas, IncludeEnum.Distances]
      })
    );

    const ids = results.ids?.[0] ?? [];
    const documents = results.documents?.[0] ?? [];
    const metadatas = results.metadatas?.[0] ?? [];
    const distances = results.distances?.[0] ?? [];

    const matches: IndexMatch[] = [];
    for (let i = 0; i < ids.length; i++) {
      const metadata = chunkMetadataSchema.safeParse(metadatas[i]);
      if (!metadata.success) {
        console.warn(`Skipping chunk ${ids[i]} with unexpected metadata in ${indexId}`);
        continue;
      }

      matches.push({
        chunk: {
          id: ids[i],
          content: documents[i] ?? '',
          metadata: metadata.data
        },
        distance: distances[i] ?? 0
      });
    }

    return matches;
  }

  async delete(indexId: string): Promise<void> {
    if (!(await this.exists(indexId))) {
      return;
    }

    await this.run(`delete index ${indexId}`, () => this.client.deleteCollection({ name: indexId }));
    console.log(`Deleted index: ${indexId}`);
  }

  /**
   * Source filenames recorded in the metadata of the stored chunks
   */
  async listSources(indexId: string): Promise<Set<string>> {
    const sources = new Set<string>();
    const collection = await this.findCollection(indexId);
    if (!collection) {
      return sources;
    }

    for (let offset = 0; ; offset += GET_PAGE_SIZE) {
      const page = await this.run(`read index ${indexId}`, () =>
        collection.get({ limit: GET_PAGE_SIZE, offset, include: [IncludeEnum.Metadatas] })
      );

      for (const metadata of page.metadatas ?? []) {
        const source = metadata?.source;
        if (typeof source === 'string') {
          sources.add(source);
        }
      }

      if ((page.ids ?? []).length < GET_PAGE_SIZE) {
        break;
      }
    }

    return sources;
  }

  async count(indexId: string): Promise<number> {
    const collection = await this.findCollection(indexId);
    if (!collection) {
      return 0;
    }
    return this.run(`count index ${indexId}`, () => collection.count());
  }

  private async findCollection(indexId: string): Promise<IndexCollection | null> {
    await this.initialize();

    try {
      return await this.client.getCollection({
        name: indexId,
        embeddingFunction: this.embeddingFunction
      });
    } catch (error) {
      if (!isMissingCollectionError(error)) {
        console.error(`Chroma failed to open index ${indexId}`, error);
        throw new ExternalServiceError('chroma', `Failed to open index ${indexId}: ${errorMessage(error)}`);
      }
      console.log(`Index ${indexId} not found`);
      return null;
    }
  }

  private async addChunks(indexId: string, collection: IndexCollection, chunks: DocumentChunk[]): Promise<void> {
    for (let start = 0; start < chunks.length; start += ADD_BATCH_SIZE) {
      const batch = chunks.slice(start, start + ADD_BATCH_SIZE);

      await this.run(`write index ${indexId}`, () =>
        collection.upsert({
          ids: batch.map((chunk) => chunk.id),
          documents: batch.map((chunk) => chunk.content),
          metadatas: batch.map((chunk) => toChromaMetadata(chunk.metadata))
        })
      );
    }

    console.log(`Added ${chunks.length} chunks to index: ${indexId}`);
  }

  private async run<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      console.error(`Chroma failed to ${action}`, error);
      throw new ExternalServiceError('chroma', `Failed to ${action}: ${errorMessage(error)}`);
    }
  }
}

// Singleton instance
export const vectorDb = new ChromaVectorDB();
