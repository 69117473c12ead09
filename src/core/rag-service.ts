import { CollectionStore, collectionStore, indexIdFor } from './collection-store';
import { Indexer, indexer } from './indexer';
import { CrossCollectionMerger, crossCollectionMerger } from './merger';
import { vectorDb } from './vector-db';
import { OllamaEmbeddingService, embeddingService } from './embeddings';
import { ExternalServiceError, errorMessage } from './errors';
import { answerQuestionSchema, extractTablesSchema, parseInput, renderPageSchema } from './schemas';
import { RAGChat, ragChat } from '../ollama/rag-chat';
import { OllamaClient, ollamaClient } from '../ollama/client';
import { config } from '../config';
import type {
  AnswerResult,
  CollectionFiles,
  CollectionInfo,
  CollectionMetadata,
  CuratedTable,
  EmbedResult,
  ExtractedTable,
  FileInfo,
  PageRenderer,
  QueryRequest,
  SystemStatus,
  TableExtractor,
  VectorIndex
} from '../types';

export interface RAGServiceOptions {
  store?: CollectionStore;
  indexer?: Indexer;
  merger?: CrossCollectionMerger;
  chat?: RAGChat;
  index?: VectorIndex;
  tableExtractor?: TableExtractor;
  pageRenderer?: PageRenderer;
  llm?: Pick<OllamaClient, 'checkHealth' | 'listModels' | 'getModel' | 'getEndpoint'>;
  embeddings?: Pick<OllamaEmbeddingService, 'getModelInfo'>;
}

export class RAGService {
  private store: CollectionStore;
  private indexer: Indexer;
  private merger: CrossCollectionMerger;
  private chat: RAGChat;
  private index: VectorIndex;
  private tableExtractor?: TableExtractor;
  private pageRenderer?: PageRenderer;
  private llm: Pick<OllamaClient, 'checkHealth' | 'listModels' | 'getModel' | 'getEndpoint'>;
  private embeddings: Pick<OllamaEmbeddingService, 'getModelInfo'>;

  constructor(options: RAGServiceOptions = {}) {
    this.store = options.store ?? collectionStore;
    this.indexer = options.indexer ?? indexer;
    this.merger = options.merger ?? crossCollectionMerger;
    this.chat = options.chat ?? ragChat;
    this.index = options.index ?? vectorDb;
    this.tableExtractor = options.tableExtractor;
    this.pageRenderer = options.pageRenderer;
    this.llm = options.llm ?? ollamaClient;
    this.embeddings = options.embeddings ?? embeddingService;
  }

  /**
   * Answer a question from one or more collections, with citations and per-collection usage
   */
  async answerQuestion(request: QueryRequest): Promise<AnswerResult> {
    const { collections, question, topKPerKnowledge, finalTopK, model } = parseInput(answerQuestionSchema, request);

    for (const name of collections) {
      await this.store.requireCollection(name);
    }

    const startTime = Date.now();
    console.log(`Processing question across ${collections.join(', ')}: "${question}"`);

    const { documents, knowledgeStats } = await this.merger.retrieve(collections, question, {
      topKPerKnowledge,
      finalTopK
    });
    const { answer, sources } = await this.chat.generateAnswer(documents, question, model);

    console.log(`Question answered in ${Date.now() - startTime}ms`);
    return { answer, sources, knowledgeStats };
  }

  async embedCollection(name: string, forceRecreate: boolean = false): Promise<EmbedResult> {
    return this.indexer.embedCollection(name, forceRecreate);
  }

  async saveCollectionMetadata(name: string, description: string): Promise<CollectionMetadata> {
    return this.store.saveMetadata(name, description);
  }

  async getCollectionMetadata(name: string): Promise<CollectionMetadata & { exists: boolean }> {
    const metadata = await this.store.getMetadata(name);
    if (!metadata) {
      return { name, description: '', createdAt: '', updatedAt: '', tables: {}, exists: false };
    }
    return { ...metadata, exists: true };
  }

  /**
   * Every collection on disk, with file counts and whether an index is built
   */
  async listCollections(): Promise<CollectionInfo[]> {
    const collections: CollectionInfo[] = [];

    for (const name of await this.store.listCollections()) {
      const metadata = await this.store.getMetadata(name);
      collections.push({
        name,
        description: metadata?.description ?? '',
        pdfCount: (await this.store.listPdfPaths(name)).length,
        csvCount: (await this.store.listCsvPaths(name)).length,
        indexed: await this.isIndexed(name)
      });
    }

    return collections;
  }

  /**
   * Collections that can be queried (an index exists), sorted by name
   */
  async listAvailableCollections(): Promise<Array<{ name: string; description: string }>> {
    const collections = await this.listCollections();
    return collections
      .filter((collection) => collection.indexed)
      .map(({ name, description }) => ({ name, description }));
  }

  async listFiles(name: string): Promise<CollectionFiles> {
    return this.store.listFiles(name);
  }

  checkUploadSize(size: number): void {
    this.store.checkUploadSize(size);
  }

  async addPdf(name: string, filename: string, content: Uint8Array): Promise<FileInfo> {
    return this.store.addPdf(name, filename, content);
  }

  async saveTable(name: string, table: CuratedTable): Promise<{ csvFilename: string; csvPath: string }> {
    return this.store.saveTable(name, table);
  }

  async extractTables(name: string, pdfFilename: string): Promise<ExtractedTable[]> {
    parseInput(extractTablesSchema, { collection: name, pdfFilename });
    await this.store.requireCollection(name);
    if (!this.tableExtractor) {
      throw new ExternalServiceError('table-extractor', 'No table extractor is configured');
    }

    const pdf = await this.store.readPdf(name, pdfFilename);
    const tables = await this.tableExtractor.extractTables(pdf);
    console.log(`Extracted ${tables.length} tables from ${pdfFilename}`);
    return tables;
  }

  async renderPage(name: string, pdfFilename: string, page: number): Promise<Uint8Array> {
    parseInput(renderPageSchema, { collection: name, pdfFilename, page });
    await this.store.requireCollection(name);
    if (!this.pageRenderer) {
      throw new ExternalServiceError('page-renderer', 'No page renderer is configured');
    }

    const pdf = await this.store.readPdf(name, pdfFilename);
    return this.pageRenderer.renderPage(pdf, page);
  }

  /**
   * Reachability of the LLM and the vector store, plus the active settings
   */
  async getStatus(): Promise<SystemStatus> {
    const ollamaHealthy = await this.llm.checkHealth();
    const embeddingInfo = this.embeddings.getModelInfo();

    let vectorDbStatus: SystemStatus['vectorDb'] = { status: 'online' };
    try {
      await this.index.initialize();
    } catch (error) {
      vectorDbStatus = { status: 'offline', error: errorMessage(error) };
    }

    return {
      ollama: {
        endpoint: this.llm.getEndpoint(),
        model: this.llm.getModel(),
        status: ollamaHealthy ? 'online' : 'offline',
        models: ollamaHealthy ? await this.llm.listModels() : []
      },
      embeddings: {
        model: embeddingInfo.name,
        initialized: embeddingInfo.initialized
      },
      vectorDb: vectorDbStatus,
      rag: {
        dataPath: config.rag.dataPath,
        chunkSize: config.rag.chunkSize,
        chunkOverlap: config.rag.chunkOverlap,
        topKPerKnowledge: config.rag.topKPerKnowledge,
        finalTopK: config.rag.finalTopK
      }
    };
  }

  private async isIndexed(name: string): Promise<boolean> {
    try {
      return await this.index.exists(indexIdFor(name));
    } catch (error) {
      console.warn(`Could not check the index of collection ${name}: ${errorMessage(error)}`);
      return false;
    }
  }
}

// Singleton instance
export const ragService = new RAGService();
