import { CollectionStore, collectionStore, indexIdFor } from './collection-store';
import { DocumentLoader, documentLoader } from './document-loader';
import { TextChunker } from './chunker';
import { KeyedLock, indexLock } from './index-lock';
import { vectorDb } from './vector-db';
import { EmptyInputError, errorMessage } from './errors';
import type { EmbedResult, SourceDocument, VectorIndex } from '../types';

export interface IndexerOptions {
  store?: CollectionStore;
  loader?: DocumentLoader;
  chunker?: TextChunker;
  index?: VectorIndex;
  lock?: KeyedLock;
}

/**
 * Maintains one vector index per collection
 */
export class Indexer {
  private store: CollectionStore;
  private loader: DocumentLoader;
  private chunker: TextChunker;
  private index: VectorIndex;
  private lock: KeyedLock;

  constructor(options: IndexerOptions = {}) {
    this.store = options.store ?? collectionStore;
    this.loader = options.loader ?? documentLoader;
    this.chunker = options.chunker ?? new TextChunker();
    this.index = options.index ?? vectorDb;
    this.lock = options.lock ?? indexLock;
  }

  /**
   * Embed a collection: a full rebuild when forceRecreate is set, otherwise only new sources
   */
  async embedCollection(name: string, forceRecreate: boolean = false): Promise<EmbedResult> {
    await this.store.requireCollection(name);

    return this.lock.runExclusive(name, () =>
      forceRecreate ? this.rebuild(name) : this.appendNew(name)
    );
  }

  private async rebuild(name: string): Promise<EmbedResult> {
    const indexId = indexIdFor(name);
    console.log(`Full re-embedding of collection: ${name}`);

    await this.index.delete(indexId);

    const { pdfs, csvs, all } = await this.load(name);
    const chunks = this.chunker.chunkDocuments(all, indexId);
    await this.index.create(indexId, chunks);

    console.log(`Full embedding complete: ${chunks.length} chunks stored for ${name}`);

    return {
      status: 'success',
      mode: 'full',
      collection: name,
      indexId,
      totalDocuments: all.length,
      pdfCount: pdfs.length,
      csvCount: csvs.length,
      totalChunks: await this.index.count(indexId),
      newChunks: chunks.length,
      newFiles: all.map((document) => document.id)
    };
  }

  private async appendNew(name: string): Promise<EmbedResult> {
    const indexId = indexIdFor(name);
    const warnings: string[] = [];
    console.log(`Incremental embedding of collection: ${name}`);

    let existingSources = new Set<string>();
    try {
      existingSources = await this.index.listSources(indexId);
      console.log(`Already embedded: ${existingSources.size} files`);
    } catch (error) {
      const warning = `Could not read existing sources of ${indexId}, embedding every file: ${errorMessage(error)}`;
      console.warn(warning);
      warnings.push(warning);
    }

    const { pdfs, csvs, all } = await this.load(name);
    const newDocuments = all.filter((document) => !existingSources.has(document.id));

    const base = {
      status: 'success' as const,
      mode: 'incremental' as const,
      collection: name,
      indexId,
      totalDocuments: all.length,
      pdfCount: pdfs.length,
      csvCount: csvs.length,
      ...(warnings.length > 0 ? { warnings } : {})
    };

    if (newDocuments.length === 0) {
      console.log('No new documents, skipping embedding');
      return {
        ...base,
        totalChunks: await this.index.count(indexId),
        newChunks: 0,
        message: 'No new documents'
      };
    }

    const newFiles = newDocuments.map((document) => document.id);
    console.log(`New documents: ${newFiles.join(', ')}`);

    const chunks = this.chunker.chunkDocuments(newDocuments, indexId);
    await this.index.upsert(indexId, chunks);

    console.log(`Incremental embedding complete: ${chunks.length} chunks added to ${name}`);

    return {
      ...base,
      totalChunks: await this.index.count(indexId),
      newChunks: chunks.length,
      newFiles
    };
  }

  private async load(name: string): Promise<{ pdfs: SourceDocument[]; csvs: SourceDocument[]; all: SourceDocument[] }> {
    const { pdfs, csvs } = await this.loader.loadSources(name);
    const all = [...pdfs, ...csvs];

    if (all.length === 0) {
      throw new EmptyInputError(`No documents to embed in collection "${name}"`);
    }

    console.log(`Loaded ${all.length} documents (PDF: ${pdfs.length}, CSV: ${csvs.length})`);
    return { pdfs, csvs, all };
  }
}

export const indexer = new Indexer();
