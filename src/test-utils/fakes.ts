import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { PdfTextSource } from '../core/pdf-processor';
import type {
  ChunkMetadata,
  DocumentChunk,
  IndexMatch,
  LanguageModel,
  RetrievedDocument,
  VectorIndex
} from '../types';

export type DistanceFn = (query: string, chunk: DocumentChunk) => number;

/**
 * In-process vector index; distances come from the supplied function
 */
export class InMemoryVectorIndex implements VectorIndex {
  readonly indexes = new Map<string, Map<string, DocumentChunk>>();
  private distance: DistanceFn;

  constructor(distance: DistanceFn = () => 0.5) {
    this.distance = distance;
  }

  async initialize(): Promise<void> {}

  async create(indexId: string, chunks: DocumentChunk[]): Promise<void> {
    this.indexes.set(indexId, new Map());
    await this.upsert(indexId, chunks);
  }

  async upsert(indexId: string, chunks: DocumentChunk[]): Promise<void> {
    const stored = this.indexes.get(indexId) ?? new Map<string, DocumentChunk>();
    for (const chunk of chunks) {
      stored.set(chunk.id, chunk);
    }
    this.indexes.set(indexId, stored);
  }

  async query(indexId: string, text: string, k: number): Promise<IndexMatch[]> {
    const stored = this.indexes.get(indexId);
    if (!stored) {
      throw new Error(`Index ${indexId} does not exist`);
    }
    return [...stored.values()]
      .map((chunk) => ({ chunk, distance: this.distance(text, chunk) }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  async delete(indexId: string): Promise<void> {
    this.indexes.delete(indexId);
  }

  async exists(indexId: string): Promise<boolean> {
    return this.indexes.has(indexId);
  }

  async listSources(indexId: string): Promise<Set<string>> {
    const stored = this.indexes.get(indexId);
    return new Set([...(stored?.values() ?? [])].map((chunk) => chunk.metadata.source));
  }

  async count(indexId: string): Promise<number> {
    return this.indexes.get(indexId)?.size ?? 0;
  }
}

export interface CompletionCall {
  systemPrompt: string;
  userPrompt: string;
  model: string;
  temperature: number;
}

export class FakeLanguageModel implements LanguageModel {
  readonly calls: CompletionCall[] = [];
  private answer: string;

  constructor(answer: string = 'Test answer [1]') {
    this.answer = answer;
  }

  async complete(systemPrompt: string, userPrompt: string, model: string, temperature: number): Promise<string> {
    this.calls.push({ systemPrompt, userPrompt, model, temperature });
    return this.answer;
  }
}

/**
 * Page texts keyed by filename; any other file reads as corrupt
 */
export class FakePdfSource implements PdfTextSource {
  private pages: Record<string, string[]>;

  constructor(pages: Record<string, string[]>) {
    this.pages = pages;
  }

  async extractPages(filePath: string): Promise<string[]> {
    const filename = path.basename(filePath);
    const pages = this.pages[filename];
    if (!pages) {
      throw new Error(`Invalid PDF structure: ${filename}`);
    }
    return pages;
  }
}

export function pdfBytes(body: string = 'test document'): Uint8Array {
  return new Uint8Array(Buffer.from(`%PDF-1.4\n${body}\n%%EOF`, 'latin1'));
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'knowledge-qa-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function makeChunk(id: string, content: string, metadata: Partial<ChunkMetadata> = {}): DocumentChunk {
  return {
    id,
    content,
    metadata: {
      source: 'guide.pdf',
      kind: 'pdf',
      collection: 'coins',
      chunkIndex: 0,
      start: 0,
      end: content.length,
      ...metadata
    }
  };
}

export function makeRetrieved(collection: string, score: number, content: string = `${collection} ${score}`): RetrievedDocument {
  const { metadata } = makeChunk(`${collection}-${score}`, content, { collection });
  return { content, metadata, score, collection };
}
