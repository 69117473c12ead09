// Core types for the knowledge base
export type SourceKind = 'pdf' | 'tabular';

export interface SourceDocument {
  /** Original filename, unique within a collection */
  id: string;
  kind: SourceKind;
  collection: string;
  text: string;
  description?: string;
  columns?: string[];
  /** Page a curated table was taken from */
  page?: number;
  /** Character offset at which each PDF page starts; index 0 is page 1 */
  pageOffsets?: number[];
}

export interface ChunkMetadata {
  source: string;
  kind: SourceKind;
  collection: string;
  chunkIndex: number;
  start: number;
  end: number;
  page?: number;
  description?: string;
  columns?: string;
}

export interface DocumentChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

export interface IndexMatch {
  chunk: DocumentChunk;
  /** Raw cosine distance as reported by the index (lower is closer) */
  distance: number;
}

export interface RetrievedDocument {
  content: string;
  metadata: ChunkMetadata;
  /** Similarity, higher is better */
  score: number;
  collection: string;
}

export interface Citation {
  index: number;
  collection: string;
  sourceFile: string;
  page: number | 'N/A';
  score: number;
  contentPreview: string;
}

export interface RetrievalResult {
  documents: RetrievedDocument[];
  knowledgeStats: Record<string, number>;
}

export interface SynthesizedAnswer {
  answer: string;
  sources: Citation[];
}

export interface AnswerResult extends SynthesizedAnswer {
  knowledgeStats: Record<string, number>;
}

export interface QueryRequest {
  collections: string[];
  question: string;
  topKPerKnowledge?: number;
  finalTopK?: number;
  model?: string;
}

export type EmbedMode = 'full' | 'incremental';

export interface EmbedResult {
  status: 'success';
  mode: EmbedMode;
  collection: string;
  indexId: string;
  totalDocuments: number;
  pdfCount: number;
  csvCount: number;
  totalChunks: number;
  newChunks: number;
  newFiles?: string[];
  message?: string;
  warnings?: string[];
}

export interface CollectionMetadata {
  name: string;
  description: string;
  createdAt: string;
  updatedAt: string;
  tables: Record<string, TableRecord>;
}

export interface TableRecord {
  pdfFilename: string;
  page: number;
  tableIndex: number;
  description: string;
}

export interface CollectionInfo {
  name: string;
  description: string;
  pdfCount: number;
  csvCount: number;
  indexed: boolean;
}

export interface FileInfo {
  filename: string;
  size: number;
  modifiedAt: string;
}

export interface CollectionFiles {
  pdfs: FileInfo[];
  csvs: FileInfo[];
}

export interface ExtractedTable {
  page: number;
  tableIndex: number;
  columns: string[];
  rows: string[][];
}

export interface CuratedTable extends ExtractedTable {
  pdfFilename: string;
  description?: string;
}

// External collaborators
export interface VectorIndex {
  /** Fail fast when the backing store is unreachable */
  initialize(): Promise<void>;
  create(indexId: string, chunks: DocumentChunk[]): Promise<void>;
  upsert(indexId: string, chunks: DocumentChunk[]): Promise<void>;
  query(indexId: string, text: string, k: number): Promise<IndexMatch[]>;
  delete(indexId: string): Promise<void>;
  exists(indexId: string): Promise<boolean>;
  listSources(indexId: string): Promise<Set<string>>;
  count(indexId: string): Promise<number>;
}

export interface LanguageModel {
  complete(systemPrompt: string, userPrompt: string, model: string, temperature: number): Promise<string>;
}

export interface SystemStatus {
  ollama: { endpoint: string; model: string; status: 'online' | 'offline'; models: string[] };
  embeddings: { model: string; initialized: boolean };
  vectorDb: { status: 'online' | 'offline'; error?: string };
  rag: Pick<RagConfig, 'dataPath' | 'chunkSize' | 'chunkOverlap' | 'topKPerKnowledge' | 'finalTopK'>;
}

export interface TableExtractor {
  extractTables(pdfBytes: Uint8Array): Promise<ExtractedTable[]>;
}

export interface PageRenderer {
  renderPage(pdfBytes: Uint8Array, pageNumber: number): Promise<Uint8Array>;
}

// Configuration types
export interface RagConfig {
  dataPath: string;
  chunkSize: number;
  chunkOverlap: number;
  topKPerKnowledge: number;
  finalTopK: number;
  previewLength: number;
  embeddingModel: string;
  chromaUrl: string;
  maxFileSizeMb: number;
}

export interface OllamaConfig {
  endpoint: string;
  model: string;
  timeoutMs: number;
  enableThinking: boolean;
}
