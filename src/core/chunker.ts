import { v5 as uuidv5 } from 'uuid';
import { config } from '../config';
import type { ChunkMetadata, DocumentChunk, SourceDocument } from '../types';

// Paragraph, line, sentence, word, then a hard cut
const DEFAULT_SEPARATORS = ['\n\n', '\n', '. ', '! ', '? ', ' ', ''];

// Fixed namespace so chunk ids are stable across runs
const CHUNK_NAMESPACE = '6f1c3b52-8d0e-4c4a-9a57-2f5b8e1d7c90';

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

export interface TextSpan {
  text: string;
  start: number;
  end: number;
}

export class TextChunker {
  private chunkSize: number;
  private chunkOverlap: number;
  private separators: string[];

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.chunkSize = options.chunkSize ?? config.rag.chunkSize;
    this.chunkOverlap = options.chunkOverlap ?? config.rag.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;

    if (this.chunkSize <= 0 || this.chunkOverlap < 0 || this.chunkOverlap >= this.chunkSize) {
      throw new Error(`Invalid chunk settings: size ${this.chunkSize}, overlap ${this.chunkOverlap}`);
    }
  }

  /**
   * Split text into overlapping segments of at most chunkSize characters
   */
  chunkText(text: string): string[] {
    return this.chunkWithSpans(text).map((span) => span.text);
  }

  /**
   * Split text, keeping where every segment sits in the original string
   */
  chunkWithSpans(text: string): TextSpan[] {
    return this.splitText(text, 0, this.separators);
  }

  /**
   * Chunk one source document; every chunk carries the parent's metadata
   */
  chunkDocument(document: SourceDocument, indexId: string): DocumentChunk[] {
    return this.chunkWithSpans(document.text).map((span, chunkIndex) => {
      const metadata: ChunkMetadata = {
        source: document.id,
        kind: document.kind,
        collection: document.collection,
        chunkIndex,
        start: span.start,
        end: span.end
      };

      const page = document.pageOffsets
        ? pageAt(document.pageOffsets, span.start)
        : document.page;
      if (page !== undefined) {
        metadata.page = page;
      }
      if (document.description) {
        metadata.description = document.description;
      }
      if (document.columns && document.columns.length > 0) {
        metadata.columns = document.columns.join(', ');
      }

      return {
        id: uuidv5(`${indexId}:${document.id}:${chunkIndex}`, CHUNK_NAMESPACE),
        content: span.text,
        metadata
      };
    });
  }

  chunkDocuments(documents: SourceDocument[], indexId: string): DocumentChunk[] {
    const chunks = documents.flatMap((document) => this.chunkDocument(document, indexId));
    console.log(`Split ${documents.length} documents into ${chunks.length} chunks`);
    return chunks;
  }

  private splitText(text: string, offset: number, separators: string[]): TextSpan[] {
    const finalChunks: TextSpan[] = [];

    let separator = separators[separators.length - 1] ?? '';
    let remaining: string[] = [];

    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === '' || text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const goodSplits: TextSpan[] = [];

    for (const split of splitWithOffsets(text, separator, offset)) {
      if (split.text.length < this.chunkSize) {
        goodSplits.push(split);
        continue;
      }

      if (goodSplits.length > 0) {
        finalChunks.push(...this.mergeSplits(goodSplits, separator));
        goodSplits.length = 0;
      }

      if (remaining.length === 0) {
        finalChunks.push(split);
      } else {
        finalChunks.push(...this.splitText(split.text, split.start, remaining));
      }
    }

    if (goodSplits.length > 0) {
      finalChunks.push(...this.mergeSplits(goodSplits, separator));
    }

    return finalChunks;
  }

  // Splits passed here are consecutive, so a joined run is a contiguous slice of the source
  private mergeSplits(splits: TextSpan[], separator: string): TextSpan[] {
    const chunks: TextSpan[] = [];
    const current: TextSpan[] = [];
    let currentLength = 0;

    for (const split of splits) {
      const joinLength = current.length > 0 ? separator.length : 0;

      if (current.length > 0 && currentLength + joinLength + split.text.length > this.chunkSize) {
        pushNonBlank(chunks, current, separator);

        // Keep a tail of the previous chunk as overlap
        while (
          current.length > 0 &&
          (currentLength > this.chunkOverlap ||
            currentLength + separator.length + split.text.length > this.chunkSize)
        ) {
          const removed = current.shift();
          currentLength -= (removed?.text.length ?? 0) + (current.length > 0 ? separator.length : 0);
        }
      }

      currentLength += split.text.length + (current.length > 0 ? separator.length : 0);
      current.push(split);
    }

    if (current.length > 0) {
      pushNonBlank(chunks, current, separator);
    }

    return chunks;
  }
}

function splitWithOffsets(text: string, separator: string, offset: number): TextSpan[] {
  const parts = separator === '' ? Array.from(text) : text.split(separator);
  const spans: TextSpan[] = [];
  let start = offset;
  for (const part of parts) {
    spans.push({ text: part, start, end: start + part.length });
    start += part.length + separator.length;
  }
  return spans;
}

function pushNonBlank(chunks: TextSpan[], pieces: TextSpan[], separator: string): void {
  const text = pieces.map((piece) => piece.text).join(separator);
  if (text.trim()) {
    const start = pieces[0].start;
    chunks.push({ text, start, end: start + text.length });
  }
}

/**
 * 1-based page containing the given offset; pageOffsets[i] is where page i + 1 starts
 */
export function pageAt(pageOffsets: number[], offset: number): number | undefined {
  let page: number | undefined;
  for (let i = 0; i < pageOffsets.length; i++) {
    if (pageOffsets[i] > offset) {
      break;
    }
    page = i + 1;
  }
  return page;
}
