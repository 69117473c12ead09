import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { CollectionStore, collectionStore } from './collection-store';
import { type PdfTextSource, pdfProcessor } from './pdf-processor';
import { errorMessage } from './errors';
import type { SourceDocument, TableRecord } from '../types';

const csvRowsSchema = z.array(z.array(z.string()));

export interface LoadedSources {
  pdfs: SourceDocument[];
  csvs: SourceDocument[];
}

export function pageMarker(pageNumber: number): string {
  return `--- Page ${pageNumber} ---`;
}

/**
 * Join page texts, each preceded by a page marker, and record where each page starts
 */
export function joinPages(pages: string[]): { text: string; pageOffsets: number[] } {
  let text = '';
  const pageOffsets: number[] = [];

  pages.forEach((pageText, index) => {
    if (text) {
      text += '\n\n';
    }
    pageOffsets.push(text.length);
    text += `${pageMarker(index + 1)}\n\n${pageText}`;
  });

  return { text, pageOffsets };
}

/**
 * Linearize CSV rows as "column: value | column: value", skipping blank cells
 */
export function linearizeRows(columns: string[], rows: string[][]): string {
  return rows
    .map((row) =>
      columns
        .map((column, i) => ({ column, value: (row[i] ?? '').trim() }))
        .filter(({ value }) => value !== '')
        .map(({ column, value }) => `${column}: ${value}`)
        .join(' | ')
    )
    .filter((line) => line !== '')
    .join('\n');
}

/**
 * Description encoded in a curated table filename: the last "_" separated segment
 */
export function descriptionFromFilename(filename: string): string {
  const stem = path.basename(filename, path.extname(filename));
  const parts = stem.split('_');
  return parts.length > 1 ? parts[parts.length - 1] : '';
}

export class DocumentLoader {
  private store: CollectionStore;
  private pdfSource: PdfTextSource;

  constructor(store: CollectionStore = collectionStore, pdfSource: PdfTextSource = pdfProcessor) {
    this.store = store;
    this.pdfSource = pdfSource;
  }

  /**
   * Load every PDF and curated CSV of a collection; a failing file is logged and skipped
   */
  async loadSources(collection: string): Promise<LoadedSources> {
    const metadata = await this.store.getMetadata(collection);
    const tables = metadata?.tables ?? {};

    const pdfs: SourceDocument[] = [];
    for (const filePath of await this.store.listPdfPaths(collection)) {
      try {
        pdfs.push(await this.loadPdf(collection, filePath));
        console.log(`Loaded PDF: ${path.basename(filePath)}`);
      } catch (error) {
        console.error(`Failed to load PDF ${path.basename(filePath)}: ${errorMessage(error)}`);
      }
    }

    const csvs: SourceDocument[] = [];
    for (const filePath of await this.store.listCsvPaths(collection)) {
      try {
        csvs.push(await this.loadCsv(collection, filePath, tables[path.basename(filePath)]));
        console.log(`Loaded CSV: ${path.basename(filePath)}`);
      } catch (error) {
        console.error(`Failed to load CSV ${path.basename(filePath)}: ${errorMessage(error)}`);
      }
    }

    return { pdfs, csvs };
  }

  async loadPdf(collection: string, filePath: string): Promise<SourceDocument> {
    const pages = await this.pdfSource.extractPages(filePath);
    const { text, pageOffsets } = joinPages(pages);

    return {
      id: path.basename(filePath),
      kind: 'pdf',
      collection,
      text,
      pageOffsets
    };
  }

  async loadCsv(collection: string, filePath: string, record?: TableRecord): Promise<SourceDocument> {
    const content = await fs.readFile(filePath, 'utf-8');
    const parsed: unknown = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
    const [header = [], ...rows] = csvRowsSchema.parse(parsed);
    const columns = header.map((column) => column.trim());
    const filename = path.basename(filePath);

    const document: SourceDocument = {
      id: filename,
      kind: 'tabular',
      collection,
      text: linearizeRows(columns, rows),
      description: record?.description || descriptionFromFilename(filename),
      columns
    };
    if (record) {
      document.page = record.page;
    }
    return document;
  }
}

export const documentLoader = new DocumentLoader();
