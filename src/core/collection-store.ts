import { createHash } from 'crypto';
import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { config } from '../config';
import { EmptyInputError, NotFoundError, ValidationError } from './errors';
import type {
  CollectionFiles,
  CollectionMetadata,
  CuratedTable,
  FileInfo,
  TableRecord
} from '../types';

const METADATA_FILE = 'metadata.json';
const PDF_DIR = 'pdf';
const CSV_DIR = 'csv';

const tableRecordSchema = z.object({
  pdfFilename: z.string(),
  page: z.number().int(),
  tableIndex: z.number().int(),
  description: z.string()
});

const metadataSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  createdAt: z.string(),
  updatedAt: z.string(),
  tables: z.record(tableRecordSchema).default({})
});

/**
 * Opaque, stable index identifier for a collection name
 */
export function indexIdFor(collectionName: string): string {
  const hash = createHash('md5').update(collectionName, 'utf8').digest('hex');
  return `kb_${hash.slice(0, 8)}`;
}

export function tableFilename(table: Pick<CuratedTable, 'pdfFilename' | 'page' | 'tableIndex' | 'description'>): string {
  const stem = path.basename(table.pdfFilename, path.extname(table.pdfFilename));
  const description = table.description?.trim().replace(/[\\/:*?"<>|]+/g, '-');
  const suffix = description ? description : `page${table.page}`;
  return `${stem}_table${table.tableIndex}_${suffix}.csv`;
}

/**
 * Directory-per-collection storage for raw PDFs, curated CSV tables and metadata
 */
export class CollectionStore {
  private basePath: string;
  private maxFileSizeBytes: number;

  constructor(basePath: string = config.rag.dataPath, maxFileSizeMb: number = config.rag.maxFileSizeMb) {
    this.basePath = path.resolve(basePath);
    this.maxFileSizeBytes = maxFileSizeMb * 1024 * 1024;
  }

  collectionDir(name: string): string {
    const trimmed = name.trim();
    if (!trimmed || trimmed !== name || trimmed === '.' || trimmed === '..' || /[\\/]/.test(name)) {
      throw new ValidationError(`Invalid collection name: "${name}"`);
    }
    return path.join(this.basePath, name);
  }

  pdfDir(name: string): string {
    return path.join(this.collectionDir(name), PDF_DIR);
  }

  csvDir(name: string): string {
    return path.join(this.collectionDir(name), CSV_DIR);
  }

  async exists(name: string): Promise<boolean> {
    return isDirectory(this.collectionDir(name));
  }

  async requireCollection(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      throw new NotFoundError(`Collection "${name}" does not exist`);
    }
  }

  /**
   * Create the collection layout (and metadata) if missing
   */
  async ensureCollection(name: string): Promise<CollectionMetadata> {
    await fs.mkdir(this.pdfDir(name), { recursive: true });
    await fs.mkdir(this.csvDir(name), { recursive: true });

    const existing = await this.getMetadata(name);
    if (existing) {
      return existing;
    }

    const now = new Date().toISOString();
    const metadata: CollectionMetadata = {
      name,
      description: '',
      createdAt: now,
      updatedAt: now,
      tables: {}
    };
    await this.writeMetadata(name, metadata);
    console.log(`Created collection: ${name}`);
    return metadata;
  }

  async listCollections(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.basePath, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  }

  async getMetadata(name: string): Promise<CollectionMetadata | null> {
    const metadataPath = path.join(this.collectionDir(name), METADATA_FILE);

    let raw: string;
    try {
      raw = await fs.readFile(metadataPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    return metadataSchema.parse(JSON.parse(raw));
  }

  async saveMetadata(name: string, description: string): Promise<CollectionMetadata> {
    const metadata = await this.ensureCollection(name);
    const updated: CollectionMetadata = {
      ...metadata,
      description,
      updatedAt: new Date().toISOString()
    };
    await this.writeMetadata(name, updated);
    return updated;
  }

  checkUploadSize(size: number): void {
    if (size > this.maxFileSizeBytes) {
      throw new ValidationError(`File too large: ${size} bytes (max: ${this.maxFileSizeBytes})`);
    }
  }

  async addPdf(name: string, filename: string, content: Uint8Array): Promise<FileInfo> {
    const cleanFilename = path.basename(filename);

    if (path.extname(cleanFilename).toLowerCase() !== '.pdf') {
      throw new ValidationError(`Only PDF files can be uploaded: ${cleanFilename}`);
    }
    this.checkUploadSize(content.byteLength);
    // PDF files start with %PDF
    if (Buffer.from(content.subarray(0, 4)).toString('ascii') !== '%PDF') {
      throw new ValidationError(`Not a valid PDF file: ${cleanFilename}`);
    }

    await this.ensureCollection(name);
    const filePath = path.join(this.pdfDir(name), cleanFilename);
    await fs.writeFile(filePath, content);
    console.log(`Stored PDF ${cleanFilename} in collection: ${name}`);

    return fileInfo(filePath);
  }

  async readPdf(name: string, filename: string): Promise<Uint8Array> {
    const filePath = path.join(this.pdfDir(name), path.basename(filename));
    try {
      return new Uint8Array(await fs.readFile(filePath));
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(`PDF "${filename}" not found in collection "${name}"`);
      }
      throw error;
    }
  }

  /**
   * Write a curated table as CSV (UTF-8 with BOM) and remember where it came from
   */
  async saveTable(name: string, table: CuratedTable): Promise<{ csvFilename: string; csvPath: string }> {
    if (table.rows.length === 0) {
      throw new EmptyInputError('Table has no rows');
    }

    const metadata = await this.ensureCollection(name);
    const csvFilename = tableFilename(table);
    const csvPath = path.join(this.csvDir(name), csvFilename);

    const content = stringify(table.rows, {
      header: true,
      columns: table.columns,
      bom: true
    });
    await fs.writeFile(csvPath, content, 'utf-8');

    const record: TableRecord = {
      pdfFilename: table.pdfFilename,
      page: table.page,
      tableIndex: table.tableIndex,
      description: table.description?.trim() ?? ''
    };
    await this.writeMetadata(name, {
      ...metadata,
      updatedAt: new Date().toISOString(),
      tables: { ...metadata.tables, [csvFilename]: record }
    });

    console.log(`Saved table ${csvFilename} (${table.rows.length} rows) in collection: ${name}`);
    return { csvFilename, csvPath };
  }

  async listPdfPaths(name: string): Promise<string[]> {
    return listFilesWithExtension(this.pdfDir(name), '.pdf');
  }

  async listCsvPaths(name: string): Promise<string[]> {
    return listFilesWithExtension(this.csvDir(name), '.csv');
  }

  async listSourceIdentifiers(name: string): Promise<Set<string>> {
    const paths = [...(await this.listPdfPaths(name)), ...(await this.listCsvPaths(name))];
    return new Set(paths.map((p) => path.basename(p)));
  }

  async listFiles(name: string): Promise<CollectionFiles> {
    await this.requireCollection(name);

    const pdfs = await Promise.all((await this.listPdfPaths(name)).map(fileInfo));
    const csvs = await Promise.all((await this.listCsvPaths(name)).map(fileInfo));
    const newestFirst = (a: FileInfo, b: FileInfo) => b.modifiedAt.localeCompare(a.modifiedAt);

    return {
      pdfs: pdfs.sort(newestFirst),
      csvs: csvs.sort(newestFirst)
    };
  }

  private async writeMetadata(name: string, metadata: CollectionMetadata): Promise<void> {
    const metadataPath = path.join(this.collectionDir(name), METADATA_FILE);
    await fs.writeFile(metadataPath, JSON.stringify(metadata, null, 2), 'utf-8');
  }
}

async function listFilesWithExtension(dir: string, extension: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === extension)
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map((entry) => path.join(dir, entry));
}

async function fileInfo(filePath: string): Promise<FileInfo> {
  const stats = await fs.stat(filePath);
  return {
    filename: path.basename(filePath),
    size: stats.size,
    modifiedAt: stats.mtime.toISOString()
  };
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export const collectionStore = new CollectionStore();
