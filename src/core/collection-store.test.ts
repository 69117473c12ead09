import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CollectionStore, indexIdFor, tableFilename } from './collection-store';
import { EmptyInputError, NotFoundError, ValidationError } from './errors';
import { makeTempDir, pdfBytes, removeDir } from '../test-utils/fakes';

const ratesTable = {
  pdfFilename: 'report.pdf',
  page: 2,
  tableIndex: 1,
  columns: ['Coin', 'Price'],
  rows: [
    ['BTC', '100'],
    ['ETH', '5']
  ],
  description: 'rates'
};

describe('indexIdFor', () => {
  it('is stable and opaque', () => {
    expect(indexIdFor('coins')).toMatch(/^kb_[0-9a-f]{8}$/);
    expect(indexIdFor('coins')).toBe(indexIdFor('coins'));
    expect(indexIdFor('coins')).not.toBe(indexIdFor('chain'));
  });
});

describe('tableFilename', () => {
  it('names a table after its PDF, number and description', () => {
    expect(tableFilename({ pdfFilename: 'report.pdf', page: 2, tableIndex: 1, description: 'rates' })).toBe(
      'report_table1_rates.csv'
    );
  });

  it('falls back to the page number', () => {
    expect(tableFilename({ pdfFilename: 'report.pdf', page: 2, tableIndex: 3 })).toBe('report_table3_page2.csv');
  });

  it('replaces path characters in the description', () => {
    expect(tableFilename({ pdfFilename: 'report.pdf', page: 1, tableIndex: 1, description: 'in/out' })).toBe(
      'report_table1_in-out.csv'
    );
  });
});

describe('CollectionStore', () => {
  let dir: string;
  let store: CollectionStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new CollectionStore(dir, 1);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('rejects unsafe collection names', () => {
    expect(() => store.collectionDir('')).toThrow(ValidationError);
    expect(() => store.collectionDir('..')).toThrow(ValidationError);
    expect(() => store.collectionDir('a/b')).toThrow(ValidationError);
    expect(() => store.collectionDir(' padded')).toThrow(ValidationError);
  });

  it('lists nothing when the data directory does not exist', async () => {
    const missing = new CollectionStore(path.join(dir, 'missing'));
    expect(await missing.listCollections()).toEqual([]);
  });

  it('creates collections with metadata and lists them by name', async () => {
    await store.saveMetadata('zeta', 'Last one');
    await store.ensureCollection('alpha');

    expect(await store.listCollections()).toEqual(['alpha', 'zeta']);
    expect(await store.getMetadata('zeta')).toMatchObject({ name: 'zeta', description: 'Last one', tables: {} });
    expect(await store.getMetadata('alpha')).toMatchObject({ name: 'alpha', description: '' });
  });

  it('returns null metadata for an unknown collection', async () => {
    expect(await store.getMetadata('unknown')).toBeNull();
  });

  it('requires an existing collection', async () => {
    await expect(store.requireCollection('unknown')).rejects.toThrow(NotFoundError);
  });

  describe('addPdf', () => {
    it('stores a PDF and creates the collection', async () => {
      const content = pdfBytes();
      const info = await store.addPdf('coins', 'guide.pdf', content);

      expect(info.filename).toBe('guide.pdf');
      expect(info.size).toBe(content.byteLength);
      expect(await store.exists('coins')).toBe(true);
      expect(await store.readPdf('coins', 'guide.pdf')).toEqual(content);
    });

    it('rejects files that are not PDFs', async () => {
      await expect(store.addPdf('coins', 'notes.txt', pdfBytes())).rejects.toThrow(ValidationError);
      await expect(store.addPdf('coins', 'fake.pdf', new Uint8Array(Buffer.from('plain text')))).rejects.toThrow(
        'Not a valid PDF file: fake.pdf'
      );
    });

    it('rejects files over the size limit', async () => {
      await expect(store.addPdf('coins', 'big.pdf', new Uint8Array(1024 * 1024 + 1))).rejects.toThrow(
        'File too large'
      );
    });
  });

  it('reports a missing PDF', async () => {
    await store.ensureCollection('coins');
    await expect(store.readPdf('coins', 'missing.pdf')).rejects.toThrow(NotFoundError);
  });

  describe('saveTable', () => {
    it('writes a CSV with a byte order mark and records its origin', async () => {
      const { csvFilename, csvPath } = await store.saveTable('coins', ratesTable);

      expect(csvFilename).toBe('report_table1_rates.csv');
      expect(await fs.readFile(csvPath, 'utf-8')).toBe('\ufeffCoin,Price\nBTC,100\nETH,5\n');

      const metadata = await store.getMetadata('coins');
      expect(metadata?.tables).toEqual({
        'report_table1_rates.csv': { pdfFilename: 'report.pdf', page: 2, tableIndex: 1, description: 'rates' }
      });
    });

    it('refuses an empty table', async () => {
      await expect(store.saveTable('coins', { ...ratesTable, rows: [] })).rejects.toThrow(EmptyInputError);
    });
  });

  it('lists source identifiers across PDFs and tables', async () => {
    await store.addPdf('coins', 'guide.pdf', pdfBytes());
    await store.saveTable('coins', ratesTable);

    expect(await store.listSourceIdentifiers('coins')).toEqual(new Set(['guide.pdf', 'report_table1_rates.csv']));

    const files = await store.listFiles('coins');
    expect(files.pdfs.map((file) => file.filename)).toEqual(['guide.pdf']);
    expect(files.csvs.map((file) => file.filename)).toEqual(['report_table1_rates.csv']);
  });
});
