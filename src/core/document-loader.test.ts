import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CollectionStore } from './collection-store';
import { DocumentLoader, descriptionFromFilename, joinPages, linearizeRows, pageMarker } from './document-loader';
import { FakePdfSource, makeTempDir, pdfBytes, removeDir } from '../test-utils/fakes';

describe('joinPages', () => {
  it('prefixes every page with its marker and records page starts', () => {
    expect(joinPages(['A', 'B'])).toEqual({
      text: '--- Page 1 ---\n\nA\n\n--- Page 2 ---\n\nB',
      pageOffsets: [0, 19]
    });
  });

  it('handles a document without pages', () => {
    expect(joinPages([])).toEqual({ text: '', pageOffsets: [] });
  });

  it('uses the same marker format', () => {
    expect(pageMarker(12)).toBe('--- Page 12 ---');
  });
});

describe('linearizeRows', () => {
  it('writes one line per row and skips blank cells and rows', () => {
    const rows = [
      ['BTC', '100', ''],
      ['', ' ', ''],
      ['ETH', '', 'gas']
    ];
    expect(linearizeRows(['Coin', 'Price', 'Note'], rows)).toBe('Coin: BTC | Price: 100\nCoin: ETH | Note: gas');
  });
});

describe('descriptionFromFilename', () => {
  it('takes the last underscore-separated segment', () => {
    expect(descriptionFromFilename('report_table1_rates.csv')).toBe('rates');
    expect(descriptionFromFilename('plain.csv')).toBe('');
  });
});

describe('DocumentLoader', () => {
  let dir: string;
  let store: CollectionStore;
  let loader: DocumentLoader;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new CollectionStore(dir);
    loader = new DocumentLoader(store, new FakePdfSource({ 'guide.pdf': ['Bitcoin is a coin.', 'Ether pays gas.'] }));
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('loads PDFs and curated tables, skipping files that fail to read', async () => {
    await store.addPdf('coins', 'guide.pdf', pdfBytes());
    await store.addPdf('coins', 'broken.pdf', pdfBytes('damaged'));
    await store.saveTable('coins', {
      pdfFilename: 'report.pdf',
      page: 2,
      tableIndex: 1,
      columns: ['Coin', 'Price'],
      rows: [
        ['BTC', '100'],
        ['ETH', '5']
      ],
      description: 'rates'
    });

    const { pdfs, csvs } = await loader.loadSources('coins');

    expect(pdfs).toEqual([
      {
        id: 'guide.pdf',
        kind: 'pdf',
        collection: 'coins',
        text: '--- Page 1 ---\n\nBitcoin is a coin.\n\n--- Page 2 ---\n\nEther pays gas.',
        pageOffsets: [0, 36]
      }
    ]);
    expect(csvs).toEqual([
      {
        id: 'report_table1_rates.csv',
        kind: 'tabular',
        collection: 'coins',
        text: 'Coin: BTC | Price: 100\nCoin: ETH | Price: 5',
        description: 'rates',
        columns: ['Coin', 'Price'],
        page: 2
      }
    ]);
  });

  it('describes an unrecorded table by its filename', async () => {
    await store.ensureCollection('coins');
    const csvPath = path.join(store.csvDir('coins'), 'notes_table2_fees.csv');
    await fs.writeFile(csvPath, 'Name,Fee\nswap,0.3\n', 'utf-8');

    const document = await loader.loadCsv('coins', csvPath);

    expect(document).toEqual({
      id: 'notes_table2_fees.csv',
      kind: 'tabular',
      collection: 'coins',
      text: 'Name: swap | Fee: 0.3',
      description: 'fees',
      columns: ['Name', 'Fee']
    });
  });

  it('returns nothing for an empty collection', async () => {
    await store.ensureCollection('empty');
    expect(await loader.loadSources('empty')).toEqual({ pdfs: [], csvs: [] });
  });
});
