import * as fs from 'fs/promises';
import * as path from 'path';
import { createRequire } from 'module';
import { config } from '../config';

type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

let pdfjs: PdfJs | null = null;

// pdf.js is heavy; load the legacy (Node.js) build only when a PDF is first read
async function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjs) {
    const loaded = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const require = createRequire(import.meta.url);
    const pdfjsPath = path.dirname(require.resolve('pdfjs-dist/package.json'));
    loaded.GlobalWorkerOptions.workerSrc = path.join(pdfjsPath, 'legacy/build/pdf.worker.mjs');
    pdfjs = loaded;
  }
  return pdfjs;
}

export interface PdfTextSource {
  extractPages(filePath: string): Promise<string[]>;
}

export class PDFProcessor implements PdfTextSource {
  private maxFileSizeBytes: number;

  constructor(maxFileSizeMb: number = config.rag.maxFileSizeMb) {
    this.maxFileSizeBytes = maxFileSizeMb * 1024 * 1024;
  }

  /**
   * Extract the text of every page, in page order
   */
  async extractPages(filePath: string): Promise<string[]> {
    const startTime = Date.now();

    const stats = await fs.stat(filePath);
    if (stats.size > this.maxFileSizeBytes) {
      throw new Error(`File too large: ${stats.size} bytes (max: ${this.maxFileSizeBytes})`);
    }

    const { getDocument } = await loadPdfJs();
    const data = new Uint8Array(await fs.readFile(filePath));
    const pdf = await getDocument({ data }).promise;

    try {
      const pages: string[] = [];

      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();

        const pageText = textContent.items
          .map((item) => ('str' in item ? item.str : ''))
          .join(' ')
          .replace(/[ \t]+/g, ' ')
          .trim();
        pages.push(pageText);

        // Log progress for large PDFs
        if (pageNum % 10 === 0) {
          console.log(`Processed ${pageNum}/${pdf.numPages} pages`);
        }
      }

      const processingTime = Date.now() - startTime;
      console.log(`PDF extraction completed in ${processingTime}ms (${path.basename(filePath)}, ${pdf.numPages} pages)`);

      return pages;
    } finally {
      await pdf.destroy();
    }
  }
}

export const pdfProcessor = new PDFProcessor();
