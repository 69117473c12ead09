import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PDFProcessor } from './pdf-processor';
import { makeTempDir, pdfBytes, removeDir } from '../test-utils/fakes';

describe('PDFProcessor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('refuses files over the size limit before parsing', async () => {
    const filePath = path.join(dir, 'big.pdf');
    const content = pdfBytes('x'.repeat(2048));
    await fs.writeFile(filePath, content);

    await expect(new PDFProcessor(0.001).extractPages(filePath)).rejects.toThrow(
      `File too large: ${content.byteLength} bytes (max: ${0.001 * 1024 * 1024})`
    );
  });
});
