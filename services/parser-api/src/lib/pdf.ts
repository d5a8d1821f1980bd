/**
 * PDF Rasterization
 *
 * Renders single PDF pages to grayscale PNG with poppler's pdfinfo and pdftoppm,
 * so only sampled pages of long documents are ever rendered.
 */

import { execFile } from 'node:child_process';
import path from 'node:path';
import { promisify } from 'node:util';
import { OcrError } from './errors';

const execFileAsync = promisify(execFile);

export interface PdfRasterizer {
  /** Number of pages in the PDF at pdfPath */
  countPages(pdfPath: string): Promise<number>;
  /** Render one 1-based page into outputDir and return the image path */
  renderPage(pdfPath: string, pageNumber: number, outputDir: string): Promise<string>;
}

export class PopplerRasterizer implements PdfRasterizer {
  constructor(private readonly dpi: number) {}

  async countPages(pdfPath: string): Promise<number> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync('pdfinfo', [pdfPath]));
    } catch (error) {
      throw new OcrError('Failed to read PDF', error);
    }

    const match = stdout.match(/^Pages:\s+(\d+)/m);
    if (!match) {
      throw new OcrError('PDF page count not found');
    }
    return parseInt(match[1], 10);
  }

  async renderPage(pdfPath: string, pageNumber: number, outputDir: string): Promise<string> {
    const prefix = path.join(outputDir, `page-${pageNumber}`);
    const page = String(pageNumber);

    await execFileAsync('pdftoppm', [
      '-f', page,
      '-l', page,
      '-r', String(this.dpi),
      '-gray',
      '-png',
      '-singlefile',
      pdfPath,
      prefix,
    ]);

    return `${prefix}.png`;
  }
}
