/**
 * Tesseract OCR Provider
 *
 * Recognizes page images with the tesseract command-line binary.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** Recognized text of one page image can be large; tesseract writes it all to stdout */
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Image-to-text engine. Implementations reject on failure; the caller
 * decides whether a failed page aborts the document.
 */
export interface OcrProvider {
  readonly name: string;
  recognize(imagePath: string): Promise<string>;
}

export class TesseractOcrProvider implements OcrProvider {
  readonly name = 'tesseract';

  constructor(
    private readonly language: string = 'eng',
    private readonly binary: string = 'tesseract'
  ) {}

  async recognize(imagePath: string): Promise<string> {
    const { stdout } = await execFileAsync(this.binary, [imagePath, 'stdout', '-l', this.language], {
      maxBuffer: MAX_OUTPUT_BYTES,
    });
    return stdout;
  }
}
