/**
 * Document Processing Errors
 */

/**
 * The document could not be turned into page text at all.
 * Individual page failures do not raise this; they yield empty pages.
 */
export class OcrError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'OcrError';
  }
}

/**
 * The uploaded bytes are neither a PDF nor a supported raster image.
 */
export class UnsupportedDocumentError extends OcrError {
  constructor(message: string = 'Document is not a PDF or supported image') {
    super(message);
    this.name = 'UnsupportedDocumentError';
  }
}
