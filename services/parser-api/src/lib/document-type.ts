/**
 * Upload Type Checks
 *
 * Declared type (content type or filename) gates the upload; magic bytes decide
 * how the OCR step reads it.
 */

export const ALLOWED_CONTENT_TYPES = [
  'application/pdf',
  'image/png',
  'image/jpeg',
  'image/jpg',
  'image/tiff',
  'image/bmp',
];

export const ALLOWED_EXTENSIONS = ['pdf', 'png', 'jpg', 'jpeg', 'tiff', 'tif', 'bmp'];

export type DocumentKind = 'pdf' | 'png' | 'jpeg' | 'tiff' | 'bmp';

/** File extension used when staging each kind for the OCR binaries */
export const STAGING_EXTENSIONS: Record<DocumentKind, string> = {
  pdf: 'pdf',
  png: 'png',
  jpeg: 'jpg',
  tiff: 'tif',
  bmp: 'bmp',
};

const IMAGE_SIGNATURES: Array<{ kind: Exclude<DocumentKind, 'pdf'>; bytes: number[] }> = [
  { kind: 'png', bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { kind: 'jpeg', bytes: [0xff, 0xd8, 0xff] },
  { kind: 'tiff', bytes: [0x49, 0x49, 0x2a, 0x00] },
  { kind: 'tiff', bytes: [0x4d, 0x4d, 0x00, 0x2a] },
  { kind: 'bmp', bytes: [0x42, 0x4d] },
];

/** PDF readers accept the header anywhere in the first 1024 bytes */
const PDF_HEADER_WINDOW = 1024;

/**
 * Check the declared content type, falling back to the filename extension.
 */
export function isSupportedUpload(contentType: string | undefined, filename: string | undefined): boolean {
  const type = (contentType || '').toLowerCase();
  if (ALLOWED_CONTENT_TYPES.some((allowed) => type.includes(allowed))) {
    return true;
  }

  const extension = filename?.toLowerCase().split('.').pop();
  return extension !== undefined && ALLOWED_EXTENSIONS.includes(extension);
}

/**
 * Identify a document from its leading bytes.
 *
 * @returns the document kind, or null for anything the OCR step cannot read
 */
export function sniffDocumentKind(bytes: Buffer): DocumentKind | null {
  if (bytes.subarray(0, PDF_HEADER_WINDOW).includes('%PDF-')) {
    return 'pdf';
  }

  for (const signature of IMAGE_SIGNATURES) {
    if (
      bytes.length >= signature.bytes.length &&
      signature.bytes.every((byte, i) => bytes[i] === byte)
    ) {
      return signature.kind;
    }
  }

  return null;
}
