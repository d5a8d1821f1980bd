/**
 * OCR Text Utilities
 */

// Unicode "Other" categories (control, format, surrogate, private use, unassigned),
// except the newline and tab that carry page layout.
const CONTROL_CHARS = /[^\P{C}\n\t]/gu;

/**
 * Strip control characters and apply NFKC normalization to recognized text.
 */
export function normalizeText(text: string): string {
  return text.replace(CONTROL_CHARS, '').normalize('NFKC');
}

/**
 * Describe text that may contain PHI without logging it.
 */
export function maskPhi(text: string, maxLength: number = 100): string {
  if (!text) {
    return '<empty>';
  }
  return `<text length=${text.length} chars, preview=${text.slice(0, Math.min(20, maxLength))}...>`;
}
