/**
 * Prompt Construction
 *
 * Builds the bounded OCR body sent to the model. Pages keep their order and
 * original numbers; once the budget runs out the current page is cut and
 * nothing after it is sent.
 */

import type { Page } from '../types';
import { MEDICAL_FIELDS_TEMPLATE } from '../templates/medical-fields.template';
import type { ExtractionTemplate } from '../templates/types';
import type { ModelPrompt } from './types';

/** Default character budget for the OCR body */
export const MAX_PROMPT_CHARS = 8000;

export const TRUNCATION_MARKER = '...[truncated]\n';

export function pageMarker(pageNumber: number): string {
  return `===PAGE:${pageNumber}===\n`;
}

/**
 * Cut position at most `limit` UTF-16 units in, never between the halves of a surrogate pair.
 */
function cutIndex(text: string, limit: number): number {
  const code = text.charCodeAt(limit - 1);
  return code >= 0xd800 && code <= 0xdbff ? limit - 1 : limit;
}

export interface FormattedPages {
  text: string;
  /** Pages that made it into the body, fully or cut */
  includedPages: number;
  truncated: boolean;
}

/**
 * Concatenate pages with page markers within a character budget.
 */
export function formatPagesWithLimit(
  pages: readonly Page[],
  maxChars: number = MAX_PROMPT_CHARS
): FormattedPages {
  let text = '';
  let includedPages = 0;
  let truncated = false;

  for (const page of pages) {
    const marker = pageMarker(page.page);
    const pageContent = `${marker}${page.text}\n`;

    if (text.length + pageContent.length <= maxChars) {
      text += pageContent;
      includedPages++;
      continue;
    }

    const remaining = maxChars - text.length;
    if (remaining > marker.length) {
      text += `${marker}${page.text.slice(0, cutIndex(page.text, remaining - marker.length))}${TRUNCATION_MARKER}`;
      includedPages++;
      truncated = true;
    }
    break;
  }

  return { text, includedPages, truncated };
}

export interface BuildPromptOptions {
  maxChars?: number;
  template?: ExtractionTemplate;
}

/**
 * Embed formatted page text into an extraction template.
 */
export function renderPrompt(
  pageText: string,
  template: ExtractionTemplate = MEDICAL_FIELDS_TEMPLATE
): ModelPrompt {
  return {
    system: template.systemPrompt,
    // Function replacer: OCR text may contain "$" sequences
    user: template.userPromptTemplate.replace('{{page_text}}', () => pageText),
  };
}

export function buildPrompt(pages: readonly Page[], options: BuildPromptOptions = {}): ModelPrompt {
  return renderPrompt(formatPagesWithLimit(pages, options.maxChars).text, options.template);
}
