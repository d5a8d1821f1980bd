/**
 * Extraction Template Types
 */

/**
 * Fixed instructions wrapped around the OCR text sent to the model.
 */
export interface ExtractionTemplate {
  /** System prompt stating the output contract */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{page_text}}: OCR text with ===PAGE:n=== separators
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}
