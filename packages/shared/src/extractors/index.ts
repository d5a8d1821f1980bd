/**
 * Field Extractors
 *
 * Pattern extraction, model extraction and the merge step that combines them.
 */

// Types
export type {
  FieldMatch,
  FieldMatcher,
  PatternFieldResult,
  PatternMatches,
  ModelPrompt,
  ModelClient,
} from './types';

// Patterns
export { PATIENT_MATCHERS, DOCTOR_MATCHERS, DOB_MATCHERS, firstMatch } from './patterns';
export {
  PATTERN_CONFIDENCE,
  EVIDENCE_PREVIEW_LENGTH,
  patternEvidence,
  matchFields,
  extractWithPatterns,
} from './pattern-extractor';

// Prompt
export {
  MAX_PROMPT_CHARS,
  TRUNCATION_MARKER,
  pageMarker,
  formatPagesWithLimit,
  renderPrompt,
  buildPrompt,
  type FormattedPages,
  type BuildPromptOptions,
} from './prompt-builder';

// LLM
export {
  createOpenAIModelClient,
  parseModelReply,
  decodeModelOutput,
  extractWithModel,
  type RawModelOutput,
  type ModelExtractionOptions,
} from './llm-extraction';

// Merge
export {
  combine,
  computeReviewFlag,
  joinPageText,
  mergeWithPatterns,
  type CombineDependencies,
} from './combine';
