/**
 * Extractor Types
 *
 * Shapes shared by the pattern extractor, the model extractor and the merge step.
 */

import type { FieldKey } from '../types';

/**
 * A single pattern hit: the normalized field value and the text span that produced it.
 */
export interface FieldMatch {
  value: string;
  quote: string;
}

/**
 * One way of finding a field in document text. Matchers for a field are tried
 * in priority order and the first non-null result wins.
 */
export type FieldMatcher = (text: string) => FieldMatch | null;

/**
 * Pattern extraction outcome for one field.
 */
export interface PatternFieldResult {
  value: string;
  confidence: number;
  evidence: string[];
}

export type PatternMatches = Record<FieldKey, PatternFieldResult>;

/**
 * Prompt pair sent to the model endpoint.
 */
export interface ModelPrompt {
  system: string;
  user: string;
}

/**
 * Language-model endpoint. Resolves with the raw generated text; rejects on
 * transport failure, non-success status or timeout.
 */
export interface ModelClient {
  readonly model: string;
  complete(prompt: ModelPrompt): Promise<string>;
}
