/**
 * Field Merge
 *
 * Runs the model extractor, fills its gaps from pattern extraction, canonicalizes
 * the date of birth and decides whether a human must review the result.
 *
 * A non-empty model value is never replaced and its confidence never lowered,
 * even when pattern extraction disagrees: the model's own confidence is trusted.
 */

import type { Config } from '../config';
import { parseDateToIso } from '../dates';
import { logger } from '../logger';
import { maskPhi } from '../text';
import { extractionDurationHistogram, patternFallbackCounter, reviewFlagCounter } from '../metrics';
import {
  FIELD_KEYS,
  FIELD_VALUE_KEYS,
  type ExtractionResult,
  type FieldConfidence,
  type FieldExtraction,
  type Page,
} from '../types';
import { extractWithModel } from './llm-extraction';
import { extractWithPatterns, matchFields } from './pattern-extractor';
import type { ModelClient } from './types';

export interface CombineDependencies {
  config: Pick<Config, 'confThreshold'>;
  modelClient: ModelClient;
  /** Character budget for the prompt body */
  maxPromptChars?: number;
  /** Upper bound for plausible birth years; defaults to now */
  referenceDate?: Date;
}

/**
 * True when any field is below the threshold or the model produced nothing.
 */
export function computeReviewFlag(
  confidence: FieldConfidence,
  llmUnavailable: boolean,
  threshold: number
): boolean {
  return (
    confidence.doctor < threshold ||
    confidence.patient < threshold ||
    confidence.dob < threshold ||
    llmUnavailable
  );
}

/**
 * Join page texts for pattern extraction (no page markers).
 */
export function joinPageText(pages: readonly Page[]): string {
  return pages.map((p) => p.text).join('\n');
}

function finalize(
  fields: FieldExtraction,
  llmUnavailable: boolean,
  threshold: number
): ExtractionResult {
  const flag_for_review = computeReviewFlag(fields.confidence, llmUnavailable, threshold);
  reviewFlagCounter.inc({ flagged: String(flag_for_review) });

  return llmUnavailable
    ? { ...fields, flag_for_review, llm_unavailable: true }
    : { ...fields, flag_for_review };
}

/**
 * Merge model output with pattern matches, field by field.
 */
export function mergeWithPatterns(
  modelFields: FieldExtraction,
  fullText: string,
  referenceDate: Date = new Date()
): FieldExtraction {
  const merged: FieldExtraction = {
    ...modelFields,
    confidence: { ...modelFields.confidence },
    evidence: [...modelFields.evidence],
  };

  if (merged.dob) {
    const iso = parseDateToIso(merged.dob, referenceDate);
    if (iso) {
      merged.dob = iso;
    } else {
      // A date the model asserted but that cannot be canonicalized is not trusted
      logger.warn('Discarding LLM date of birth that could not be normalized', {
        dob: maskPhi(merged.dob),
      });
      merged.dob = '';
      merged.confidence.dob = 0;
    }
  }

  const patterns = matchFields(fullText, referenceDate);

  for (const field of FIELD_KEYS) {
    const valueKey = FIELD_VALUE_KEYS[field];
    const fallback = patterns[field];

    if (merged[valueKey] || !fallback.value) {
      continue;
    }

    merged[valueKey] = fallback.value;
    merged.confidence[field] = fallback.confidence;
    merged.evidence.push(...fallback.evidence);
    patternFallbackCounter.inc({ field });

    logger.info('Filled empty LLM field from pattern match', {
      field,
      confidence: fallback.confidence,
    });
  }

  return merged;
}

/**
 * Extract doctor name, patient name and date of birth from recognized pages.
 * Single pass: one model call, no retries.
 */
export async function combine(
  pages: readonly Page[],
  deps: CombineDependencies
): Promise<ExtractionResult> {
  const startTime = Date.now();
  const referenceDate = deps.referenceDate ?? new Date();
  const threshold = deps.config.confThreshold;
  const fullText = joinPageText(pages);

  const modelFields = await extractWithModel(pages, deps.modelClient, {
    maxChars: deps.maxPromptChars,
  });

  let result: ExtractionResult;

  if (!modelFields) {
    logger.info('LLM extraction unavailable, using pattern extraction');
    result = finalize(extractWithPatterns(fullText, referenceDate), true, threshold);
  } else {
    result = finalize(mergeWithPatterns(modelFields, fullText, referenceDate), false, threshold);
  }

  const duration = (Date.now() - startTime) / 1000;
  extractionDurationHistogram.observe(
    { source: result.llm_unavailable ? 'pattern' : 'llm' },
    duration
  );

  logger.info('Field extraction complete', {
    flag_for_review: result.flag_for_review,
    llm_unavailable: result.llm_unavailable === true,
    confidence: result.confidence,
    evidence_count: result.evidence.length,
    duration_seconds: duration,
  });

  return result;
}
