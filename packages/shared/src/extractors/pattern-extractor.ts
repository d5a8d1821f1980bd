/**
 * Pattern-Based Field Extraction
 *
 * Deterministic fallback for when the model is unavailable or leaves a field
 * empty. Confidence comes from a fixed weight per field, not from match quality.
 */

import { parseDateToIso } from '../dates';
import type { FieldConfidence, FieldExtraction, FieldKey } from '../types';
import { DOB_MATCHERS, DOCTOR_MATCHERS, PATIENT_MATCHERS, firstMatch } from './patterns';
import type { FieldMatcher, PatternFieldResult, PatternMatches } from './types';

/** Confidence assigned to a successful pattern match, per field */
export const PATTERN_CONFIDENCE: FieldConfidence = {
  patient: 0.6,
  doctor: 0.5,
  dob: 0.65,
};

/** Maximum characters of the matched span kept in an evidence entry */
export const EVIDENCE_PREVIEW_LENGTH = 50;

const MATCHERS: Record<FieldKey, readonly FieldMatcher[]> = {
  patient: PATIENT_MATCHERS,
  doctor: DOCTOR_MATCHERS,
  dob: DOB_MATCHERS,
};

/**
 * Evidence entry for a pattern hit: "PATTERN:<field>:<matched span>"
 */
export function patternEvidence(field: FieldKey, quote: string): string {
  const preview = quote.replace(/\s+/g, ' ').trim().slice(0, EVIDENCE_PREVIEW_LENGTH);
  return `PATTERN:${field}:${preview}`;
}

function matchField(field: FieldKey, text: string, referenceDate: Date): PatternFieldResult {
  const match = firstMatch(MATCHERS[field], text);
  if (!match) {
    return { value: '', confidence: 0, evidence: [] };
  }

  const evidence = [patternEvidence(field, match.quote)];

  if (field === 'dob') {
    const iso = parseDateToIso(match.value, referenceDate);
    if (!iso) {
      // Matched a date shape that is not a plausible calendar date
      return { value: '', confidence: 0, evidence };
    }
    return { value: iso, confidence: PATTERN_CONFIDENCE.dob, evidence };
  }

  return { value: match.value, confidence: PATTERN_CONFIDENCE[field], evidence };
}

/**
 * Run every field's matchers against the document text, keeping evidence per field.
 */
export function matchFields(text: string, referenceDate: Date = new Date()): PatternMatches {
  return {
    patient: matchField('patient', text, referenceDate),
    doctor: matchField('doctor', text, referenceDate),
    dob: matchField('dob', text, referenceDate),
  };
}

/**
 * Extract all three fields from concatenated page text. Never throws; fields
 * without a match stay empty with confidence 0.
 */
export function extractWithPatterns(text: string, referenceDate: Date = new Date()): FieldExtraction {
  const matches = matchFields(text, referenceDate);

  return {
    doctor_name: matches.doctor.value,
    patient_name: matches.patient.value,
    dob: matches.dob.value,
    confidence: {
      doctor: matches.doctor.confidence,
      patient: matches.patient.confidence,
      dob: matches.dob.confidence,
    },
    evidence: [...matches.patient.evidence, ...matches.doctor.evidence, ...matches.dob.evidence],
  };
}
