/**
 * Shared TypeScript Types
 *
 * Types for the medical document extraction pipeline, matching the JSON schema in docs/contracts/
 */

// ============================================================================
// OCR Output
// ============================================================================

/**
 * Recognized text of one document page. `page` is the 1-based number in the
 * original document, which differs from the position once long documents are sampled.
 */
export interface Page {
  readonly page: number;
  readonly text: string;
}

// ============================================================================
// Extraction
// ============================================================================

export type FieldKey = 'doctor' | 'patient' | 'dob';

export const FIELD_KEYS: readonly FieldKey[] = ['doctor', 'patient', 'dob'];

export type FieldConfidence = Record<FieldKey, number>;

/**
 * Field values with per-field confidence and provenance.
 * Produced by the pattern extractor and by decoding the model reply.
 */
export interface FieldExtraction {
  doctor_name: string;
  patient_name: string;
  /** Canonical YYYY-MM-DD or "" */
  dob: string;
  confidence: FieldConfidence;
  /** Provenance strings ("SOURCE:detail:snippet") in discovery order */
  evidence: string[];
}

export interface ExtractionResult extends FieldExtraction {
  flag_for_review: boolean;
  /** Present (and true) only when the model produced no usable output */
  llm_unavailable?: true;
}

/** Maps each field key to its value property on FieldExtraction */
export const FIELD_VALUE_KEYS = {
  doctor: 'doctor_name',
  patient: 'patient_name',
  dob: 'dob',
} as const satisfies Record<FieldKey, keyof FieldExtraction>;

export function emptyConfidence(): FieldConfidence {
  return { doctor: 0, patient: 0, dob: 0 };
}

// ============================================================================
// API Types
// ============================================================================

export interface HealthResponse {
  status: 'ok';
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
