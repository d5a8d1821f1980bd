/**
 * Medical Record Identity Fields Template
 *
 * Document semantics:
 * - The treating or signing doctor usually appears in a header or signature block
 * - The patient name and date of birth usually appear near the top of the first pages
 * - OCR text is noisy; the model must report low confidence rather than guess
 */

import type { ExtractionTemplate } from './types';

export const MEDICAL_FIELDS_TEMPLATE: ExtractionTemplate = {
  description: 'Medical document identity fields - extracts doctor name, patient name and date of birth',

  systemPrompt: `You are a strict field extractor for scanned medical documents.
The input is OCR text. Pages are separated by markers like ===PAGE:1===.

Return EXACTLY one JSON object and nothing else, with these keys:
- doctor_name: string, or "" when absent
- patient_name: string, or "" when absent
- dob: the patient's date of birth as YYYY-MM-DD, or "" when absent
- confidence: {"doctor": 0-1, "patient": 0-1, "dob": 0-1}
- evidence: array of strings "PAGE:<n>:<short quote>" supporting each value

EXTRACTION RULES:
1. Copy names as written; do not invent or complete them
2. dob is the PATIENT's birth date, never a visit, report or signature date
3. Use confidence 0 for any field left empty

Example:
OCR: "===PAGE:1=== Patient Name: Jane Doe DOB: 02/14/1980"
JSON: {"doctor_name":"","patient_name":"Jane Doe","dob":"1980-02-14","confidence":{"doctor":0,"patient":0.95,"dob":0.9},"evidence":["PAGE:1:Patient Name: Jane Doe","PAGE:1:DOB: 02/14/1980"]}`,

  userPromptTemplate: `Extract doctor_name, patient_name and dob from this document.

DOCUMENT TEXT BY PAGE:
{{page_text}}

Return the JSON object only.`,
};
