/**
 * Medical Record Field Patterns
 *
 * Ordered matchers for the doctor name, patient name and date of birth.
 * Names must be at least two capitalized words (an explicit "Dr." title counts
 * as the first), so arbitrary capitalized text does not read as a name.
 */

import type { FieldMatch, FieldMatcher } from './types';

/**
 * Capitalized words that are form labels, not name parts.
 * Stops "Patient Name: Jane Doe Date of Birth: ..." from capturing "Jane Doe Date".
 */
const LABEL_WORDS = [
  'Address',
  'Age',
  'Birth',
  'Born',
  'Date',
  'Doctor',
  'Gender',
  'Name',
  'Patient',
  'Phone',
  'Physician',
  'Sex',
  'Signature',
];

const NAME_WORD = String.raw`(?!(?:${LABEL_WORDS.join('|')})\b)[A-Z][a-z]+(?:[A-Z][a-z]+)?(?:-[A-Z][a-z]+)?\b`;
const MIDDLE_INITIAL = String.raw`(?:[ \t]+[A-Z]\.?(?![A-Za-z]))?`;

/** Two or more capitalized words on one line, optional middle initial after the first */
const PERSON_NAME = String.raw`${NAME_WORD}${MIDDLE_INITIAL}(?:[ \t]+${NAME_WORD})+`;

/** After a "Dr." title a surname alone is enough */
const TITLED_NAME = String.raw`${NAME_WORD}${MIDDLE_INITIAL}(?:[ \t]+${NAME_WORD})*`;

const SEPARATOR = String.raw`\s*[:\-]?\s*`;

const PATIENT_LABEL = String.raw`(?:[Pp]atient|PATIENT)`;
const NAME_LABEL = String.raw`(?:[Nn]ame|NAME)`;

const DOB_LABEL = String.raw`(?:\bDOB\b|\bD\.O\.B\.?|\bDate\s+of\s+Birth|\bBirth\s*Date)`;
const NUMERIC_DATE = String.raw`\d{1,2}[\/\-]\d{1,2}[\/\-]\d{2,4}`;
const YEAR_FIRST_DATE = String.raw`\d{4}[\/\-]\d{1,2}[\/\-]\d{1,2}`;
const MONTH_NAME_DATE = String.raw`[A-Za-z]{3,9}\.?\s+\d{1,2},?\s+\d{4}|\d{1,2}\s+[A-Za-z]{3,9}\.?,?\s+\d{4}`;

/**
 * Build a matcher from a pattern whose first capture group holds the value.
 */
function regexMatcher(
  pattern: RegExp,
  format: (captured: string) => string = (captured) => captured.trim()
): FieldMatcher {
  return (text: string): FieldMatch | null => {
    const match = pattern.exec(text);
    if (!match || !match[1]) {
      return null;
    }
    return { value: format(match[1]), quote: match[0] };
  };
}

const withTitle = (name: string): string => `Dr. ${name.trim()}`;

export const PATIENT_MATCHERS: FieldMatcher[] = [
  // "Patient Name: Jane Doe"
  regexMatcher(new RegExp(String.raw`\b${PATIENT_LABEL}\s*${NAME_LABEL}${SEPARATOR}(${PERSON_NAME})`)),
  // "Patient: Jane Doe"
  regexMatcher(new RegExp(String.raw`\b${PATIENT_LABEL}${SEPARATOR}(${PERSON_NAME})`)),
  // "Name of Patient: Jane Doe"
  regexMatcher(
    new RegExp(String.raw`\b${NAME_LABEL}\s+(?:[Oo]f|OF)\s+${PATIENT_LABEL}${SEPARATOR}(${PERSON_NAME})`)
  ),
];

export const DOCTOR_MATCHERS: FieldMatcher[] = [
  // "Dr. Alice Smith", "Signature: Dr. Smith"
  regexMatcher(new RegExp(String.raw`\bDr\.?[ \t]+(${TITLED_NAME})`), withTitle),
  // "Doctor: Alice Smith"
  regexMatcher(new RegExp(String.raw`\b(?:Doctor|DOCTOR)${SEPARATOR}(${PERSON_NAME})`), withTitle),
  // "Attending Physician: Alice Smith"
  regexMatcher(new RegExp(String.raw`\b(?:Physician|PHYSICIAN)${SEPARATOR}(${PERSON_NAME})`), withTitle),
];

/**
 * Date of birth matchers return the raw date text; the caller canonicalizes it.
 */
export const DOB_MATCHERS: FieldMatcher[] = [
  // "DOB: 02/14/1980", "Date of Birth - 2-14-80"
  regexMatcher(new RegExp(String.raw`${DOB_LABEL}${SEPARATOR}(${NUMERIC_DATE})`, 'i')),
  // "DOB: 1980-02-14"
  regexMatcher(new RegExp(String.raw`${DOB_LABEL}${SEPARATOR}(${YEAR_FIRST_DATE})`, 'i')),
  // "Born: 02/14/1980", "Born on 02/14/1980"
  regexMatcher(new RegExp(String.raw`\bBorn(?:\s+on)?${SEPARATOR}(${NUMERIC_DATE})`, 'i')),
  // "Date of Birth: February 14, 1980", "Born on 14 Feb 1980"
  regexMatcher(
    new RegExp(String.raw`(?:${DOB_LABEL}|\bBorn(?:\s+on)?)${SEPARATOR}(${MONTH_NAME_DATE})`, 'i')
  ),
];

/**
 * Try matchers in order and return the first hit.
 */
export function firstMatch(matchers: readonly FieldMatcher[], text: string): FieldMatch | null {
  for (const matcher of matchers) {
    const match = matcher(text);
    if (match) {
      return match;
    }
  }
  return null;
}
