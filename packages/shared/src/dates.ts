/**
 * Date of Birth Normalization
 *
 * Converts free-form date strings from OCR text or model output to canonical
 * YYYY-MM-DD. Numeric dates are read month-first (US convention); this is an
 * assumption, not detection.
 */

import * as chrono from 'chrono-node';
import { logger } from './logger';

export const MIN_DOB_YEAR = 1900;

/**
 * Fallback numeric shapes, tried in order when the lenient parse fails.
 */
const NUMERIC_DATE_PATTERNS: Array<{ pattern: RegExp; order: 'ymd' | 'mdy' }> = [
  { pattern: /(\d{4})-(\d{1,2})-(\d{1,2})/, order: 'ymd' },
  { pattern: /(\d{1,2})\/(\d{1,2})\/(\d{4})/, order: 'mdy' },
  { pattern: /(\d{1,2})-(\d{1,2})-(\d{4})/, order: 'mdy' },
];

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a calendar date, or return null when it does not exist or its year
 * is outside [1900, reference year].
 */
function toCanonicalDate(
  year: number,
  month: number,
  day: number,
  referenceDate: Date
): string | null {
  if (year < MIN_DOB_YEAR || year > referenceDate.getFullYear()) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

function parseNatural(value: string, referenceDate: Date): string | null {
  const results = chrono.casual.parse(value, referenceDate, { forwardDate: false });

  for (const result of results) {
    const { start } = result;
    // A date of birth with an implied year, month or day is a guess
    if (!start.isCertain('year') || !start.isCertain('month') || !start.isCertain('day')) {
      continue;
    }

    const year = start.get('year');
    const month = start.get('month');
    const day = start.get('day');
    if (year === null || month === null || day === null) {
      continue;
    }

    const canonical = toCanonicalDate(year, month, day, referenceDate);
    if (canonical) {
      return canonical;
    }
  }

  return null;
}

function parseNumeric(value: string, referenceDate: Date): string | null {
  for (const { pattern, order } of NUMERIC_DATE_PATTERNS) {
    const match = value.match(pattern);
    if (!match) continue;

    const [first, second, third] = [match[1], match[2], match[3]].map(Number);
    const canonical =
      order === 'ymd'
        ? toCanonicalDate(first, second, third, referenceDate)
        : toCanonicalDate(third, first, second, referenceDate);

    if (canonical) {
      return canonical;
    }
  }

  return null;
}

/**
 * Parse a date-like string to YYYY-MM-DD.
 *
 * @returns the canonical date, or null when nothing plausible was found
 */
export function parseDateToIso(value: string, referenceDate: Date = new Date()): string | null {
  if (!value || !value.trim()) {
    return null;
  }

  try {
    const natural = parseNatural(value, referenceDate);
    if (natural) {
      return natural;
    }
  } catch (error) {
    logger.debug('Lenient date parse failed, trying numeric patterns', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  return parseNumeric(value, referenceDate);
}
