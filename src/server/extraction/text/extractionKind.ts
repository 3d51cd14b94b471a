/**
 * Extraction kinds accepted by the text service, decoded once at the request
 * boundary. Everything past the boundary works with the `ExtractionKind` union.
 */

export const EXTRACTION_KINDS = ['email_phone', 'dates', 'numbers', 'urls', 'all'] as const;

export type ExtractionKind = (typeof EXTRACTION_KINDS)[number];

export const DEFAULT_EXTRACTION_KIND: ExtractionKind = 'email_phone';

export function isExtractionKind(value: unknown): value is ExtractionKind {
  return EXTRACTION_KINDS.some(kind => kind === value);
}

/**
 * Normalize a raw `extraction_type` value before enum validation.
 * Absent, null or blank values become the default kind; strings are
 * trimmed and lower-cased. Anything else passes through untouched so the
 * enum check reports it.
 */
export function normalizeExtractionKindInput(value: unknown): unknown {
  if (value === undefined || value === null) {
    return DEFAULT_EXTRACTION_KIND;
  }
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === '' ? DEFAULT_EXTRACTION_KIND : normalized;
}
