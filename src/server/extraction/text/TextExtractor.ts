/**
 * Regex-based extraction rules for free text.
 *
 * Every rule is a pure function over already-sanitized text. Emails, numbers
 * and URLs keep duplicates in match order; phone numbers and dates run
 * several pattern families and are deduplicated, so callers should check
 * membership rather than position for those two.
 */

import type { ExtractionKind } from './extractionKind.js';

export type DataKey = 'emails' | 'phone_numbers' | 'dates' | 'numbers' | 'urls';

export type ExtractedData = Partial<Record<DataKey, string[]>>;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

const PHONE_PATTERNS: RegExp[] = [
  /\b\d{3}-\d{3}-\d{4}\b/g,                                           // 555-123-4567
  /\(\d{3}\)\s*\d{3}-\d{4}\b/g,                                       // (555) 123-4567
  /\b\d{3}\.\d{3}\.\d{4}\b/g,                                         // 555.123.4567
  /\b\d{10}\b/g,                                                      // 5551234567
  /\+\d{1,3}[\s.-]?\(?\d{1,4}\)?[\s.-]?\d{1,4}[\s.-]?\d{1,9}\b/g,     // +1 800 555 0199
  /\b\d{3}\s\d{3}\s\d{4}\b/g,                                         // 555 123 4567
];

const DATE_PATTERNS: RegExp[] = [
  /\b\d{1,2}\/\d{1,2}\/\d{4}\b/g,                                     // 12/25/2023
  /\b\d{1,2}-\d{1,2}-\d{4}\b/g,                                       // 12-25-2023
  /\b\d{4}-\d{1,2}-\d{1,2}\b/g,                                       // 2023-12-25
  /\b(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+\d{1,2},?\s+\d{4}\b/gi, // Jan 15, 2024
];

const NUMBER_PATTERN = /\b\d+(?:\.\d+)?\b/g;

const URL_PATTERN =
  /https?:\/\/[\w-]+(?:\.[\w-]+)*(?::\d+)?(?:\/[\w/.~%+@-]*)?(?:\?[\w&;=%.~+/-]*)?(?:#[\w.~/=-]*)?/g;

function findAll(pattern: RegExp, text: string): string[] {
  return Array.from(text.matchAll(pattern), match => match[0]);
}

function findAllUnique(patterns: RegExp[], text: string): string[] {
  const found = new Set<string>();
  for (const pattern of patterns) {
    for (const match of findAll(pattern, text)) {
      found.add(match);
    }
  }
  return [...found];
}

export function extractEmails(text: string): string[] {
  return findAll(EMAIL_PATTERN, text);
}

export function extractPhoneNumbers(text: string): string[] {
  return findAllUnique(PHONE_PATTERNS, text);
}

export function extractDates(text: string): string[] {
  return findAllUnique(DATE_PATTERNS, text);
}

export function extractNumbers(text: string): string[] {
  return findAll(NUMBER_PATTERN, text);
}

export function extractUrls(text: string): string[] {
  return findAll(URL_PATTERN, text);
}

const RULES: Record<DataKey, (text: string) => string[]> = {
  emails: extractEmails,
  phone_numbers: extractPhoneNumbers,
  dates: extractDates,
  numbers: extractNumbers,
  urls: extractUrls,
};

/**
 * Result keys produced by each extraction kind
 */
export const KIND_KEYS: Record<ExtractionKind, readonly DataKey[]> = {
  email_phone: ['emails', 'phone_numbers'],
  dates: ['dates'],
  numbers: ['numbers'],
  urls: ['urls'],
  all: ['emails', 'phone_numbers', 'dates', 'numbers', 'urls'],
};

/**
 * Run the rules selected by `kind` and collect results under their keys
 */
export function performExtraction(text: string, kind: ExtractionKind): ExtractedData {
  const data: ExtractedData = {};
  for (const key of KIND_KEYS[kind]) {
    data[key] = RULES[key](text);
  }
  return data;
}
