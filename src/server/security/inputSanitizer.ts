import { InvalidInputError, PayloadTooLargeError } from '../types/errors.js';

export const DEFAULT_MAX_TEXT_LENGTH = 1048576;

export interface SanitizeOptions {
  maxLength?: number;
}

/**
 * Removed after escaping, so a raw <script> block only matches if it
 * survived the escape step.
 */
const DANGEROUS_PATTERNS: RegExp[] = [
  /<script[^>]*>.*?<\/script>/gis,
  /javascript:/gi,
  /data:text\/html/gi,
  /vbscript:/gi,
];

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

/**
 * Sanitize input text before any extraction runs.
 *
 * Escapes markup-significant characters, strips script-bearing URL schemes
 * and collapses whitespace.
 *
 * @throws {InvalidInputError} when the input is empty or not a string
 * @throws {PayloadTooLargeError} when the input exceeds `maxLength` characters
 */
export function sanitizeInputText(text: unknown, options: SanitizeOptions = {}): string {
  const maxLength = options.maxLength ?? DEFAULT_MAX_TEXT_LENGTH;

  if (typeof text !== 'string' || text.length === 0) {
    throw new InvalidInputError();
  }

  if (text.length > maxLength) {
    throw new PayloadTooLargeError(maxLength, { length: text.length });
  }

  let sanitized = escapeHtml(text);

  for (const pattern of DANGEROUS_PATTERNS) {
    sanitized = sanitized.replace(pattern, '');
  }

  return sanitized.replace(/\s+/g, ' ').trim();
}
