/**
 * Google Sheets identifier extraction.
 *
 * Accepts a full spreadsheet URL, a partial URL containing
 * `spreadsheets/d/<id>`, or a bare document id.
 */

export const URL_TYPES = [
  'invalid',
  'document_id',
  'full_url_with_sheets',
  'full_url',
  'partial_url',
] as const;

export type UrlType = (typeof URL_TYPES)[number];

export interface SheetsInfo {
  documentId: string | null;
  sheetIds: string[];
  urlType: UrlType;
}

const DOCUMENT_URL_PATTERN = /spreadsheets\/d\/([A-Za-z0-9_-]+)/;
const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9_-]{25,50}$/;
const SHEETS_URL_MARKERS = ['docs.google.com/spreadsheets', 'spreadsheets/d/'];

const GID_PATTERNS: RegExp[] = [
  /gid=(\d+)/g,  // query parameter
  /#gid=(\d+)/g, // fragment
];

export function isDocumentId(value: string): boolean {
  return DOCUMENT_ID_PATTERN.test(value.trim());
}

/**
 * A `spreadsheets/d/<id>` match anywhere in the input wins; otherwise the
 * whole trimmed input is accepted when it looks like a 25-50 character id.
 */
export function extractDocumentId(input: string): string | null {
  if (!input) {
    return null;
  }

  const match = DOCUMENT_URL_PATTERN.exec(input);
  if (match?.[1]) {
    return match[1];
  }

  const trimmed = input.trim();
  return DOCUMENT_ID_PATTERN.test(trimmed) ? trimmed : null;
}

/**
 * Collect gid values from both query and fragment forms, first occurrence first
 */
export function extractSheetIds(input: string): string[] {
  const sheetIds = new Set<string>();
  for (const pattern of GID_PATTERNS) {
    for (const match of input.matchAll(pattern)) {
      if (match[1]) {
        sheetIds.add(match[1]);
      }
    }
  }
  return [...sheetIds];
}

export function determineUrlType(input: string, documentId: string | null, sheetIds: string[]): UrlType {
  if (!documentId) {
    return 'invalid';
  }

  if (isDocumentId(input)) {
    return 'document_id';
  }

  if (SHEETS_URL_MARKERS.some(marker => input.includes(marker))) {
    return sheetIds.length > 0 ? 'full_url_with_sheets' : 'full_url';
  }

  return 'partial_url';
}

export function extractSheetsInfo(input: string): SheetsInfo {
  const documentId = extractDocumentId(input);
  const sheetIds = extractSheetIds(input);
  return {
    documentId,
    sheetIds,
    urlType: determineUrlType(input, documentId, sheetIds),
  };
}
