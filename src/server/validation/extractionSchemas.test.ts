import { describe, it, expect } from 'vitest';
import { extractionSchemas, MAX_TEXT_CHARS, MAX_URL_CHARS } from './extractionSchemas.js';

describe('extractionSchemas.text.body', () => {
  const schema = extractionSchemas.text.body;

  it('defaults extraction_type to email_phone', () => {
    expect(schema.parse({ text: 'hello' })).toEqual({ text: 'hello', extraction_type: 'email_phone' });
  });

  it('decodes extraction_type case-insensitively', () => {
    expect(schema.parse({ text: 'hello', extraction_type: ' Numbers ' }).extraction_type).toBe('numbers');
  });

  it('rejects unknown extraction types', () => {
    const result = schema.safeParse({ text: 'hello', extraction_type: 'phones' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['extraction_type']);
      expect(result.error.issues[0]?.message).toBe(
        'Invalid extraction type. Allowed types: email_phone, dates, numbers, urls, all'
      );
    }
  });

  it('bounds text at MAX_TEXT_CHARS', () => {
    expect(schema.safeParse({ text: 'a'.repeat(MAX_TEXT_CHARS) }).success).toBe(true);

    const tooLong = schema.safeParse({ text: 'a'.repeat(MAX_TEXT_CHARS + 1) });
    expect(tooLong.success).toBe(false);
    if (!tooLong.success) {
      expect(tooLong.error.issues[0]?.message).toBe('Text cannot exceed 1048576 characters');
    }
  });

  it('rejects empty or missing text', () => {
    const empty = schema.safeParse({ text: '' });
    expect(empty.success).toBe(false);
    if (!empty.success) {
      expect(empty.error.issues[0]?.message).toBe('Text cannot be empty');
    }

    const missing = schema.safeParse({});
    expect(missing.success).toBe(false);
    if (!missing.success) {
      expect(missing.error.issues[0]?.message).toBe('Text is required');
    }
  });
});

describe('extractionSchemas.sheets.body', () => {
  const schema = extractionSchemas.sheets.body;

  it('accepts URLs up to the maximum length', () => {
    const url = 'a'.repeat(MAX_URL_CHARS);
    expect(schema.parse({ url })).toEqual({ url });
  });

  it('rejects empty and overlong URLs', () => {
    expect(schema.safeParse({ url: '' }).success).toBe(false);
    expect(schema.safeParse({ url: 'a'.repeat(MAX_URL_CHARS + 1) }).success).toBe(false);
  });
});
