import { describe, it, expect } from 'vitest';
import {
  extractEmails,
  extractPhoneNumbers,
  extractDates,
  extractNumbers,
  extractUrls,
  performExtraction,
} from './TextExtractor.js';

describe('extractEmails', () => {
  it('returns every match in order, duplicates included', () => {
    expect(extractEmails('a@b.co, A.B+tag@mail.example.org and a@b.co')).toEqual([
      'a@b.co',
      'A.B+tag@mail.example.org',
      'a@b.co',
    ]);
  });

  it('ignores strings without a domain suffix', () => {
    expect(extractEmails('user@localhost is not an address')).toEqual([]);
  });
});

describe('extractPhoneNumbers', () => {
  it('recognizes the parenthesized form', () => {
    expect(extractPhoneNumbers('Contact john@example.com or call (555) 123-4567')).toEqual(['(555) 123-4567']);
  });

  it('recognizes dashed, dotted and bare ten-digit forms', () => {
    expect(extractPhoneNumbers('Call 555-987-6543, 555.123.4567 or 5551234567.')).toEqual([
      '555-987-6543',
      '555.123.4567',
      '5551234567',
    ]);
  });

  it('recognizes international and space-separated forms', () => {
    const phones = extractPhoneNumbers('Dial +1 800 555 0199 now');
    expect(phones).toContain('+1 800 555 0199');
    expect(extractPhoneNumbers('Office 555 123 4567')).toEqual(['555 123 4567']);
  });

  it('deduplicates repeated numbers', () => {
    expect(extractPhoneNumbers('555-123-4567 and again 555-123-4567')).toEqual(['555-123-4567']);
  });
});

describe('extractDates', () => {
  it('recognizes slash, ISO and month-name dates', () => {
    const dates = extractDates('Due 12/25/2023, start 2024-01-15, kickoff Jan 1, 2024.');
    expect(dates).toContain('12/25/2023');
    expect(dates).toContain('2024-01-15');
    expect(dates).toContain('Jan 1, 2024');
    expect(dates).toHaveLength(3);
  });

  it('accepts dashed US dates and full month names', () => {
    expect(extractDates('on 03-15-2024')).toEqual(['03-15-2024']);
    expect(extractDates('since March 3, 2024')).toEqual(['March 3, 2024']);
  });

  it('deduplicates repeated dates', () => {
    expect(extractDates('12/25/2023 or 12/25/2023')).toEqual(['12/25/2023']);
  });
});

describe('extractNumbers', () => {
  it('returns integers and decimals, duplicates included', () => {
    expect(extractNumbers('Items cost 29.99 each, buy 5')).toEqual(['29.99', '5']);
    expect(extractNumbers('1 and 1')).toEqual(['1', '1']);
  });
});

describe('extractUrls', () => {
  it('captures scheme, host, port, path, query and fragment', () => {
    expect(extractUrls('Visit https://example.com or http://test.org/path?q=1#top and more')).toEqual([
      'https://example.com',
      'http://test.org/path?q=1#top',
    ]);
    expect(extractUrls('api at http://localhost:8080/v1/items')).toEqual(['http://localhost:8080/v1/items']);
  });

  it('ignores non-http schemes', () => {
    expect(extractUrls('ftp://example.com/file')).toEqual([]);
  });
});

describe('performExtraction', () => {
  const text = 'Contact john@example.com or call (555) 123-4567';

  it('runs only the rules of the requested kind', () => {
    expect(performExtraction(text, 'email_phone')).toEqual({
      emails: ['john@example.com'],
      phone_numbers: ['(555) 123-4567'],
    });
    expect(Object.keys(performExtraction(text, 'urls'))).toEqual(['urls']);
  });

  it('merges every rule for "all"', () => {
    expect(performExtraction(text, 'all')).toEqual({
      emails: ['john@example.com'],
      phone_numbers: ['(555) 123-4567'],
      dates: [],
      numbers: ['555', '123', '4567'],
      urls: [],
    });
  });
});
