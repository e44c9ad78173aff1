import { describe, it, expect } from 'vitest';
import { parsePubDate, formatPubDate } from './parse-pub-date.js';

describe('parsePubDate', () => {
  it('should parse RFC 2822 dates', () => {
    expect(parsePubDate('Thu, 25 Jul 2024 14:54:00 GMT').toISOString()).toBe('2024-07-25T14:54:00.000Z');
    expect(parsePubDate(' Thu, 25 Jul 2024 14:54:00 -0000 ').toISOString()).toBe('2024-07-25T14:54:00.000Z');
  });

  it('should parse ISO 8601 dates', () => {
    expect(parsePubDate('2023-12-25T10:30:00Z').toISOString()).toBe('2023-12-25T10:30:00.000Z');
  });

  it('should return an invalid date for garbage', () => {
    expect(isNaN(parsePubDate('last tuesday').getTime())).toBe(true);
  });
});

describe('formatPubDate', () => {
  it('should format in UTC without milliseconds', () => {
    expect(formatPubDate(new Date('2026-10-18T09:05:03.250Z'))).toBe('Sun, 18 Oct 2026 09:05:03 GMT');
  });

  it('should read back to the same second', () => {
    const date = new Date('2024-07-25T14:54:00.000Z');
    expect(parsePubDate(formatPubDate(date)).getTime()).toBe(date.getTime());
  });
});
