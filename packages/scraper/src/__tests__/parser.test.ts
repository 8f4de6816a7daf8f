import { describe, it, expect } from 'vitest';
import {
  addDays,
  buildDateWindow,
  canonicalizeUrl,
  compareByTitleThenUrl,
  formatDateInTimeZone,
  isIsoDate,
  normalizeSpace,
} from '../scraper/parser.js';

describe('normalizeSpace', () => {
  it('should collapse whitespace', () => {
    expect(normalizeSpace('  Avatar:\n\n Fire   and Ash ')).toBe('Avatar: Fire and Ash');
  });
});

describe('canonicalizeUrl', () => {
  it('should strip query and fragment', () => {
    expect(canonicalizeUrl('https://cinema.test/film/avatar?date=2026-01-04&location=0')).toBe(
      'https://cinema.test/film/avatar'
    );
    expect(canonicalizeUrl('https://cinema.test/film/avatar#top')).toBe('https://cinema.test/film/avatar');
  });

  it('should leave clean URLs alone', () => {
    expect(canonicalizeUrl('https://cinema.test/film/avatar')).toBe('https://cinema.test/film/avatar');
  });
});

describe('isIsoDate', () => {
  it('should accept real dates only', () => {
    expect(isIsoDate('2026-01-04')).toBe(true);
    expect(isIsoDate('2026-02-30')).toBe(false);
    expect(isIsoDate('04.01.2026')).toBe(false);
  });
});

describe('addDays', () => {
  it('should cross month and year boundaries', () => {
    expect(addDays('2026-01-31', 1)).toBe('2026-02-01');
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
  });
});

describe('buildDateWindow', () => {
  it('should include the run date plus lookahead days', () => {
    expect(buildDateWindow('2026-01-30', 3)).toEqual(['2026-01-30', '2026-01-31', '2026-02-01', '2026-02-02']);
  });

  it('should contain only the run date for zero lookahead', () => {
    expect(buildDateWindow('2026-01-04', 0)).toEqual(['2026-01-04']);
  });
});

describe('formatDateInTimeZone', () => {
  it('should use the calendar date of the time zone', () => {
    const instant = new Date('2026-01-04T23:30:00Z');
    expect(formatDateInTimeZone(instant, 'UTC')).toBe('2026-01-04');
    expect(formatDateInTimeZone(instant, 'Europe/Podgorica')).toBe('2026-01-05');
  });
});

describe('compareByTitleThenUrl', () => {
  it('should compare titles case-insensitively, then URLs', () => {
    const items = [
      { title: 'beta', canonicalUrl: 'u3' },
      { title: 'Alpha', canonicalUrl: 'u2' },
      { title: 'alpha', canonicalUrl: 'u1' },
    ];
    expect([...items].sort(compareByTitleThenUrl).map((i) => i.canonicalUrl)).toEqual(['u1', 'u2', 'u3']);
  });
});
