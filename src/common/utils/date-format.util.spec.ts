import { ParseError } from '../errors/news-errors';
import { formatPublishedDate, parseIsoDateTime } from './date-format.util';

describe('formatPublishedDate', () => {
  it.each([
    ['2025-10-15T05:00:35Z', '2025-10-15 05:00:35'],
    ['2025-10-15T05:00:35z', '2025-10-15 05:00:35'],
    ['2025-10-15T05:00:35.123+00:00', '2025-10-15 05:00:35'],
    ['2025-10-15T05:00:35-04:00', '2025-10-15 05:00:35'],
    ['2025-10-15T05:00:35+0900', '2025-10-15 05:00:35'],
    ['2025-10-15T05:00', '2025-10-15 05:00:00'],
    ['2025-10-15', '2025-10-15 00:00:00'],
    ['2024-02-29T23:59:59Z', '2024-02-29 23:59:59'],
  ])('normalizes %s', (input, expected) => {
    expect(formatPublishedDate(input)).toBe(expected);
  });

  it('is idempotent on already normalized values', () => {
    expect(formatPublishedDate('2025-10-15 05:00:35')).toBe('2025-10-15 05:00:35');
  });

  it.each([
    'Oct 15, 2025',
    '2025-1-5 09:00:00',
    '2025-02-30T00:00:00Z',
    '2023-02-29',
    '2025-10-15T24:00:00',
    '2025-10-15T05:00:35+25:00',
    'yesterday',
  ])('keeps unparseable value %s as is', (input) => {
    expect(formatPublishedDate(input)).toBe(input);
  });

  it.each([null, undefined, '', 1729000000, {}])('returns null for %p', (input) => {
    expect(formatPublishedDate(input)).toBeNull();
  });
});

describe('parseIsoDateTime', () => {
  it('returns wall clock fields without timezone conversion', () => {
    expect(parseIsoDateTime('2025-03-09T22:15:07+09:00')).toEqual({
      year: 2025,
      month: 3,
      day: 9,
      hour: 22,
      minute: 15,
      second: 7,
    });
  });

  it('throws ParseError for invalid input', () => {
    expect(() => parseIsoDateTime('2025-13-01')).toThrow(ParseError);
  });
});
