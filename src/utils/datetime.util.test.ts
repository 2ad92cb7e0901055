import { parseDateTime, utcDateKey } from './datetime.util';

describe('parseDateTime', () => {
  it.each([
    ['2025-03-01T12:00:00Z', '2025-03-01T12:00:00.000Z'],
    ['2025-03-01T12:00:00', '2025-03-01T12:00:00.000Z'],
    ['2025-03-01 12:00:00.5', '2025-03-01T12:00:00.500Z'],
    ['2025-03-01T14:30:00+02:00', '2025-03-01T12:30:00.000Z'],
    ['2025-03-01T07:00:00-0500', '2025-03-01T12:00:00.000Z'],
    ['2025-03-01', '2025-03-01T00:00:00.000Z']
  ])('should parse %s', (input, expected) => {
    expect(parseDateTime(input)?.toISOString()).toBe(expected);
  });

  // Test: Out-of-range parts do not roll over
  it('should reject invalid calendar values and free text', () => {
    expect(parseDateTime('2025-13-01')).toBeUndefined();
    expect(parseDateTime('2025-03-01T24:00:00Z')).toBeUndefined();
    expect(parseDateTime('tomorrow')).toBeUndefined();
    expect(parseDateTime(null)).toBeUndefined();
    expect(parseDateTime(new Date(Number.NaN))).toBeUndefined();
  });

  // Test: Days past the end of the month are not moved into the next month
  it('should reject days the month does not have', () => {
    expect(parseDateTime('2024-02-30T10:00:00Z')).toBeUndefined();
    expect(parseDateTime('2024-04-31')).toBeUndefined();
    expect(parseDateTime('2023-02-29')).toBeUndefined();
    expect(parseDateTime('2024-02-29T10:00:00Z')?.toISOString()).toBe('2024-02-29T10:00:00.000Z');
  });

  it('should accept epoch milliseconds and Date instances', () => {
    expect(parseDateTime(0)?.toISOString()).toBe('1970-01-01T00:00:00.000Z');
    const date = new Date('2025-03-01T12:00:00Z');
    expect(parseDateTime(date)).toBe(date);
  });
});

describe('utcDateKey', () => {
  it('should use the UTC calendar day', () => {
    expect(utcDateKey(new Date('2025-03-01T23:30:00-02:00'))).toBe('2025-03-02');
  });
});
