import { parseLogTimestamp } from './log-timestamp';

describe('parseLogTimestamp', () => {
  it('parses a six-digit fraction as UTC, truncated to milliseconds', () => {
    expect(parseLogTimestamp('2025-06-14_08.12.45.123456')?.toISOString()).toBe(
      '2025-06-14T08:12:45.123Z',
    );
  });

  it('right-pads short fractions', () => {
    expect(parseLogTimestamp('2025-06-14_08.12.45.5')?.toISOString()).toBe(
      '2025-06-14T08:12:45.500Z',
    );
  });

  it('ignores surrounding whitespace', () => {
    expect(parseLogTimestamp('  2024-12-31_23.59.59.000001 ')?.toISOString()).toBe(
      '2024-12-31T23:59:59.000Z',
    );
  });

  it.each([
    ['2025-02-30_10.00.00.0', 'day past month end'],
    ['2025-13-01_10.00.00.0', 'month 13'],
    ['2025-06-14_24.00.00.0', 'hour 24'],
    ['2025-06-14_10.60.00.0', 'minute 60'],
    ['2025-06-14 10:00:00', 'wrong separators'],
    ['2025-06-14_10.00.00', 'missing fraction'],
    ['2025-06-14_10.00.00.1234567', 'seven fraction digits'],
    ['', 'empty'],
  ])('rejects %s (%s)', (text) => {
    expect(parseLogTimestamp(text)).toBeNull();
  });

  it('accepts 29 February in a leap year only', () => {
    expect(parseLogTimestamp('2024-02-29_00.00.00.0')?.toISOString()).toBe(
      '2024-02-29T00:00:00.000Z',
    );
    expect(parseLogTimestamp('2025-02-29_00.00.00.0')).toBeNull();
  });
});
