import { addDays, diffUtcDays, startOfUtcDay, toIsoDate } from './dates';

describe('dates', () => {
  it('truncates to UTC midnight', () => {
    expect(startOfUtcDay(new Date('2025-06-01T23:59:59.999Z')).toISOString()).toBe(
      '2025-06-01T00:00:00.000Z',
    );
  });

  it('adds fractional days', () => {
    expect(addDays(new Date('2025-06-01T00:00:00Z'), 1.5).toISOString()).toBe(
      '2025-06-02T12:00:00.000Z',
    );
  });

  it('formats the UTC date', () => {
    expect(toIsoDate(new Date('2026-06-01T00:00:00Z'))).toBe('2026-06-01');
  });

  it('counts calendar days regardless of time of day', () => {
    expect(diffUtcDays(new Date('2025-07-01T23:00:00Z'), new Date('2025-07-11T01:00:00Z'))).toBe(10);
    expect(diffUtcDays(new Date('2025-07-11T00:00:00Z'), new Date('2025-07-01T00:00:00Z'))).toBe(-10);
  });
});
