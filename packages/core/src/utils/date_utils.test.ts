import { formatDay, formatPublished, lookbackStart } from './date_utils';

describe('date_utils', () => {
  it('should format a message timestamp in UTC', () => {
    // 2024-03-05T09:07:00Z
    expect(formatPublished(1709629620.000123)).toBe('2024-03-05 09:07 UTC');
  });

  it('should format a day', () => {
    expect(formatDay(new Date(Date.UTC(2024, 0, 2, 23, 59)))).toBe('2024-01-02');
  });

  it('should compute the start of a lookback window', () => {
    const now = new Date(Date.UTC(2024, 2, 8, 0, 0, 0));
    expect(lookbackStart(now, 7)).toBe(Date.UTC(2024, 2, 1, 0, 0, 0) / 1000);
  });
});
