import { describe, it, expect } from 'vitest';
import { isGroupBy, isInterval, isIntraday, periodStart } from '../src/services/market-data.service.js';

const NOW = new Date('2024-05-15T12:00:00.000Z');

describe('periodStart', () => {
  it.each([
    ['1d', '2024-05-14T12:00:00.000Z'],
    ['5d', '2024-05-10T12:00:00.000Z'],
    ['2wk', '2024-05-01T12:00:00.000Z'],
    ['3mo', '2024-02-15T12:00:00.000Z'],
    ['1y', '2023-05-15T12:00:00.000Z'],
    ['10y', '2014-05-15T12:00:00.000Z'],
    ['ytd', '2024-01-01T00:00:00.000Z'],
    ['max', '1970-01-01T00:00:00.000Z'],
  ])('%s starts at %s', (period, expected) => {
    expect(periodStart(period, NOW).toISOString()).toBe(expected);
  });

  it('rejects unknown periods', () => {
    expect(() => periodStart('forever', NOW)).toThrow('Invalid period: forever');
  });
});

describe('intervals', () => {
  it('recognizes supported intervals', () => {
    expect(isInterval('1d')).toBe(true);
    expect(isInterval('90m')).toBe(true);
    expect(isInterval('7m')).toBe(false);
  });

  it('tells intraday intervals apart from daily and coarser ones', () => {
    expect(isIntraday('1m')).toBe(true);
    expect(isIntraday('1h')).toBe(true);
    expect(isIntraday('1d')).toBe(false);
    expect(isIntraday('1mo')).toBe(false);
  });

  it('accepts only column and ticker grouping', () => {
    expect(isGroupBy('column')).toBe(true);
    expect(isGroupBy('ticker')).toBe(true);
    expect(isGroupBy('symbol')).toBe(false);
  });
});
