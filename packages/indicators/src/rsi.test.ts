import { describe, expect, it } from 'vitest';
import { latestRsi, rsiSeries } from './rsi';

describe('rsiSeries', () => {
  it('returns nothing until period + 1 samples exist', () => {
    expect(rsiSeries([1, 2, 3], 3)).toEqual([]);
    expect(rsiSeries([1, 2, 3, 4], 3)).toHaveLength(1);
  });

  it('reads 100 for a window without losses', () => {
    expect(rsiSeries([1, 2, 3, 4, 5], 3)).toEqual([100, 100]);
  });

  it('seeds from the mean change and then applies Wilder smoothing', () => {
    // changes: +2, -1, +1 -> avgGain 1, avgLoss 1/3 -> RS 3 -> 75
    // next change -2: avgGain 2/3, avgLoss 8/9 -> RS 0.75 -> 300/7
    const series = rsiSeries([10, 12, 11, 12, 10], 3);
    expect(series).toHaveLength(2);
    expect(series[0]).toBeCloseTo(75, 10);
    expect(series[1]).toBeCloseTo(300 / 7, 10);
  });

  it('rejects a non-positive or fractional period', () => {
    expect(() => rsiSeries([1, 2], 0)).toThrow('RSI period must be a positive integer');
    expect(() => rsiSeries([1, 2], 1.5)).toThrow('RSI period must be a positive integer');
  });
});

describe('latestRsi', () => {
  it('returns the last reading', () => {
    expect(latestRsi([10, 12, 11, 12, 10], 3)).toBeCloseTo(300 / 7, 10);
  });

  it('returns null for short input', () => {
    expect(latestRsi([10, 11], 14)).toBeNull();
  });

  it('stays below 50 in a steady decline with a single bounce', () => {
    const closes = [20, 19, 18, 17, 18, 17, 16, 15, 14, 13, 12, 11, 10, 9, 8, 7];
    const value = latestRsi(closes, 14);
    expect(value).not.toBeNull();
    expect(value ?? 100).toBeLessThan(50);
  });
});
