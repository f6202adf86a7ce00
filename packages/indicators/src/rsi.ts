/**
 * Wilder-smoothed Relative Strength Index.
 *
 * The first value is seeded from the simple mean of the first `period`
 * changes; each later value folds in one more change. A window with no
 * losses reads 100.
 */
export function rsiSeries(values: number[], period = 14): number[] {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error(`RSI period must be a positive integer, got ${period}`);
  }

  if (values.length <= period) {
    return [];
  }

  let gains = 0;
  let losses = 0;

  for (let i = 1; i <= period; i += 1) {
    const change = values[i] - values[i - 1];
    if (change >= 0) {
      gains += change;
    } else {
      losses -= change;
    }
  }

  let avgGain = gains / period;
  let avgLoss = losses / period;
  const rsis: number[] = [toRsi(avgGain, avgLoss)];

  for (let i = period + 1; i < values.length; i += 1) {
    const change = values[i] - values[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    rsis.push(toRsi(avgGain, avgLoss));
  }

  return rsis;
}

/**
 * Most recent RSI reading, or `null` when fewer than `period + 1` samples
 * are available.
 */
export function latestRsi(values: number[], period = 14): number | null {
  const series = rsiSeries(values, period);
  return series.length ? series[series.length - 1] : null;
}

function toRsi(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}
