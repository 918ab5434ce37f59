// Price-series indicators: pure functions over closes and bars.

import type { MarketMetrics, PriceBar } from "./domain.ts";

export const TRADING_DAYS_PER_YEAR = 252;
export const DEFAULT_AVERAGE_WINDOW = 20;

export function mean(values: readonly number[]): number {
  return values.length === 0
    ? 0
    : values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Trailing simple moving average, aligned with `values`; `null` until the
 *  window is full. */
export function movingAverage(
  values: readonly number[],
  window: number,
): (number | null)[] {
  return values.map((_, i) =>
    i + 1 < window ? null : mean(values.slice(i + 1 - window, i + 1)),
  );
}

export function dailyReturns(closes: readonly number[]): number[] {
  return closes.slice(1).map((close, i) => close / (closes[i] ?? close) - 1);
}

/** Sample standard deviation. */
export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance =
    values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/** Annualised volatility of daily returns, in percent. */
export function annualisedVolatility(closes: readonly number[]): number {
  return (
    standardDeviation(dailyReturns(closes)) *
    Math.sqrt(TRADING_DAYS_PER_YEAR) *
    100
  );
}

/** First-to-last change, in percent. */
export function periodReturn(closes: readonly number[]): number {
  const first = closes[0];
  const last = closes.at(-1);
  if (first === undefined || last === undefined || first === 0) return 0;
  return (last / first - 1) * 100;
}

export function computeMetrics(
  bars: readonly PriceBar[],
  window: number = DEFAULT_AVERAGE_WINDOW,
): MarketMetrics {
  const closes = bars.map((b) => b.close);
  const lastClose = closes.at(-1) ?? 0;
  const effectiveWindow = Math.max(1, Math.min(window, closes.length));
  const average = mean(closes.slice(-effectiveWindow));

  return {
    lastClose,
    periodReturn: periodReturn(closes),
    volatility: annualisedVolatility(closes),
    movingAverage: average,
    movingAverageWindow: effectiveWindow,
    distanceFromAverage: average === 0 ? 0 : (lastClose / average - 1) * 100,
    high: bars.length === 0 ? 0 : Math.max(...bars.map((b) => b.high)),
    low: bars.length === 0 ? 0 : Math.min(...bars.map((b) => b.low)),
    averageVolume: mean(bars.map((b) => b.volume)),
  };
}
