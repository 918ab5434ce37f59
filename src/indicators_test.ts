import assert from "node:assert/strict";
import { test } from "node:test";
import {
  annualisedVolatility,
  computeMetrics,
  dailyReturns,
  mean,
  movingAverage,
  periodReturn,
  standardDeviation,
} from "./indicators.ts";
import type { PriceBar } from "./domain.ts";

const bar = (date: string, close: number, volume = 100): PriceBar => ({
  date,
  open: close,
  high: close + 1,
  low: close - 1,
  close,
  volume,
});

// --- basics ---

test("mean: empty input is zero", () => {
  assert.equal(mean([]), 0);
  assert.equal(mean([2, 4, 6]), 4);
});

test("movingAverage: null until the window fills, then trailing means", () => {
  assert.deepEqual(movingAverage([1, 2, 3, 4, 5], 3), [null, null, 2, 3, 4]);
});

test("movingAverage: window larger than the series is all null", () => {
  assert.deepEqual(movingAverage([1, 2], 5), [null, null]);
});

test("dailyReturns: relative change between consecutive closes", () => {
  assert.deepEqual(dailyReturns([100, 110, 99]), [0.10000000000000009, -0.09999999999999998]);
});

test("standardDeviation: sample deviation, zero for fewer than two points", () => {
  assert.equal(standardDeviation([5]), 0);
  assert.equal(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9]), Math.sqrt(32 / 7));
});

test("annualisedVolatility: a flat series has no volatility", () => {
  assert.equal(annualisedVolatility([50, 50, 50, 50]), 0);
});

test("periodReturn: first to last in percent", () => {
  assert.equal(periodReturn([100, 90, 125]), 25);
  assert.equal(periodReturn([]), 0);
});

// --- computeMetrics ---

test("computeMetrics: uses the whole series when shorter than the window", () => {
  const metrics = computeMetrics([
    bar("2025-01-02", 100, 10),
    bar("2025-01-03", 50, 20),
    bar("2025-01-06", 150, 30),
  ]);

  assert.equal(metrics.lastClose, 150);
  assert.equal(metrics.periodReturn, 50);
  assert.equal(metrics.movingAverage, 100);
  assert.equal(metrics.movingAverageWindow, 3);
  assert.equal(metrics.distanceFromAverage, 50);
  assert.equal(metrics.high, 151);
  assert.equal(metrics.low, 49);
  assert.equal(metrics.averageVolume, 20);
});

test("computeMetrics: the moving average covers only the last window of closes", () => {
  const bars = [1, 2, 3, 4, 5, 6].map((c, i) => bar(`2025-01-0${i + 1}`, c));
  const metrics = computeMetrics(bars, 2);

  assert.equal(metrics.movingAverage, 5.5);
  assert.equal(metrics.movingAverageWindow, 2);
});

test("computeMetrics: an empty series yields zeros", () => {
  const metrics = computeMetrics([]);
  assert.equal(metrics.lastClose, 0);
  assert.equal(metrics.high, 0);
  assert.equal(metrics.distanceFromAverage, 0);
});
