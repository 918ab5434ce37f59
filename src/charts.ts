// Chart.js configurations for the dashboard panels. The pages serialise
// them into the HTML; the browser hands them to `new Chart(...)` as is.

import type { ChartConfiguration } from "chart.js";
import type { AnomalyRecord, PipelineRun } from "./analytics.ts";
import type { PriceBar } from "./domain.ts";
import { movingAverage } from "./indicators.ts";
import type { TimePoint } from "./simulation.ts";

export const COLORS = {
  primary: "#2E86AB",
  accent: "#F18F01",
  success: "#00C851",
  danger: "#EF5350",
  grid: "rgba(0,0,0,0.08)",
} as const;

export type LineChart = ChartConfiguration<"line", (number | null)[], string>;
export type BarChart = ChartConfiguration<"bar", number[], string>;
export type DashboardChart = LineChart | BarChart;

const lineOptions = (yTitle: string): LineChart["options"] => ({
  responsive: true,
  maintainAspectRatio: false,
  interaction: { mode: "index", intersect: false },
  plugins: { legend: { position: "top" } },
  scales: {
    x: { grid: { color: COLORS.grid }, ticks: { maxTicksLimit: 12 } },
    y: { grid: { color: COLORS.grid }, title: { display: true, text: yTitle } },
  },
});

/** Closing prices with the trailing moving average drawn over them. */
export function priceChart(
  bars: readonly PriceBar[],
  window: number,
  currency: string,
): LineChart {
  const closes = bars.map((b) => b.close);
  return {
    type: "line",
    data: {
      labels: bars.map((b) => b.date),
      datasets: [
        {
          label: "Close",
          data: closes,
          borderColor: COLORS.primary,
          backgroundColor: "rgba(46,134,171,0.15)",
          borderWidth: 2,
          fill: true,
          pointRadius: 0,
          tension: 0.1,
        },
        {
          label: `${window}-day average`,
          data: movingAverage(closes, window),
          borderColor: COLORS.accent,
          borderWidth: 2,
          borderDash: [5, 5],
          fill: false,
          pointRadius: 0,
        },
      ],
    },
    options: lineOptions(`Price (${currency})`),
  };
}

export function revenueChart(points: readonly TimePoint[]): LineChart {
  return {
    type: "line",
    data: {
      labels: points.map((p) => p.date),
      datasets: [
        {
          label: "Revenue",
          data: points.map((p) => Math.round(p.value)),
          borderColor: COLORS.primary,
          borderWidth: 3,
          fill: false,
          tension: 0.3,
        },
      ],
    },
    options: lineOptions("Revenue ($)"),
  };
}

/** Baseline response times with each flagged anomaly drawn as a red cross
 *  on its own date. Anomalies outside the baseline's dates are not drawn. */
export function anomalyChart(
  baseline: readonly TimePoint[],
  anomalies: readonly AnomalyRecord[],
): LineChart {
  const flagged = new Map(
    anomalies.filter((a) => a.isAnomaly).map((a) => [a.timestamp, a.metricValue]),
  );
  return {
    type: "line",
    data: {
      labels: baseline.map((p) => p.date),
      datasets: [
        {
          label: "Response Time",
          data: baseline.map((p) => p.value),
          borderColor: COLORS.primary,
          borderWidth: 1,
          pointRadius: 0,
          fill: false,
        },
        {
          label: "Anomalies",
          data: baseline.map((p) => flagged.get(p.date) ?? null),
          showLine: false,
          pointStyle: "crossRot",
          pointRadius: 8,
          pointBorderWidth: 3,
          borderColor: COLORS.danger,
          backgroundColor: COLORS.danger,
        },
      ],
    },
    options: lineOptions("Response Time (ms)"),
  };
}

/** Records processed per pipeline, green for successful runs and red
 *  otherwise. */
export function pipelineChart(runs: readonly PipelineRun[]): BarChart {
  return {
    type: "bar",
    data: {
      labels: runs.map((r) => r.name),
      datasets: [
        {
          label: "Records Processed",
          data: runs.map((r) => r.records),
          backgroundColor: runs.map((r) =>
            r.status === "Success" ? COLORS.success : COLORS.danger,
          ),
        },
      ],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      plugins: { legend: { display: false } },
      scales: { y: { beginAtZero: true, grid: { color: COLORS.grid } } },
    },
  };
}
