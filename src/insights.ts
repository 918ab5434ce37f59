// Simulated AI commentary: templated text chosen by simple thresholds.
// Everything here is pure: the same inputs always give the same string.

import type { AnalyticsData } from "./analytics.ts";
import { summarizePipelines } from "./analytics.ts";
import type { HistoryRange, MarketMetrics, MarketSnapshot } from "./domain.ts";
import { formatMoney, formatNumber, formatSignedPercent } from "./format.ts";

// --- Market commentary ---

const RANGE_LABEL: Record<HistoryRange, string> = {
  "1mo": "month",
  "3mo": "3 months",
  "6mo": "6 months",
  "1y": "year",
};

export type TrendLabel =
  | "strong rally"
  | "uptrend"
  | "range-bound"
  | "downtrend"
  | "sharp sell-off";

export type VolatilityLabel = "high" | "moderate" | "low";

export function trendLabel(periodReturn: number): TrendLabel {
  if (periodReturn >= 10) return "strong rally";
  if (periodReturn >= 2) return "uptrend";
  if (periodReturn <= -10) return "sharp sell-off";
  if (periodReturn <= -2) return "downtrend";
  return "range-bound";
}

export function volatilityLabel(volatility: number): VolatilityLabel {
  if (volatility >= 40) return "high";
  if (volatility >= 20) return "moderate";
  return "low";
}

const TREND_TEXT: Record<TrendLabel, { readonly icon: string; readonly text: string }> = {
  "strong rally": { icon: "🚀", text: "a strong rally" },
  uptrend: { icon: "📈", text: "a steady uptrend" },
  "range-bound": { icon: "➖", text: "a range-bound market" },
  downtrend: { icon: "🔻", text: "a downtrend" },
  "sharp sell-off": { icon: "📉", text: "a sharp sell-off" },
};

function outlook(metrics: MarketMetrics, trend: TrendLabel): string {
  if (volatilityLabel(metrics.volatility) === "high") {
    return "Swings are large, so position sizing deserves extra care.";
  }
  if ((trend === "uptrend" || trend === "strong rally") && metrics.distanceFromAverage >= 0) {
    return "Momentum remains intact.";
  }
  if ((trend === "downtrend" || trend === "sharp sell-off") && metrics.distanceFromAverage < 0) {
    return "Sellers remain in control.";
  }
  return "No strong signal stands out.";
}

export function marketInsight(
  symbol: string,
  range: HistoryRange,
  metrics: MarketMetrics,
): string {
  const trend = trendLabel(metrics.periodReturn);
  const { icon, text } = TREND_TEXT[trend];
  const direction = metrics.periodReturn >= 0 ? "up" : "down";
  const position = metrics.distanceFromAverage >= 0 ? "above" : "below";

  return [
    `${icon} ${symbol} is ${direction} ${Math.abs(metrics.periodReturn).toFixed(1)}% over the last ${RANGE_LABEL[range]}, ${text}.`,
    `Volatility is ${volatilityLabel(metrics.volatility)} at ${metrics.volatility.toFixed(1)}% annualised,`,
    `and the price sits ${Math.abs(metrics.distanceFromAverage).toFixed(1)}% ${position} its ${metrics.movingAverageWindow}-day average.`,
    outlook(metrics, trend),
  ].join(" ");
}

// --- Conversational answers ---

export interface QueryContext {
  readonly analytics: AnalyticsData;
  readonly snapshot?: MarketSnapshot;
}

export const GENERIC_ANSWER =
  "🤖 I've analyzed your query. Based on the current data, all key metrics are performing within expected ranges. Would you like me to dive deeper into any specific area?";

const MARKET_WORDS = ["price", "stock", "ticker", "market", "trend", "volatility"];

function mentionsMarket(query: string, snapshot: MarketSnapshot): boolean {
  const words: readonly string[] = query.match(/[a-z0-9.]+/g) ?? [];
  return (
    words.includes(snapshot.symbol.toLowerCase()) ||
    MARKET_WORDS.some((w) => query.includes(w))
  );
}

function marketAnswer(snapshot: MarketSnapshot): string {
  const { quote } = snapshot.history;
  const demo = snapshot.source === "demo" ? " (demo data)" : "";
  return `💹 ${snapshot.symbol} last traded at ${quote.price.toFixed(2)} ${quote.currency} (${formatSignedPercent(quote.changePercent)} on the day)${demo}. ${snapshot.insight}`;
}

/** Keyword-matched answer. Topics are checked in a fixed order, so a
 *  question that mentions both churn and revenue gets the churn answer. */
export function answerQuery(query: string, context: QueryContext): string {
  const q = query.toLowerCase();
  const { kpis, anomalies, pipelines } = context.analytics;

  if (q.includes("churn")) {
    return `📊 Current churn rate is ${kpis.churnRate}%, which is 0.8% better than last quarter. The main contributing factors are improved customer support and product updates.`;
  }
  if (q.includes("revenue")) {
    return `💰 Total revenue is ${formatMoney(kpis.totalRevenue)} with ${kpis.monthlyGrowth}% monthly growth. Revenue has shown consistent upward trends across all quarters.`;
  }
  if (q.includes("cost")) {
    return `💡 Our AI-driven automation has saved ${formatMoney(kpis.costSavings)} annually by eliminating 2,000+ manual hours through ETL pipeline automation.`;
  }
  if (q.includes("anomal")) {
    const high = anomalies.filter((a) => a.severity === "High").length;
    const latest = anomalies.at(-1);
    const tail =
      latest === undefined
        ? ""
        : ` The latest reading was ${latest.metricValue.toFixed(1)}ms on ${latest.timestamp}.`;
    return `🔍 ${anomalies.length} anomalies were flagged, ${high} of them high severity.${tail}`;
  }
  if (q.includes("pipeline") || q.includes("etl")) {
    const summary = summarizePipelines(pipelines);
    const attention =
      summary.failed.length === 0
        ? " All pipelines are healthy."
        : ` Needs attention: ${summary.failed.join(", ")}.`;
    return `⚙️ ${summary.successful} of ${summary.total} ETL pipelines succeeded (${summary.successRate}% success rate), processing ${formatNumber(summary.recordsProcessed)} records.${attention}`;
  }
  if (context.snapshot !== undefined && mentionsMarket(q, context.snapshot)) {
    return marketAnswer(context.snapshot);
  }
  return GENERIC_ANSWER;
}
