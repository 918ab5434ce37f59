// Pure domain types: no framework dependency, no I/O.

export interface StockQuote {
  readonly symbol: string;
  readonly price: number;
  readonly change: number;
  readonly changePercent: number;
  readonly currency: string;
  readonly timestamp: number; // epoch ms
}

export interface PriceBar {
  readonly date: string; // YYYY-MM-DD
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export interface CompanyProfile {
  readonly symbol: string;
  readonly name: string;
  readonly exchange: string;
  readonly currency: string;
  readonly sector?: string;
  readonly industry?: string;
}

// --- Date ranges ---

export const HISTORY_RANGES = ["1mo", "3mo", "6mo", "1y"] as const;

export type HistoryRange = (typeof HISTORY_RANGES)[number];

export const DEFAULT_RANGE: HistoryRange = "3mo";

/** Trading days covered by each range. */
export const RANGE_DAYS: Record<HistoryRange, number> = {
  "1mo": 21,
  "3mo": 63,
  "6mo": 126,
  "1y": 252,
};

export function isHistoryRange(value: string): value is HistoryRange {
  return (HISTORY_RANGES as readonly string[]).includes(value);
}

// --- History & snapshots ---

export interface PriceHistory {
  readonly symbol: string;
  readonly range: HistoryRange;
  readonly quote: StockQuote;
  readonly profile: CompanyProfile;
  readonly bars: readonly PriceBar[]; // ascending by date
}

export type DataSource = "live" | "demo";

export interface MarketMetrics {
  readonly lastClose: number;
  readonly periodReturn: number; // percent
  readonly volatility: number; // annualised percent
  readonly movingAverage: number;
  readonly movingAverageWindow: number;
  readonly distanceFromAverage: number; // percent
  readonly high: number;
  readonly low: number;
  readonly averageVolume: number;
}

export interface MarketSnapshot {
  readonly symbol: string;
  readonly range: HistoryRange;
  readonly history: PriceHistory;
  readonly metrics: MarketMetrics;
  readonly insight: string;
  readonly source: DataSource;
  /** Why the live call was replaced by demo data. */
  readonly failure?: string;
}

/** Quote implied by the last two bars of a series. */
export function quoteFromBars(
  symbol: string,
  currency: string,
  bars: readonly PriceBar[],
): StockQuote | undefined {
  const last = bars.at(-1);
  if (last === undefined) return undefined;
  const previous = bars.at(-2) ?? last;
  const change = last.close - previous.close;
  return {
    symbol,
    price: last.close,
    change,
    changePercent: previous.close === 0 ? 0 : (change / previous.close) * 100,
    currency,
    timestamp: Date.parse(`${last.date}T21:00:00Z`),
  };
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}
