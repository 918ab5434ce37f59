// Pure formatting functions: no I/O.

import type { MarketSnapshot, StockQuote } from "./domain.ts";
import type { HttpError, MarketDataError } from "./market-data.ts";

// --- Numbers ---

const grouped = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/** Whole number with thousands separators: 12500000 → "12,500,000". */
export function formatNumber(value: number): string {
  return grouped.format(value);
}

export function formatMoney(value: number): string {
  return `$${formatNumber(value)}`;
}

export function formatPrice(value: number, currency: string): string {
  return `${value.toFixed(2)} ${currency}`;
}

/** Signed percentage with two decimals: 1.5 → "+1.50%". */
export function formatSignedPercent(value: number, digits = 2): string {
  const sign = value >= 0 ? "+" : "";
  return `${sign}${value.toFixed(digits)}%`;
}

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Quote formatting ---

export function formatQuote(quote: StockQuote): string {
  const direction = quote.change >= 0 ? "▲" : "▼";
  const color = quote.change >= 0 ? GREEN : RED;
  const sign = quote.change >= 0 ? "+" : "";

  const lines = [
    "",
    `${BOLD}  ${quote.symbol}${RESET}`,
    `  ${BOLD}${formatPrice(quote.price, quote.currency)}${RESET}`,
    `  ${color}${direction} ${sign}${quote.change.toFixed(2)} (${formatSignedPercent(quote.changePercent)})${RESET}`,
    `  ${DIM}${new Date(quote.timestamp).toISOString().replace("T", " ").slice(0, 16)} UTC${RESET}`,
    "",
  ];

  return lines.join("\n");
}

/** Quote block followed by the insight; demo data is labelled as such. */
export function formatSnapshot(snapshot: MarketSnapshot): string {
  const { profile, quote } = snapshot.history;
  const header =
    snapshot.source === "demo"
      ? `${YELLOW}  Demo mode${snapshot.failure === undefined ? "" : ` (${snapshot.failure})`}${RESET}`
      : `${DIM}  Live data${RESET}`;

  return [
    formatQuote(quote).trimEnd(),
    `  ${profile.name} · ${profile.exchange}`,
    header,
    "",
    `  ${snapshot.insight}`,
    "",
  ].join("\n");
}

// --- Error formatting ---

export function formatError(error: MarketDataError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

export interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

const SYMBOL_HINT =
  "Double-check the ticker symbol and try again (e.g. AAPL, GOOGL, TSLA).";

export function classifyError(error: MarketDataError): ClassifiedError {
  switch (error._tag) {
    case "NetworkError":
      return {
        title: "Network error",
        hint: "Could not reach the API. Check your internet connection.",
      };
    case "HttpError":
      return classifyHttpError(error);
    case "SymbolNotFound":
      return { title: "Symbol not found", hint: SYMBOL_HINT };
    case "ServiceError":
      return {
        title: "Service unavailable",
        hint: error.message,
      };
    case "ParseError":
      return {
        title: "Unexpected response",
        hint: "The API returned data in an unexpected format.",
      };
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 404) {
    return { title: "Symbol not found", hint: SYMBOL_HINT };
  }
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests, wait a moment and try again.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "The market data provider is having issues. Try again in a few minutes.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status}`,
  };
}
