import assert from "node:assert/strict";
import { test } from "node:test";
import { sampleAnalytics } from "./analytics.ts";
import type { MarketSnapshot } from "./domain.ts";
import {
  anomaliesPage,
  executivePage,
  marketPage,
  pipelinesPage,
  reportsPage,
} from "./pages.ts";

const snapshot: MarketSnapshot = {
  symbol: "AAPL",
  range: "1mo",
  history: {
    symbol: "AAPL",
    range: "1mo",
    quote: {
      symbol: "AAPL",
      price: 196,
      change: -4,
      changePercent: -2,
      currency: "USD",
      timestamp: 0,
    },
    profile: {
      symbol: "AAPL",
      name: "Apple Inc.",
      exchange: "NasdaqGS",
      currency: "USD",
      sector: "Technology",
    },
    bars: [
      { date: "2025-06-12", open: 200, high: 201, low: 199, close: 200, volume: 10 },
      { date: "2025-06-13", open: 199, high: 199, low: 195, close: 196, volume: 20 },
    ],
  },
  metrics: {
    lastClose: 196,
    periodReturn: -2,
    volatility: 0,
    movingAverage: 198,
    movingAverageWindow: 2,
    distanceFromAverage: -1.01,
    high: 201,
    low: 195,
    averageVolume: 15,
  },
  insight: "Prices & <signals>.",
  source: "demo",
  failure: "NetworkError: <down>",
};

const symbols = ["AAPL", "MSFT"];

// --- Market ---

test("marketPage: demo data carries the badge and the escaped reason", () => {
  const page = marketPage({ symbols, symbol: "AAPL", range: "1mo", snapshot });

  assert.ok(
    page.includes(
      '<span class="badge badge-demo">Demo mode</span><small> (NetworkError: &lt;down&gt;)</small>',
    ),
  );
  assert.ok(page.includes('<div class="alert alert-info">Prices &amp; &lt;signals&gt;.</div>'));
  assert.ok(page.includes("<p>Apple Inc. · NasdaqGS · Technology</p>"));
  assert.ok(page.includes('<canvas id="price-chart"></canvas>'));
});

test("marketPage: live data is labelled live", () => {
  const { failure: _failure, ...rest } = snapshot;
  const page = marketPage({ symbols, symbol: "AAPL", range: "1mo", snapshot: { ...rest, source: "live" } });

  assert.ok(page.includes('<span class="badge badge-live">Live data</span>'));
  assert.equal(page.includes("Demo mode"), false);
});

test("marketPage: the quote card shows price and signed change", () => {
  const page = marketPage({ symbols, symbol: "AAPL", range: "1mo", snapshot });
  assert.ok(
    page.includes(
      '<div class="metric-value">196.00 USD</div><div class="metric-delta">-4.00 (-2.00%)</div>',
    ),
  );
});

test("marketPage: the selected range is preselected", () => {
  const page = marketPage({ symbols, symbol: "AAPL", range: "6mo" });
  assert.ok(page.includes('<option value="6mo" selected>6 months</option>'));
  assert.ok(page.includes('<option value="1mo">1 month</option>'));
});

test("marketPage: errors and user input are escaped", () => {
  const page = marketPage({
    symbols,
    symbol: "<b>",
    range: "3mo",
    error: { title: "Symbol not found", hint: "Try <AAPL>" },
  });

  assert.ok(page.includes('value="&lt;b&gt;"'));
  assert.ok(page.includes('<div class="alert alert-error">Symbol not found: Try &lt;AAPL&gt;</div>'));
});

// --- Executive ---

test("executivePage: KPI cards from the analytics data", () => {
  const page = executivePage(sampleAnalytics.kpis, [{ date: "2024-01-31", value: 1 }]);

  assert.ok(
    page.includes(
      '<div class="metric-label">Total Revenue</div><div class="metric-value">$12,500,000</div><div class="metric-delta">+8.5%</div>',
    ),
  );
  assert.ok(page.includes('<div class="metric-value">2.1%</div>'));
  assert.ok(page.includes('<canvas id="revenue-chart"></canvas>'));
});

// --- Reports ---

test("reportsPage: history entries and the latest answer are escaped", () => {
  const conversation = {
    timestamp: 0,
    query: "<script>alert(1)</script>",
    answer: "Answer & more",
    responseTime: 1.25,
    satisfaction: 4,
  };
  const page = reportsPage({
    recent: [conversation],
    stats: { total: 1, averageResponseTime: 1.25, averageSatisfaction: 4 },
    latest: conversation,
  });

  assert.ok(page.includes("<p><strong>Query:</strong> &lt;script&gt;alert(1)&lt;/script&gt;</p>"));
  assert.ok(page.includes("<p><strong>Satisfaction:</strong> ⭐⭐⭐⭐</p>"));
  assert.ok(page.includes('<div class="alert alert-success">Answer &amp; more</div>'));
  assert.ok(page.includes('<div class="metric-value">4.0/5</div>'));
  assert.equal(page.includes("<script>alert(1)"), false);
});

test("reportsPage: an empty log shows zeroed analytics and no history", () => {
  const page = reportsPage({
    recent: [],
    stats: { total: 0, averageResponseTime: 0, averageSatisfaction: 0 },
  });

  assert.equal(page.includes("Recent Conversations"), false);
  assert.ok(page.includes('<div class="metric-value">0.0s</div>'));
});

test("reportsPage: validation messages are shown as warnings", () => {
  const page = reportsPage({
    recent: [],
    stats: { total: 0, averageResponseTime: 0, averageSatisfaction: 0 },
    error: "Please enter a question.",
  });
  assert.ok(page.includes('<div class="alert alert-warning">Please enter a question.</div>'));
});

// --- Anomalies ---

test("anomaliesPage: only the last three alerts are listed", () => {
  const page = anomaliesPage(sampleAnalytics.anomalies, []);

  assert.ok(
    page.includes(
      '<div class="alert alert-warning">🟡 Medium Severity Anomaly - Database Response Time: 134.7ms on 2024-08-04</div>',
    ),
  );
  assert.ok(
    page.includes(
      '<div class="alert alert-error">🔴 High Severity Anomaly - Database Response Time: 168.4ms on 2024-12-30</div>',
    ),
  );
  assert.equal(page.includes("on 2024-01-12"), false);
  assert.ok(page.includes('<div class="metric-value">5</div>'));
});

// --- Pipelines ---

test("pipelinesPage: status table and summary metrics", () => {
  const page = pipelinesPage(sampleAnalytics.pipelines);

  assert.ok(
    page.includes("<tr><td>Sales Analytics Pipeline</td><td>❌ Failed</td><td>0</td><td>179</td></tr>"),
  );
  assert.ok(
    page.includes("<tr><td>Customer Data Pipeline</td><td>✅ Success</td><td>461,782</td><td>107</td></tr>"),
  );
  assert.ok(page.includes('<div class="metric-value">80%</div>'));
  assert.ok(page.includes('<div class="metric-value">1,034,466</div>'));
});
