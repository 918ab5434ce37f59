// HTML building blocks shared by every page. All text that reaches the
// markup goes through escapeHtml first.

import type { DashboardChart } from "./charts.ts";

const ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (c) => ENTITIES[c] ?? c);
}

/** JSON that is safe inside an inline <script> element. */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026");
}

// --- Widgets ---

export function chartBlock(id: string, config: DashboardChart, height = 400): string {
  return [
    `<div class="chart" style="height:${height}px"><canvas id="${escapeHtml(id)}"></canvas></div>`,
    `<script>new Chart(document.getElementById(${scriptJson(id)}), ${scriptJson(config)});</script>`,
  ].join("\n");
}

export function metricCard(label: string, value: string, delta?: string): string {
  const deltaHtml =
    delta === undefined ? "" : `<div class="metric-delta">${escapeHtml(delta)}</div>`;
  return `<div class="metric"><div class="metric-label">${escapeHtml(label)}</div><div class="metric-value">${escapeHtml(value)}</div>${deltaHtml}</div>`;
}

export function metricRow(cards: readonly string[]): string {
  return `<div class="metrics">${cards.join("")}</div>`;
}

export type AlertKind = "info" | "success" | "warning" | "error";

export function alertBox(kind: AlertKind, text: string): string {
  return `<div class="alert alert-${kind}">${escapeHtml(text)}</div>`;
}

// --- Page frame ---

export type Section = "market" | "executive" | "reports" | "anomalies" | "pipelines";

export const NAVIGATION: readonly { section: Section; path: string; label: string }[] = [
  { section: "market", path: "/market", label: "📈 Market Data" },
  { section: "executive", path: "/executive", label: "📊 Executive Dashboard" },
  { section: "reports", path: "/reports", label: "💬 Conversational Reports" },
  { section: "anomalies", path: "/anomalies", label: "🔍 Anomaly Detection" },
  { section: "pipelines", path: "/pipelines", label: "⚙️ ETL Pipelines" },
];

const STYLE = `
body{font-family:system-ui,sans-serif;margin:0;background:#f8fafc;color:#111827}
header{background:linear-gradient(90deg,#1e3a8a,#3b82f6);padding:1.5rem 2rem}
header h1{color:#fff;margin:0}header p{color:#d1d5db;margin:0}
nav{display:flex;gap:1rem;padding:.75rem 2rem;background:#fff;border-bottom:1px solid #e5e7eb}
nav a{color:#374151;text-decoration:none}nav a.active{font-weight:700;color:#1d4ed8}
main{padding:1rem 2rem;max-width:1200px}
.metrics{display:flex;flex-wrap:wrap;gap:1rem;margin:1rem 0}
.metric{background:#fff;border:1px solid #e5e7eb;border-radius:8px;padding:1rem;min-width:200px}
.metric-label{color:#6b7280;font-size:.85rem}.metric-value{font-size:1.6rem;font-weight:600}
.metric-delta{color:#059669;font-size:.85rem}
.alert{padding:.75rem 1rem;border-radius:6px;margin:.5rem 0}
.alert-info{background:#dbeafe}.alert-success{background:#d1fae5}
.alert-warning{background:#fef3c7}.alert-error{background:#fee2e2}
.badge{display:inline-block;padding:2px 8px;border-radius:6px;font-size:.8rem}
.badge-demo{background:#fef3c7;color:#92400e}.badge-live{background:#d1fae5;color:#065f46}
.chart{position:relative;margin:1rem 0}
table{border-collapse:collapse;width:100%;background:#fff}
th,td{border:1px solid #e5e7eb;padding:.5rem;text-align:left}
footer{text-align:center;color:#6b7280;padding:1rem;border-top:1px solid #e5e7eb}
`;

export function layout(title: string, active: Section, body: string): string {
  const links = NAVIGATION.map(
    (n) =>
      `<a href="${n.path}"${n.section === active ? ' class="active"' : ""}>${escapeHtml(n.label)}</a>`,
  ).join("");

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} · AI Analytics Engine</title>
<style>${STYLE}</style>
<script src="/assets/chart.js"></script>
</head>
<body>
<header><h1>🤖 AI Analytics Engine</h1><p>Real-time executive insights and conversational reporting</p></header>
<nav>${links}</nav>
<main>
<h2>${escapeHtml(title)}</h2>
${body}
</main>
<footer><p>🤖 AI Analytics Engine</p><p>Real-time Insights • Conversational AI • 92% Anomaly Detection Accuracy</p></footer>
</body>
</html>
`;
}
