import { summariseResults } from "../orchestrator/analytics.js";
import type { RunResult, SuiteResult } from "../orchestrator/types.js";
import { buildJsonReport, type ReportMeta } from "./json.js";

export function generateHtmlReport(suite: SuiteResult, meta: ReportMeta = {}): string {
  const stats = summariseResults(suite.results);
  const versionLabel = meta.version ? ` — ${esc(meta.version)}` : "";
  const count = (status: string): number => suite.runs.filter((r) => r.status === status).length;

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Botrun Report${versionLabel}</title>
<style>
*{box-sizing:border-box;margin:0;padding:0}
body{font-family:-apple-system,BlinkMacSystemFont,"Segoe UI",sans-serif;background:#f8f9fa;color:#212529;padding:2rem;max-width:1200px;margin:0 auto}
.header{margin-bottom:2rem}
.header h1{font-size:1.5rem;font-weight:600}
.header .meta{color:#6c757d;font-size:.875rem;margin-top:.25rem}
.summary{display:flex;gap:1rem;margin-bottom:2rem;flex-wrap:wrap}
.stat{background:#fff;border-radius:8px;padding:1rem 1.5rem;border:1px solid #dee2e6;min-width:120px}
.stat .value{font-size:1.5rem;font-weight:700}
.stat .label{color:#6c757d;font-size:.75rem;text-transform:uppercase;letter-spacing:.05em}
.passed{color:#198754}
.failed{color:#dc3545}
.aborted{color:#6f42c1}
.skipped{color:#b58105}
table{width:100%;background:#fff;border-radius:8px;border-collapse:collapse;border:1px solid #dee2e6;margin-bottom:2rem}
th{text-align:left;padding:.75rem 1rem;border-bottom:2px solid #dee2e6;font-size:.875rem;color:#6c757d}
td{padding:.75rem 1rem;border-bottom:1px solid #dee2e6;font-size:.875rem}
tr:last-child td{border-bottom:none}
.run-detail{background:#fff;border:1px solid #dee2e6;border-radius:8px;padding:1rem;margin-bottom:1rem}
.run-detail summary{cursor:pointer;font-weight:600;font-size:.95rem;padding:.25rem 0}
.item{font-size:.8rem;padding:.35rem .5rem;margin:.25rem 0;border-radius:4px;background:#f8f9fa}
.item.ok{border-left:3px solid #198754}
.item.bad{border-left:3px solid #dc3545}
pre{font-size:.75rem;background:#f1f3f5;padding:.5rem;border-radius:4px;overflow-x:auto;white-space:pre-wrap}
</style>
</head>
<body>
<div class="header">
  <h1>Botrun Test Report</h1>
  <div class="meta">Generated ${new Date().toISOString()}${meta.version ? ` | Version: ${esc(meta.version)}` : ""} | Duration: ${fmtDur(suite.durationMs)} | Status: <span class="${suite.status}">${suite.status.toUpperCase()}</span></div>
</div>
<div class="summary">
  <div class="stat"><div class="value">${suite.runs.length}</div><div class="label">Runs</div></div>
  <div class="stat"><div class="value passed">${count("passed")}</div><div class="label">Passed</div></div>
  <div class="stat"><div class="value failed">${count("failed")}</div><div class="label">Failed</div></div>
  <div class="stat"><div class="value skipped">${count("skipped")}</div><div class="label">Skipped</div></div>
  <div class="stat"><div class="value">${Math.round(stats.successRate * 100)}%</div><div class="label">Attempt success</div></div>
  <div class="stat"><div class="value">${stats.retries}</div><div class="label">Retries</div></div>
</div>
<table>
  <thead><tr><th>Run</th><th>Result</th><th>Iteration</th><th>Attempt</th><th>Assertions</th><th>Duration</th></tr></thead>
  <tbody>
${suite.results
  .map(
    (r) => `    <tr>
      <td>${esc(r.description)}</td>
      <td class="${r.status}">${r.status.toUpperCase()}</td>
      <td>${r.iteration}</td>
      <td>${r.attempt}</td>
      <td>${r.assertions.filter((a) => a.passed).length}/${r.assertions.length}</td>
      <td>${fmtDur(r.durationMs)}</td>
    </tr>`
  )
  .join("\n")}
  </tbody>
</table>
<h2 style="margin:1.5rem 0 1rem;font-size:1.2rem">Run Details</h2>
${suite.results.map(renderDetail).join("\n")}
<script>window.__BOTRUN_DATA__=${safeJson(buildJsonReport(suite, meta))};</script>
</body>
</html>`;
}

function esc(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

/** JSON that cannot close the surrounding script element. */
function safeJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

function fmtDur(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function renderDetail(r: RunResult): string {
  const expectations = [...r.serverExpectations, ...r.clientExpectations]
    .map(
      (e) =>
        `<div class="item ${e.matched ? "ok" : "bad"}"><strong>[${esc(e.source)}]</strong> ${esc(e.name)} — ${e.observed}/${e.required}</div>`
    )
    .join("\n    ");
  const assertions = r.assertions
    .map(
      (a) =>
        `<div class="item ${a.passed ? "ok" : "bad"}"><strong>[${esc(a.type)}]</strong> ${esc(a.name)}: ${a.actual}${a.message ? ` — ${esc(a.message)}` : ""}</div>`
    )
    .join("\n    ");
  const clients = r.clients
    .map(
      (c) =>
        `<div class="item ${c.status === "completed" ? "ok" : "bad"}"><strong>${esc(c.client)}</strong> ${c.status}${c.error ? ` — ${esc(c.error)}` : ""}${c.playbackLogPath ? `<br>playback: ${esc(c.playbackLogPath)}` : ""}</div>`
    )
    .join("\n    ");
  const failures = r.failures
    .map((f) => `<div class="item bad">[${f.category}] ${esc(f.subject)}: ${esc(f.message)}</div>`)
    .join("\n    ");
  const excerpt = r.serverLogExcerpt ? `<h4>Server log</h4><pre>${esc(r.serverLogExcerpt)}</pre>` : "";

  return `<details class="run-detail">
  <summary class="${r.status}">${r.status.toUpperCase()} — ${esc(r.description)}${r.attempt > 1 ? ` (attempt ${r.attempt})` : ""}</summary>
  ${r.skipReason ? `<div class="item">${esc(r.skipReason)}</div>` : ""}
  ${clients}
  ${expectations}
  ${assertions}
  ${failures}
  ${excerpt}
</details>`;
}
