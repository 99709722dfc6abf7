import type { RunSummary } from "../core/phase.js";
import type { PreflightReport } from "../phases/preflight.js";

function pad(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) row.forEach((cell, i) => (widths[i] = Math.max(widths[i] ?? 0, cell.length)));
  return rows.map((row) => row.map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i]))).join("  "));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const s = Math.round(ms / 1000);
  return s < 60 ? `${s}s` : `${Math.floor(s / 60)}m${String(s % 60).padStart(2, "0")}s`;
}

export function formatTable(header: string[], rows: string[][]): string[] {
  return pad([header, ...rows]);
}

export function renderSummary(summary: RunSummary): string[] {
  const lines = formatTable(
    ["PHASE", "OUTCOME", "DURATION"],
    summary.outcomes.map((o) => [o.phase, o.status, formatDuration(o.durationMs)]),
  );
  if (summary.success) lines.push("Deployment completed.");
  else if (summary.interrupted) lines.push(`Interrupted at ${summary.failedPhase ?? "unknown phase"}.`);
  else lines.push(`Deployment failed at ${summary.failedPhase ?? "unknown phase"}.`);
  return lines;
}

export function renderPreflight(report: PreflightReport): string[] {
  const lines = formatTable(
    ["CHECK", "RESULT", "MESSAGE"],
    report.checks.map((c) => [c.name, c.ok ? "pass" : c.severity === "warning" ? "warn" : "FAIL", c.message]),
  );
  lines.push(report.ok ? "Environment OK." : "Environment validation failed.");
  return lines;
}
