import { PRIORITY } from "@triage/shared";
import type { AnalyzerReportView, QueueStatsView, ReviewItemView } from "./client.js";

export function red(s: string) {
  return `\u001b[31m${s}\u001b[0m`;
}
export function green(s: string) {
  return `\u001b[32m${s}\u001b[0m`;
}
export function yellow(s: string) {
  return `\u001b[33m${s}\u001b[0m`;
}
export function dim(s: string) {
  return `\u001b[2m${s}\u001b[0m`;
}

export function priorityLabel(priority: number) {
  if (priority === PRIORITY.high) return "HIGH";
  if (priority === PRIORITY.medium) return "MEDIUM";
  if (priority === PRIORITY.low) return "LOW";
  return `P${priority}`;
}

export function percent(ratio: number) {
  return `${(ratio * 100).toFixed(1)}%`;
}

/** `1h 2m`, `12m 5s` or `4s`. */
export function duration(ms: number) {
  const totalSeconds = Math.round(ms / 1000);
  const h = Math.floor(totalSeconds / 3600);
  const m = Math.floor((totalSeconds % 3600) / 60);
  const s = totalSeconds % 60;
  if (h > 0) return `${h}h ${m}m`;
  if (m > 0) return `${m}m ${s}s`;
  return `${s}s`;
}

export function formatReviewItem(item: ReviewItemView) {
  const columns = [
    priorityLabel(item.priority).padEnd(6),
    item.contentType.padEnd(13),
    item.reason.padEnd(26),
    item.caseRef ?? "-",
  ];
  const claim = item.claimedBy ? `  claimed by ${item.claimedBy} until ${item.leaseExpiresAt ?? "?"}` : "";
  return `${columns.join(" ")}  ${dim(item.id)}${claim}`;
}

export function formatStats(stats: QueueStatsView) {
  return [
    `pending:          ${stats.pendingCount}`,
    `resolved:         ${stats.resolvedCount}`,
    `correction rate:  ${percent(stats.correctionRate)}`,
    `false positives:  ${percent(stats.falsePositiveRate)}`,
    `avg review time:  ${stats.avgReviewLatencyMs === null ? "-" : duration(stats.avgReviewLatencyMs)}`,
  ].join("\n");
}

function colorStatus(status: AnalyzerReportView["status"]) {
  if (status === "HEALTHY") return green(status);
  if (status === "FAILED") return red(status);
  if (status === "DEGRADED") return yellow(status);
  return dim(status);
}

export function formatReport(report: AnalyzerReportView) {
  const flags = [
    report.fixtureMissing ? "fixtures missing" : null,
    report.instabilityFlagged ? "unstable confidence" : null,
  ].filter((f): f is string => f !== null);

  const last = report.history[0];
  const lastRun = last ? `last run ${last.ranAt}: accuracy ${percent(last.accuracy)} over ${last.sampleCount}` : "never run";

  const head = `${report.analyzerId.padEnd(24)} ${colorStatus(report.status)}  x${report.multiplier.toFixed(2)}  ${dim(lastRun)}`;
  return flags.length ? `${head}  ${yellow(`[${flags.join(", ")}]`)}` : head;
}
