import { formatSuccessRate } from "../analysis/history-analyzer";
import { formatLatency } from "../run-log/run-log-writer";
import type { AnalysisReport, ProbeResult } from "../types";
import type { RunReport } from "./run-job";

const describeResult = (result: ProbeResult): string => {
  const label = result.label ? ` [${result.label}]` : "";

  if (result.success) {
    return `${result.target.padEnd(39)} REACHABLE    ${formatLatency(result.latencyMs)}${label}`;
  }

  const detail = result.detail ? ` (${result.detail})` : "";
  return `${result.target.padEnd(39)} UNREACHABLE  ${result.reason}${detail}${label}`;
};

export const formatRunReport = ({ batch, summary, files, store }: RunReport, verbose: boolean): string[] => {
  const lines: string[] = [];

  if (verbose) {
    batch.results.forEach((result) => lines.push(describeResult(result)));
    batch.invalid.forEach((entry) =>
      lines.push(`${entry.candidate.padEnd(39)} INVALID      line ${entry.lineNumber ?? "?"}: ${entry.rawLine}`)
    );
  }

  lines.push(
    `Results: ${summary.reachable} reachable, ${summary.unreachable} unreachable, ${summary.invalid} invalid ` +
      `(${(summary.durationMs / 1000).toFixed(2)}s)`
  );

  Object.values(files).forEach((file) => lines.push(`Log written: ${file}`));

  if (store) {
    lines.push(`Result store: ${store.saved}/${store.attempted} records saved, ${store.failedChunks} chunks failed`);
  }

  return lines;
};

export const formatAnalysisReport = (report: AnalysisReport, files?: Record<string, string>): string[] => {
  const lines = [
    `Run logs: ${report.successFiles} success files, ${report.failureFiles} failure files`,
    `Targets observed: ${report.records.length}`,
    `  Never responded:     ${report.never.length}`,
    `  Always responded:    ${report.always.length}`,
    `  Sometimes responded: ${report.sometimes.length}`
  ];

  report.sometimes.forEach((record) => {
    lines.push(`    ${record.identifier}\t${formatSuccessRate(record.successRate ?? 0)} (${record.successes}/${record.total})`);
  });

  if (files) {
    Object.values(files).forEach((file) => lines.push(`Written: ${file}`));
  }

  return lines;
};
