import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "../lib/logger";
import { runLogSuffixes } from "../run-log/run-log-writer";
import type { AnalysisReport, Classification, HistoryRecord } from "../types";

export const analysisFileNames: Record<Classification, string> = {
  never: "analysis_never_responded.txt",
  always: "analysis_always_responded.txt",
  sometimes: "analysis_sometimes_responded.txt"
};

const analysisTitles: Record<Classification, string> = {
  never: "Targets that never responded",
  always: "Targets that always responded",
  sometimes: "Targets that sometimes responded"
};

interface Tally {
  successes: number;
  failures: number;
}

const compareIdentifiers = (left: string, right: string): number => (left < right ? -1 : left > right ? 1 : 0);

export const classify = (identifier: string, successes: number, total: number): HistoryRecord => {
  if (successes === total) {
    return { identifier, successes, total, classification: "always" };
  }

  if (successes === 0) {
    return { identifier, successes, total, classification: "never" };
  }

  return {
    identifier,
    successes,
    total,
    classification: "sometimes",
    successRate: (successes / total) * 100
  };
};

export const formatSuccessRate = (rate: number): string => `${rate.toFixed(1)}%`;

/** Identifiers named by one run log; each non-blank line is one observation. */
export const parseRunLogIdentifiers = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"))
    .map((line) => line.split("\t"))
    .filter((columns) => columns.length >= 2 && columns[0].trim().length > 0)
    .map((columns) => columns[0].trim().toLowerCase());

export const buildReport = (
  tallies: Map<string, Tally>,
  files: { successFiles: number; failureFiles: number }
): AnalysisReport => {
  const records = [...tallies.entries()]
    .sort(([left], [right]) => compareIdentifiers(left, right))
    .map(([identifier, tally]) => classify(identifier, tally.successes, tally.successes + tally.failures));

  return {
    ...files,
    records,
    never: records.filter((record) => record.classification === "never"),
    always: records.filter((record) => record.classification === "always"),
    sometimes: records.filter((record) => record.classification === "sometimes")
  };
};

export const renderAnalysisFile = (classification: Classification, records: HistoryRecord[]): string => {
  const header = [`# ${analysisTitles[classification]}`, `# Total: ${records.length}`];
  const lines = records.map((record) =>
    record.successRate !== undefined ? `${record.identifier}\t${formatSuccessRate(record.successRate)}` : record.identifier
  );
  return `${[...header, ...lines].join("\n")}\n`;
};

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export interface HistoryAnalyzerOptions {
  resultsDir: string;
  analysisDir: string;
  logger: Logger;
}

export class HistoryAnalyzer {
  private readonly resultsDir: string;
  private readonly analysisDir: string;
  private readonly logger: Logger;

  constructor({ resultsDir, analysisDir, logger }: HistoryAnalyzerOptions) {
    this.resultsDir = resultsDir;
    this.analysisDir = analysisDir;
    this.logger = logger.child({ component: "history-analyzer" });
  }

  /** Re-derives every classification from the full set of run logs. */
  async analyze(): Promise<AnalysisReport> {
    let entries: string[];
    try {
      entries = (await readdir(this.resultsDir)).sort();
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.warn({ resultsDir: this.resultsDir }, "results directory does not exist");
        return buildReport(new Map(), { successFiles: 0, failureFiles: 0 });
      }
      throw error;
    }

    const successFiles = entries.filter((entry) => entry.endsWith(runLogSuffixes.successful));
    const failureFiles = entries.filter((entry) => entry.endsWith(runLogSuffixes.failed));
    const tallies = new Map<string, Tally>();

    const tally = (identifier: string, succeeded: boolean): void => {
      const current = tallies.get(identifier) ?? { successes: 0, failures: 0 };
      if (succeeded) {
        current.successes += 1;
      } else {
        current.failures += 1;
      }
      tallies.set(identifier, current);
    };

    for (const file of successFiles) {
      (await this.readIdentifiers(file)).forEach((identifier) => tally(identifier, true));
    }
    for (const file of failureFiles) {
      (await this.readIdentifiers(file)).forEach((identifier) => tally(identifier, false));
    }

    this.logger.debug(
      { successFiles: successFiles.length, failureFiles: failureFiles.length, targets: tallies.size },
      "run logs analysed"
    );

    return buildReport(tallies, { successFiles: successFiles.length, failureFiles: failureFiles.length });
  }

  async write(report: AnalysisReport): Promise<Record<Classification, string>> {
    await mkdir(this.analysisDir, { recursive: true });

    const written: Record<Classification, string> = {
      never: path.join(this.analysisDir, analysisFileNames.never),
      always: path.join(this.analysisDir, analysisFileNames.always),
      sometimes: path.join(this.analysisDir, analysisFileNames.sometimes)
    };

    await Promise.all([
      writeFile(written.never, renderAnalysisFile("never", report.never), "utf8"),
      writeFile(written.always, renderAnalysisFile("always", report.always), "utf8"),
      writeFile(written.sometimes, renderAnalysisFile("sometimes", report.sometimes), "utf8")
    ]);

    return written;
  }

  async run(): Promise<{ report: AnalysisReport; files: Record<Classification, string> }> {
    const report = await this.analyze();
    const files = await this.write(report);
    return { report, files };
  }

  private async readIdentifiers(file: string): Promise<string[]> {
    try {
      return parseRunLogIdentifiers(await readFile(path.join(this.resultsDir, file), "utf8"));
    } catch (error) {
      this.logger.warn({ err: error, file }, "skipping unreadable run log");
      return [];
    }
  }
}
