import type { FileHandle } from "node:fs/promises";
import { mkdir, open, unlink } from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "../lib/logger";
import type { ProbeBatch, ProbeResult } from "../types";

export type RunLogCategory = "successful" | "failed" | "invalid";

export type RunLogFiles = Partial<Record<RunLogCategory, string>>;

export const runLogCategories: readonly RunLogCategory[] = ["successful", "failed", "invalid"];

export const runLogSuffixes: Record<RunLogCategory, string> = {
  successful: "_successful.txt",
  failed: "_failed.txt",
  invalid: "_invalid.txt"
};

const maxStemAttempts = 100;

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/** `YYYYMMDD_HHMMSS_mmm` in local time. */
export const formatRunStamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}_${pad(date.getMilliseconds(), 3)}`;

const sanitizeJobName = (jobName: string): string => jobName.replace(/[^A-Za-z0-9_-]+/g, "-");

export const runLogStem = (batch: Pick<ProbeBatch, "timestamp" | "jobName">): string => {
  const stamp = formatRunStamp(batch.timestamp);
  return batch.jobName ? `${stamp}_${sanitizeJobName(batch.jobName)}` : stamp;
};

const cleanField = (value: string): string => value.replace(/[\t\r\n]+/g, " ").trim();

export const formatLatency = (latencyMs: number | null): string =>
  latencyMs === null ? "N/A" : `${Number(latencyMs.toFixed(3))}ms`;

const withLabel = (fields: string[], label?: string): string =>
  (label ? [...fields, cleanField(label)] : fields).join("\t");

export const formatResultLine = (result: ProbeResult): string => {
  if (result.success) {
    return withLabel([result.target, "SUCCESS", formatLatency(result.latencyMs)], result.label);
  }

  const detail = result.detail ? `${result.reason}: ${cleanField(result.detail)}` : result.reason;
  return withLabel([result.target, "FAILED", detail], result.label);
};

export const buildRunLogContents = (batch: ProbeBatch): Record<RunLogCategory, string[]> => ({
  successful: batch.results.filter((result) => result.success).map(formatResultLine),
  failed: batch.results.filter((result) => !result.success).map(formatResultLine),
  invalid: batch.invalid.map((entry) => [cleanField(entry.candidate), "INVALID", cleanField(entry.rawLine)].join("\t"))
});

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EEXIST";

export interface RunLogWriterOptions {
  resultsDir: string;
  logger: Logger;
}

export class RunLogWriter {
  private readonly resultsDir: string;
  private readonly logger: Logger;

  constructor({ resultsDir, logger }: RunLogWriterOptions) {
    this.resultsDir = resultsDir;
    this.logger = logger.child({ component: "run-log-writer" });
  }

  async write(batch: ProbeBatch): Promise<RunLogFiles> {
    const contents = buildRunLogContents(batch);
    const categories = runLogCategories.filter((category) => contents[category].length > 0);

    if (categories.length === 0) {
      return {};
    }

    await mkdir(this.resultsDir, { recursive: true });
    const baseStem = runLogStem(batch);

    for (let attempt = 0; attempt < maxStemAttempts; attempt += 1) {
      const stem = attempt === 0 ? baseStem : `${baseStem}-${attempt}`;
      const handles = await this.reserve(stem, categories);
      if (!handles) {
        continue;
      }

      const files: RunLogFiles = {};
      try {
        for (const [category, handle] of handles) {
          await handle.writeFile(`${contents[category].join("\n")}\n`, "utf8");
          files[category] = this.filePath(stem, category);
        }
      } finally {
        await Promise.all([...handles.values()].map((handle) => handle.close()));
      }

      this.logger.debug({ job: batch.jobName, files }, "run logs written");
      return files;
    }

    throw new Error(`Could not find a free run log name for ${baseStem} in ${this.resultsDir}.`);
  }

  private filePath(stem: string, category: RunLogCategory): string {
    return path.join(this.resultsDir, `${stem}${runLogSuffixes[category]}`);
  }

  /**
   * Creates every file of a run with exclusive-create. If any name is taken the
   * files created so far are removed and `null` is returned.
   */
  private async reserve(stem: string, categories: RunLogCategory[]): Promise<Map<RunLogCategory, FileHandle> | null> {
    const handles = new Map<RunLogCategory, FileHandle>();

    for (const category of categories) {
      try {
        handles.set(category, await open(this.filePath(stem, category), "wx"));
      } catch (error) {
        await Promise.all(
          [...handles.entries()].map(async ([created, handle]) => {
            await handle.close();
            await unlink(this.filePath(stem, created));
          })
        );

        if (isAlreadyExists(error)) {
          return null;
        }
        throw error;
      }
    }

    return handles;
  }
}
