import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../lib/errors";
import { defaultProbeParameters, probeParameterLimits } from "../probe/probe-engine";
import { parseCronExpression } from "../scheduler/cron";
import { defaultInventoryQuery } from "../targets/target-source";
import type { JobDefinition, TargetSourceDescriptor } from "../types";

const jobNamePattern = /^[a-zA-Z0-9._-]+$/;

const jobEntrySchema = z
  .object({
    name: z.string().trim().min(1).max(100).regex(jobNamePattern, "job names may only contain letters, digits, '.', '_' and '-'"),
    targetFile: z.string().trim().min(1).optional(),
    query: z.string().trim().min(1).optional(),
    schedule: z.string().trim().min(1),
    timeout: z.number().positive().max(probeParameterLimits.maxTimeoutSeconds).default(defaultProbeParameters.timeoutSeconds),
    count: z.number().int().min(1).max(probeParameterLimits.maxCount).default(defaultProbeParameters.count),
    workers: z.number().int().min(1).max(probeParameterLimits.maxWorkers).default(defaultProbeParameters.workers)
  })
  .strict()
  .refine((entry) => !(entry.targetFile && entry.query), {
    message: "targetFile and query are mutually exclusive",
    path: ["query"]
  });

const scheduleFileSchema = z.object({
  jobs: z.array(z.unknown()).min(1, "at least one job is required")
});

export interface JobConfigIssue {
  index: number;
  name?: string;
  message: string;
}

export interface JobConfigResult {
  jobs: JobDefinition[];
  issues: JobConfigIssue[];
}

const toSource = (entry: { targetFile?: string; query?: string }): TargetSourceDescriptor => {
  if (entry.targetFile) {
    return { kind: "file", path: entry.targetFile };
  }
  return { kind: "query", query: entry.query ?? defaultInventoryQuery };
};

const nameOf = (raw: unknown): string | undefined => {
  if (typeof raw === "object" && raw !== null && "name" in raw && typeof raw.name === "string") {
    return raw.name;
  }
  return undefined;
};

/**
 * Validates a schedule document. Broken jobs are reported in `issues` and left
 * out; only a document with no usable job at all is an error.
 */
export const parseJobConfig = (document: unknown): JobConfigResult => {
  const parsed = scheduleFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid schedule file: ${parsed.error.issues[0]?.message ?? "unknown error"}`);
  }

  const jobs: JobDefinition[] = [];
  const issues: JobConfigIssue[] = [];
  const names = new Set<string>();

  parsed.data.jobs.forEach((raw, index) => {
    const entry = jobEntrySchema.safeParse(raw);
    const name = nameOf(raw);

    if (!entry.success) {
      const issue = entry.error.issues[0];
      issues.push({ index, name, message: `${issue.path.join(".") || "job"}: ${issue.message}` });
      return;
    }

    if (names.has(entry.data.name)) {
      issues.push({ index, name, message: `duplicate job name "${entry.data.name}"` });
      return;
    }

    try {
      parseCronExpression(entry.data.schedule);
    } catch (error) {
      issues.push({ index, name, message: errorMessage(error) });
      return;
    }

    names.add(entry.data.name);
    jobs.push({
      name: entry.data.name,
      source: toSource(entry.data),
      schedule: entry.data.schedule,
      parameters: {
        timeoutSeconds: entry.data.timeout,
        count: entry.data.count,
        workers: entry.data.workers
      }
    });
  });

  if (jobs.length === 0) {
    const details = issues.map((issue) => `#${issue.index + 1}${issue.name ? ` (${issue.name})` : ""}: ${issue.message}`);
    throw new ConfigurationError(`No valid jobs in schedule file. ${details.join("; ")}`.trim());
  }

  return { jobs, issues };
};

export const loadJobConfig = async (filePath: string): Promise<JobConfigResult> => {
  let document: unknown;
  try {
    document = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read schedule file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  return parseJobConfig(document);
};
