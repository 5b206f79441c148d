import { EmptyTargetListError } from "../lib/errors";
import { summarizeBatch } from "../probe/probe-engine";
import { forwardBatch, type ForwardOutcome } from "../run-log/result-store";
import type { RunLogFiles } from "../run-log/run-log-writer";
import { tagTargets } from "../targets/target-loader";
import { createTargetSource } from "../targets/target-source";
import type { BatchSummary, ProbeBatch, ProbeParameters, TargetSourceDescriptor } from "../types";
import type { RuntimeContext } from "./context";

export interface RunRequest {
  jobName?: string;
  source: TargetSourceDescriptor;
  parameters: ProbeParameters;
}

export interface RunReport {
  batch: ProbeBatch;
  summary: BatchSummary;
  files: RunLogFiles;
  store?: ForwardOutcome;
}

/**
 * One complete run: load targets, probe them, write the run logs and hand the
 * batch to the result store when one is configured.
 */
export const executeRun = async (
  context: RuntimeContext,
  { jobName, source, parameters }: RunRequest,
  signal?: AbortSignal
): Promise<RunReport> => {
  const targetSource = createTargetSource(source, {
    baseDir: context.baseDir,
    inventory: context.inventory,
    timeoutMs: context.collaboratorTimeoutMs
  });
  const loaded = await targetSource.load(signal);

  if (loaded.targets.length === 0) {
    throw new EmptyTargetListError(targetSource.description);
  }

  const targets = jobName ? tagTargets(loaded.targets, jobName) : loaded.targets;
  const batch = await context.engine.run(targets, parameters, {
    ...(jobName ? { jobName } : {}),
    invalid: loaded.invalid,
    ...(signal ? { signal } : {})
  });

  const files = await context.writer.write(batch);
  const summary = summarizeBatch(batch);

  if (!context.resultStore) {
    return { batch, summary, files };
  }

  const store = await forwardBatch(context.resultStore, batch, {
    batchSize: context.storeBatchSize,
    timeoutMs: context.collaboratorTimeoutMs,
    ...(signal ? { signal } : {}),
    logger: context.logger
  });
  return { batch, summary, files, store };
};
