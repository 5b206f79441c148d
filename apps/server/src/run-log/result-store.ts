import { defaultCollaboratorTimeoutMs, withDeadline } from "../lib/abort";
import { PersistenceError, errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { FailureReason, ProbeBatch } from "../types";

export interface StoredProbeRecord {
  target: string;
  label?: string;
  success: boolean;
  latencyMs?: number | null;
  reason?: FailureReason;
  detail?: string;
  completedAt: string;
  jobName?: string;
  batchTimestamp: string;
  timeoutSeconds: number;
  count: number;
}

/**
 * External, best-effort home for probe results. The run log files stay the
 * system of record; a store may fail on any call. `signal` aborts on timeout
 * or shutdown.
 */
export interface ResultStore {
  save(records: StoredProbeRecord[], signal?: AbortSignal): Promise<void>;
  close?(): Promise<void>;
}

export const toStoredRecords = (batch: ProbeBatch): StoredProbeRecord[] =>
  batch.results.map((result) => ({
    target: result.target,
    ...(result.label ? { label: result.label } : {}),
    success: result.success,
    ...(result.success
      ? { latencyMs: result.latencyMs }
      : { reason: result.reason, ...(result.detail ? { detail: result.detail } : {}) }),
    completedAt: result.completedAt,
    ...(batch.jobName ? { jobName: batch.jobName } : {}),
    batchTimestamp: batch.timestamp.toISOString(),
    timeoutSeconds: batch.parameters.timeoutSeconds,
    count: batch.parameters.count
  }));

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}.`);
  }

  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
};

export interface ForwardOptions {
  batchSize?: number;
  retries?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  logger: Logger;
}

export interface ForwardOutcome {
  attempted: number;
  saved: number;
  failedChunks: number;
}

export const defaultStoreBatchSize = 50;

/**
 * Sends a batch to the store chunk by chunk. Never throws on store failures.
 * Each call is cut off after `timeoutMs`; once `signal` aborts, the chunks
 * left are counted as failed without being sent.
 */
export const forwardBatch = async (
  store: ResultStore,
  batch: ProbeBatch,
  {
    batchSize = defaultStoreBatchSize,
    retries = 1,
    timeoutMs = defaultCollaboratorTimeoutMs,
    signal,
    logger
  }: ForwardOptions
): Promise<ForwardOutcome> => {
  const records = toStoredRecords(batch);
  const outcome: ForwardOutcome = { attempted: records.length, saved: 0, failedChunks: 0 };
  const groups = chunk(records, batchSize);

  for (const [index, group] of groups.entries()) {
    if (signal?.aborted) {
      outcome.failedChunks += groups.length - index;
      logger.warn({ job: batch.jobName, skippedChunks: groups.length - index }, "result store forwarding cancelled");
      break;
    }

    let lastError: unknown;
    let saved = false;

    for (let attempt = 0; attempt <= retries && !saved && !signal?.aborted; attempt += 1) {
      try {
        await withDeadline((callSignal) => store.save(group, callSignal), { timeoutMs, signal });
        saved = true;
      } catch (error) {
        lastError = error;
      }
    }

    if (saved) {
      outcome.saved += group.length;
      continue;
    }

    outcome.failedChunks += 1;
    const failure = new PersistenceError(
      `Result store rejected chunk ${index + 1} (${group.length} records): ${errorMessage(lastError)}`,
      { cause: lastError }
    );
    logger.warn({ err: failure, job: batch.jobName }, "result store write failed");
  }

  return outcome;
};

export class HttpResultStore implements ResultStore {
  constructor(
    private readonly url: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async save(records: StoredProbeRecord[], signal?: AbortSignal): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json"
      },
      body: JSON.stringify({ records }),
      signal
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new PersistenceError(`Result store answered HTTP ${response.status}${errorText ? `: ${errorText.slice(0, 200)}` : ""}`);
    }
  }
}
