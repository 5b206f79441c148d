import { z } from "zod";
import { ConfigurationError, errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type {
  BatchSummary,
  InvalidTarget,
  PingOutcome,
  ProbeBatch,
  ProbeParameters,
  ProbeResult,
  Target
} from "../types";
import type { Pinger } from "./system-pinger";
import { runPool } from "./worker-pool";

export const defaultProbeParameters: ProbeParameters = {
  timeoutSeconds: 3,
  count: 1,
  workers: 10
};

export const probeParameterLimits = {
  maxTimeoutSeconds: 300,
  maxCount: 100,
  maxWorkers: 1000
} as const;

const probeParametersSchema = z.object({
  timeoutSeconds: z.number().positive().max(probeParameterLimits.maxTimeoutSeconds),
  count: z.number().int().min(1).max(probeParameterLimits.maxCount),
  workers: z.number().int().min(1).max(probeParameterLimits.maxWorkers)
});

export const validateProbeParameters = (parameters: ProbeParameters): ProbeParameters => {
  const parsed = probeParametersSchema.safeParse(parameters);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid probe parameters: ${issue.path.join(".")} ${issue.message}`);
  }
  return parsed.data;
};

export interface ProbeRunOptions {
  jobName?: string;
  invalid?: InvalidTarget[];
  signal?: AbortSignal;
}

export interface ProbeEngineOptions {
  pinger: Pinger;
  logger: Logger;
  now?: () => Date;
}

export const toProbeResult = (target: Target, outcome: PingOutcome, completedAt: Date): ProbeResult => {
  const base = {
    target: target.identifier,
    ...(target.label ? { label: target.label } : {}),
    completedAt: completedAt.toISOString()
  };

  if (outcome.reachable) {
    return { ...base, success: true, latencyMs: outcome.latencyMs };
  }

  return {
    ...base,
    success: false,
    reason: outcome.reason,
    ...(outcome.detail ? { detail: outcome.detail } : {})
  };
};

export class ProbeEngine {
  private readonly pinger: Pinger;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor({ pinger, logger, now = () => new Date() }: ProbeEngineOptions) {
    this.pinger = pinger;
    this.logger = logger.child({ component: "probe-engine" });
    this.now = now;
  }

  async run(targets: Target[], parameters: ProbeParameters, options: ProbeRunOptions = {}): Promise<ProbeBatch> {
    const validated = validateProbeParameters(parameters);
    const timestamp = this.now();
    const startedAt = Date.now();

    this.logger.debug(
      { job: options.jobName, targets: targets.length, ...validated },
      "probe batch started"
    );

    const results = await runPool(targets, validated.workers, (target) =>
      this.probeTarget(target, validated, options.signal)
    );

    const batch: ProbeBatch = {
      timestamp,
      ...(options.jobName ? { jobName: options.jobName } : {}),
      parameters: validated,
      results,
      invalid: options.invalid ?? [],
      durationMs: Date.now() - startedAt
    };

    this.logger.debug({ job: options.jobName, ...summarizeBatch(batch) }, "probe batch finished");
    return batch;
  }

  private async probeTarget(target: Target, parameters: ProbeParameters, signal?: AbortSignal): Promise<ProbeResult> {
    let outcome: PingOutcome;

    try {
      outcome = await this.pinger.probe(target.identifier, {
        timeoutSeconds: parameters.timeoutSeconds,
        count: parameters.count,
        ...(signal ? { signal } : {})
      });
    } catch (error) {
      outcome = { reachable: false, reason: "tool-error", detail: errorMessage(error) };
    }

    const result = toProbeResult(target, outcome, this.now());
    this.logger.trace({ result }, "probe finished");
    return result;
  }
}

export const summarizeBatch = (batch: ProbeBatch): BatchSummary => {
  const reachable = batch.results.filter((result) => result.success).length;

  return {
    total: batch.results.length,
    reachable,
    unreachable: batch.results.length - reachable,
    invalid: batch.invalid.length,
    durationMs: batch.durationMs
  };
};

export const isAllReachable = (batch: ProbeBatch): boolean => batch.results.every((result) => result.success);
