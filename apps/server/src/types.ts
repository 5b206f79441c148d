export interface Target {
  identifier: string;
  label?: string;
  jobName?: string;
}

export interface InvalidTarget {
  candidate: string;
  rawLine: string;
  lineNumber?: number;
}

export interface TargetEntry {
  identifier: string;
  label?: string;
}

export interface LoadedTargets {
  targets: Target[];
  invalid: InvalidTarget[];
}

export interface ProbeParameters {
  timeoutSeconds: number;
  count: number;
  workers: number;
}

export type FailureReason = "timeout" | "unreachable" | "resolution-failure" | "tool-error";

export type PingOutcome =
  | { reachable: true; latencyMs: number | null }
  | { reachable: false; reason: FailureReason; detail?: string };

interface ProbeResultBase {
  target: string;
  label?: string;
  completedAt: string;
}

export interface ProbeSuccess extends ProbeResultBase {
  success: true;
  latencyMs: number | null;
}

export interface ProbeFailure extends ProbeResultBase {
  success: false;
  reason: FailureReason;
  detail?: string;
}

export type ProbeResult = ProbeSuccess | ProbeFailure;

export interface ProbeBatch {
  timestamp: Date;
  jobName?: string;
  parameters: ProbeParameters;
  results: ProbeResult[];
  invalid: InvalidTarget[];
  durationMs: number;
}

export type TargetSourceDescriptor = { kind: "file"; path: string } | { kind: "query"; query: string };

export interface JobDefinition {
  name: string;
  source: TargetSourceDescriptor;
  schedule: string;
  parameters: ProbeParameters;
}

export type JobOutcome = "completed" | "failed";

export interface JobSnapshot {
  name: string;
  schedule: string;
  source: TargetSourceDescriptor;
  parameters: ProbeParameters;
  running: boolean;
  runs: number;
  dropped: number;
  lastStartedAt?: string;
  lastRunAt?: string;
  lastOutcome?: JobOutcome;
  lastError?: string;
  lastSummary?: BatchSummary;
  nextRunAt?: string;
}

export interface BatchSummary {
  total: number;
  reachable: number;
  unreachable: number;
  invalid: number;
  durationMs: number;
}

export type Classification = "always" | "never" | "sometimes";

export interface HistoryRecord {
  identifier: string;
  successes: number;
  total: number;
  classification: Classification;
  successRate?: number;
}

export interface AnalysisReport {
  successFiles: number;
  failureFiles: number;
  records: HistoryRecord[];
  never: HistoryRecord[];
  always: HistoryRecord[];
  sometimes: HistoryRecord[];
}
