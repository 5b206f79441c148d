export type ReachwatchErrorCode =
  | "SOURCE_NOT_FOUND"
  | "EMPTY_TARGET_LIST"
  | "CONFIGURATION"
  | "PERSISTENCE"
  | "JOB_EXECUTION"
  | "SHUTDOWN_TIMEOUT"
  | "COLLABORATOR_TIMEOUT";

export class ReachwatchError extends Error {
  readonly code: ReachwatchErrorCode;

  constructor(code: ReachwatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SourceNotFoundError extends ReachwatchError {
  readonly tried: string[];

  constructor(source: string, tried: string[] = [], options?: { cause?: unknown }) {
    const suffix = tried.length > 0 ? ` (tried: ${tried.join(", ")})` : "";
    super("SOURCE_NOT_FOUND", `Target source "${source}" was not found${suffix}.`, options);
    this.tried = tried;
  }
}

export class EmptyTargetListError extends ReachwatchError {
  constructor(source: string) {
    super("EMPTY_TARGET_LIST", `Target source "${source}" contains no targets.`);
  }
}

export class ConfigurationError extends ReachwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
  }
}

export class PersistenceError extends ReachwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE", message, options);
  }
}

export class JobExecutionError extends ReachwatchError {
  readonly jobName: string;

  constructor(jobName: string, cause: unknown) {
    super("JOB_EXECUTION", `Job "${jobName}" failed: ${errorMessage(cause)}`, { cause });
    this.jobName = jobName;
  }
}

export class ShutdownTimeoutError extends ReachwatchError {
  readonly pendingJobs: string[];

  constructor(graceMs: number, pendingJobs: string[]) {
    super(
      "SHUTDOWN_TIMEOUT",
      `Shutdown grace period of ${graceMs}ms expired with running jobs: ${pendingJobs.join(", ")}.`
    );
    this.pendingJobs = pendingJobs;
  }
}

export class CollaboratorTimeoutError extends ReachwatchError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("COLLABORATOR_TIMEOUT", `No answer within ${timeoutMs}ms.`);
    this.timeoutMs = timeoutMs;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isStartupError = (error: unknown): error is ReachwatchError =>
  error instanceof SourceNotFoundError ||
  error instanceof EmptyTargetListError ||
  error instanceof ConfigurationError;
