import { setTimeout as delay } from "node:timers/promises";
import { ConfigurationError, JobExecutionError, ShutdownTimeoutError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { BatchSummary, JobDefinition, JobOutcome, JobSnapshot } from "../types";
import { floorToMinute, matchesCron, nextCronMatch, parseCronExpression, type CronExpression } from "./cron";

export type JobRunHandler = (job: JobDefinition, signal: AbortSignal) => Promise<BatchSummary | undefined>;

export type TriggerResult = "started" | "dropped" | "stopped";

export interface JobSchedulerOptions {
  logger: Logger;
  runJob: JobRunHandler;
  tickSeconds?: number;
  now?: () => Date;
  /** Minutes missed by a late tick that are still checked. */
  maxCatchUpMinutes?: number;
  /** How long to wait for cancelled runs once the grace period has expired. */
  forceWaitMs?: number;
}

interface ScheduledJob {
  definition: JobDefinition;
  expression: CronExpression;
  running: boolean;
  runs: number;
  dropped: number;
  lastStartedAt?: Date;
  lastRunAt?: Date;
  lastOutcome?: JobOutcome;
  lastError?: string;
  lastSummary?: BatchSummary;
}

const minuteMs = 60_000;

export class JobScheduler {
  private readonly jobs = new Map<string, ScheduledJob>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly cancellation = new AbortController();
  private readonly logger: Logger;
  private readonly runJob: JobRunHandler;
  private readonly tickMs: number;
  private readonly now: () => Date;
  private readonly maxCatchUpMinutes: number;
  private readonly forceWaitMs: number;

  private timer: NodeJS.Timeout | null = null;
  private lastCheckedMinute: number | null = null;
  private stopping = false;

  constructor(options: JobSchedulerOptions) {
    const tickSeconds = options.tickSeconds ?? 15;
    if (!(tickSeconds > 0 && tickSeconds <= 60)) {
      throw new ConfigurationError(`Scheduler tick must be between 0 and 60 seconds, got ${tickSeconds}.`);
    }

    this.logger = options.logger.child({ component: "scheduler" });
    this.runJob = options.runJob;
    this.tickMs = tickSeconds * 1000;
    this.now = options.now ?? (() => new Date());
    this.maxCatchUpMinutes = options.maxCatchUpMinutes ?? 5;
    this.forceWaitMs = options.forceWaitMs ?? 5000;
  }

  add(definition: JobDefinition): void {
    if (this.jobs.has(definition.name)) {
      throw new ConfigurationError(`Job "${definition.name}" is already registered.`);
    }

    this.jobs.set(definition.name, {
      definition,
      expression: parseCronExpression(definition.schedule),
      running: false,
      runs: 0,
      dropped: 0
    });
  }

  list(): JobSnapshot[] {
    return [...this.jobs.values()].map((job) => this.snapshot(job));
  }

  get(name: string): JobSnapshot | undefined {
    const job = this.jobs.get(name);
    return job ? this.snapshot(job) : undefined;
  }

  get isStopping(): boolean {
    return this.stopping;
  }

  start(): void {
    if (this.timer || this.stopping) {
      return;
    }

    this.lastCheckedMinute = floorToMinute(this.now()).getTime();
    this.timer = setInterval(() => {
      this.tick();
    }, this.tickMs);

    this.jobs.forEach((job) => {
      this.logger.info(
        { job: job.definition.name, schedule: job.definition.schedule, nextRunAt: this.nextRunAt(job) },
        "job scheduled"
      );
    });
  }

  /**
   * Checks every job against the minutes elapsed since the previous tick and
   * fires the due ones. Returns the jobs that actually started.
   */
  tick(at: Date = this.now()): string[] {
    if (this.stopping) {
      return [];
    }

    const current = floorToMinute(at).getTime();
    const previous = this.lastCheckedMinute ?? current - minuteMs;
    if (current <= previous) {
      return [];
    }

    const from = Math.max(previous + minuteMs, current - (this.maxCatchUpMinutes - 1) * minuteMs);
    this.lastCheckedMinute = current;

    const started: string[] = [];
    this.jobs.forEach((job, name) => {
      if (!this.isDue(job.expression, from, current)) {
        return;
      }
      if (this.trigger(name) === "started") {
        started.push(name);
      }
    });

    return started;
  }

  /** Fires a job now. A job that is still running drops the fire. */
  trigger(name: string): TriggerResult {
    const job = this.jobs.get(name);
    if (!job) {
      throw new ConfigurationError(`Unknown job "${name}".`);
    }

    if (this.stopping) {
      return "stopped";
    }

    if (job.running) {
      job.dropped += 1;
      this.logger.warn({ job: name }, "job still running, fire dropped");
      return "dropped";
    }

    job.running = true;
    job.runs += 1;
    job.lastStartedAt = this.now();

    const run = this.execute(job).finally(() => {
      this.inFlight.delete(name);
    });
    this.inFlight.set(name, run);

    return "started";
  }

  /** Resolves once no job is running. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  /**
   * Stops firing and waits for running jobs. When the grace period expires the
   * running probes are cancelled and a ShutdownTimeoutError is thrown.
   */
  async stop(graceMs: number): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.inFlight.size === 0) {
      return;
    }

    this.logger.info({ running: [...this.inFlight.keys()], graceMs }, "waiting for running jobs");

    const grace = new AbortController();
    const finished = await Promise.race([
      this.whenIdle().then(() => true),
      delay(graceMs, false, { signal: grace.signal }).catch(() => false)
    ]);
    grace.abort();

    if (finished) {
      return;
    }

    const pending = [...this.inFlight.keys()];
    this.logger.warn({ pending }, "grace period expired, cancelling running probes");
    this.cancellation.abort();

    const force = new AbortController();
    await Promise.race([
      this.whenIdle(),
      delay(this.forceWaitMs, undefined, { signal: force.signal }).catch(() => undefined)
    ]);
    force.abort();

    throw new ShutdownTimeoutError(graceMs, pending);
  }

  private async execute(job: ScheduledJob): Promise<void> {
    const { name } = job.definition;
    this.logger.info({ job: name }, "job started");

    try {
      const summary = await this.runJob(job.definition, this.cancellation.signal);
      job.lastOutcome = "completed";
      job.lastError = undefined;
      if (summary) {
        job.lastSummary = summary;
      }
      this.logger.info({ job: name, summary }, "job completed");
    } catch (error) {
      const failure = new JobExecutionError(name, error);
      job.lastOutcome = "failed";
      job.lastError = failure.message;
      this.logger.error({ err: failure, job: name }, "job failed");
    } finally {
      job.running = false;
      job.lastRunAt = this.now();
    }
  }

  private isDue(expression: CronExpression, from: number, to: number): boolean {
    for (let minute = from; minute <= to; minute += minuteMs) {
      if (matchesCron(expression, new Date(minute))) {
        return true;
      }
    }
    return false;
  }

  private nextRunAt(job: ScheduledJob): string | undefined {
    return nextCronMatch(job.expression, this.now())?.toISOString();
  }

  private snapshot(job: ScheduledJob): JobSnapshot {
    const nextRunAt = this.stopping ? undefined : this.nextRunAt(job);

    return {
      name: job.definition.name,
      schedule: job.definition.schedule,
      source: job.definition.source,
      parameters: job.definition.parameters,
      running: job.running,
      runs: job.runs,
      dropped: job.dropped,
      ...(job.lastStartedAt ? { lastStartedAt: job.lastStartedAt.toISOString() } : {}),
      ...(job.lastRunAt ? { lastRunAt: job.lastRunAt.toISOString() } : {}),
      ...(job.lastOutcome ? { lastOutcome: job.lastOutcome } : {}),
      ...(job.lastError ? { lastError: job.lastError } : {}),
      ...(job.lastSummary ? { lastSummary: job.lastSummary } : {}),
      ...(nextRunAt ? { nextRunAt } : {})
    };
  }
}
