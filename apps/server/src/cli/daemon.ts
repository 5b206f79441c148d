#!/usr/bin/env node
import type { Server } from "node:http";
import { parseArgs } from "node:util";
import { loadJobConfig, type JobConfigResult } from "../config/job-config";
import { errorMessage, ShutdownTimeoutError } from "../lib/errors";
import { createStatusApp, listenStatusApp } from "../http/status-app";
import { executeRun } from "../runtime/run-job";
import { JobScheduler } from "../scheduler/job-scheduler";
import { resolveSourcePath } from "../targets/source-resolver";
import { bootstrap, runMain } from "./bootstrap";

const closeServer = (server: Server | undefined): Promise<void> =>
  new Promise((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
  });

const main = async (): Promise<number> => {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: { config: { type: "string", short: "c" } }
  });

  const { env, logger, context } = await bootstrap("reachwatch-daemon");
  let schedulePath: string;
  let loaded: JobConfigResult;
  try {
    schedulePath = resolveSourcePath(values.config ?? env.REACHWATCH_SCHEDULE_FILE, { baseDir: context.baseDir });
    loaded = await loadJobConfig(schedulePath);
  } catch (error) {
    logger.error({ err: error }, "daemon could not start");
    await context.close();
    return 2;
  }

  const { jobs, issues } = loaded;

  issues.forEach((issue) => {
    logger.error({ job: issue.name, index: issue.index }, `skipping job: ${issue.message}`);
  });

  const scheduler = new JobScheduler({
    logger,
    tickSeconds: env.SCHEDULER_TICK_SECONDS,
    runJob: async (job, signal) => {
      const report = await executeRun(
        context,
        { jobName: job.name, source: job.source, parameters: job.parameters },
        signal
      );
      return report.summary;
    }
  });

  jobs.forEach((job) => scheduler.add(job));
  logger.info({ jobs: jobs.length, schedule: schedulePath }, "daemon starting");
  scheduler.start();

  let server: Server | undefined;
  if (env.STATUS_PORT > 0) {
    const app = createStatusApp({ scheduler, analyzer: context.analyzer, logger });
    server = await listenStatusApp(app, env.STATUS_PORT, logger);
  }

  const shutdown = async (signal: NodeJS.Signals): Promise<number> => {
    logger.info({ signal }, "shutting down");
    let exitCode = 0;

    try {
      await scheduler.stop(env.SHUTDOWN_GRACE_SECONDS * 1000);
    } catch (error) {
      exitCode = 1;
      if (error instanceof ShutdownTimeoutError) {
        logger.error({ pending: error.pendingJobs }, "jobs were cancelled after the grace period");
      } else {
        logger.error({ err: error }, "scheduler stop failed");
      }
    }

    try {
      await closeServer(server);
    } catch (error) {
      exitCode = 1;
      logger.error(`status api close failed: ${errorMessage(error)}`);
    }

    logger.info("daemon stopped");
    await context.close();
    return exitCode;
  };

  return new Promise<number>((resolve, reject) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      shutdown(signal).then(resolve, reject);
    };

    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
};

runMain(main);
