import type { Server } from "node:http";
import cors from "cors";
import express, { type Express } from "express";
import { z } from "zod";
import { formatSuccessRate, type HistoryAnalyzer } from "../analysis/history-analyzer";
import { errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { JobScheduler } from "../scheduler/job-scheduler";

export interface StatusAppOptions {
  scheduler: JobScheduler;
  analyzer: HistoryAnalyzer;
  logger: Logger;
  now?: () => Date;
}

const jobNameSchema = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[a-zA-Z0-9._-]+$/, "Invalid job name.");

export const createStatusApp = ({ scheduler, analyzer, logger, now = () => new Date() }: StatusAppOptions): Express => {
  const app = express();
  const log = logger.child({ component: "status-api" });

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({
      status: scheduler.isStopping ? "stopping" : "ok",
      service: "reachwatch",
      now: now().toISOString()
    });
  });

  app.get("/api/jobs", (_req, res) => {
    res.json({ jobs: scheduler.list() });
  });

  app.get("/api/jobs/:name", (req, res) => {
    const parsed = jobNameSchema.safeParse(req.params.name);
    const job = parsed.success ? scheduler.get(parsed.data) : undefined;

    if (!job) {
      res.status(404).json({ message: "Job not found." });
      return;
    }

    res.json({ job });
  });

  app.post("/api/jobs/:name/run", (req, res) => {
    const parsed = jobNameSchema.safeParse(req.params.name);
    if (!parsed.success || !scheduler.get(parsed.data)) {
      res.status(404).json({ message: "Job not found." });
      return;
    }

    const result = scheduler.trigger(parsed.data);
    log.info({ job: parsed.data, result }, "manual run requested");

    if (result === "started") {
      res.status(202).json({ result, job: scheduler.get(parsed.data) });
    } else if (result === "dropped") {
      res.status(409).json({ result, message: "Job is already running." });
    } else {
      res.status(503).json({ result, message: "Scheduler is shutting down." });
    }
  });

  app.get("/api/analysis", async (_req, res) => {
    try {
      const report = await analyzer.analyze();
      res.json({
        successFiles: report.successFiles,
        failureFiles: report.failureFiles,
        totals: {
          targets: report.records.length,
          never: report.never.length,
          always: report.always.length,
          sometimes: report.sometimes.length
        },
        never: report.never.map((record) => record.identifier),
        always: report.always.map((record) => record.identifier),
        sometimes: report.sometimes.map((record) => ({
          identifier: record.identifier,
          successRate: formatSuccessRate(record.successRate ?? 0)
        }))
      });
    } catch (error) {
      log.error({ err: error }, "analysis request failed");
      res.status(500).json({ message: errorMessage(error) });
    }
  });

  return app;
};

/**
 * Listens on `port` and resolves with the server once it is bound. A bind
 * failure (port taken, no permission) is logged and resolves undefined: the
 * daemon keeps scheduling without its status API.
 */
export const listenStatusApp = (app: Express, port: number, logger: Logger, host?: string): Promise<Server | undefined> =>
  new Promise((resolve) => {
    const log = logger.child({ component: "status-api" });
    const server = host ? app.listen(port, host) : app.listen(port);

    const onListenError = (error: Error): void => {
      server.off("listening", onListening);
      log.error({ err: error, port }, "status api could not listen; continuing without it");
      resolve(undefined);
    };

    const onListening = (): void => {
      server.off("error", onListenError);
      server.on("error", (error) => {
        log.error({ err: error, port }, "status api server error");
      });
      log.info({ port }, "status api listening");
      resolve(server);
    };

    server.once("error", onListenError);
    server.once("listening", onListening);
  });
