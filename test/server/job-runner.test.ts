import assert from "node:assert/strict";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { after, before, test } from "node:test";

import { EmptyTargetListError, ShutdownTimeoutError, SourceNotFoundError } from "../../apps/server/src/lib/errors";
import { createSilentLogger } from "../../apps/server/src/lib/logger";
import type { Pinger } from "../../apps/server/src/probe/system-pinger";
import { HttpResultStore, type ResultStore, type StoredProbeRecord } from "../../apps/server/src/run-log/result-store";
import { RuntimeContext, type RuntimeContextOptions } from "../../apps/server/src/runtime/context";
import { formatRunReport } from "../../apps/server/src/runtime/report";
import { executeRun } from "../../apps/server/src/runtime/run-job";
import { JobScheduler } from "../../apps/server/src/scheduler/job-scheduler";
import type { TargetEntry } from "../../apps/server/src/types";

let baseDir: string;

before(async () => {
  baseDir = await mkdtemp(path.join(tmpdir(), "reachwatch-run-"));
  await mkdir(path.join(baseDir, "config"));
  await writeFile(
    path.join(baseDir, "config", "mixed.txt"),
    ["10.0.0.1 gateway", "10.0.0.2", "10.0.0.1 # again", "bad..ip"].join("\n"),
    "utf8"
  );
  await writeFile(path.join(baseDir, "config", "empty.txt"), "# nothing here\nbad..ip\n", "utf8");
});

after(async () => {
  await rm(baseDir, { recursive: true, force: true });
});

// 10.0.0.2 never answers; everything else answers in 4ms.
const pinger: Pinger = {
  probe: async (target) =>
    target === "10.0.0.2" ? { reachable: false, reason: "timeout" } : { reachable: true, latencyMs: 4 }
};

const createContext = (name: string, overrides: Partial<RuntimeContextOptions> = {}): RuntimeContext =>
  new RuntimeContext({
    baseDir,
    resultsDir: path.join("runs", name),
    analysisDir: path.join("analysis", name),
    logger: createSilentLogger(),
    pinger,
    ...overrides
  });

const parameters = { timeoutSeconds: 1, count: 1, workers: 4 };

test("RuntimeContext: directories resolve against the base directory", async () => {
  const context = createContext("dirs");
  await context.init();

  assert.equal(context.resultsDir, path.join(baseDir, "runs", "dirs"));
  assert.equal(context.analysisDir, path.join(baseDir, "analysis", "dirs"));
  assert.deepEqual(await readdir(context.resultsDir), []);
});

test("executeRun: probes a target file and writes its run logs", async () => {
  const context = createContext("file");

  const report = await executeRun(context, { source: { kind: "file", path: "mixed.txt" }, parameters });

  assert.deepEqual(report.summary, {
    total: 2,
    reachable: 1,
    unreachable: 1,
    invalid: 1,
    durationMs: report.batch.durationMs
  });
  assert.equal(report.store, undefined);
  assert.deepEqual(Object.keys(report.files).sort(), ["failed", "invalid", "successful"]);
  assert.equal(await readFile(report.files.successful ?? "", "utf8"), "10.0.0.1\tSUCCESS\t4ms\tgateway\n");
  assert.equal(await readFile(report.files.failed ?? "", "utf8"), "10.0.0.2\tFAILED\ttimeout\n");
  assert.equal(await readFile(report.files.invalid ?? "", "utf8"), "bad..ip\tINVALID\tbad..ip\n");
});

test("executeRun: a job name tags the batch and the log names", async () => {
  const context = createContext("job");

  const report = await executeRun(context, {
    jobName: "core",
    source: { kind: "file", path: "mixed.txt" },
    parameters
  });

  assert.equal(report.batch.jobName, "core");
  assert.match(path.basename(report.files.successful ?? ""), /^\d{8}_\d{6}_\d{3}_core_successful\.txt$/);
});

test("executeRun: a list with no valid target refuses to run", async () => {
  const context = createContext("empty");

  await assert.rejects(
    executeRun(context, { source: { kind: "file", path: "empty.txt" }, parameters }),
    EmptyTargetListError
  );
  await assert.rejects(
    executeRun(context, { source: { kind: "file", path: "missing.txt" }, parameters }),
    SourceNotFoundError
  );
});

test("executeRun: loads inventory targets and forwards results to the store", async () => {
  const saved: StoredProbeRecord[][] = [];
  const resultStore: ResultStore = {
    save: async (records) => {
      saved.push(records);
    }
  };
  const context = createContext("query", {
    inventory: { fetchTargets: async () => [{ identifier: "10.0.0.5" }, { identifier: "10.0.0.2" }] },
    resultStore,
    storeBatchSize: 1
  });

  const report = await executeRun(context, { jobName: "inv", source: { kind: "query", query: "core" }, parameters });

  assert.deepEqual(report.store, { attempted: 2, saved: 2, failedChunks: 0 });
  assert.equal(saved.length, 2);
  assert.deepEqual(
    saved.map((group) => group[0]?.target),
    ["10.0.0.5", "10.0.0.2"]
  );
  assert.equal(saved[0]?.[0]?.jobName, "inv");
});

test("executeRun: an inventory that never answers fails the run after the timeout", async () => {
  const context = createContext("slow-inventory", {
    inventory: { fetchTargets: () => new Promise<TargetEntry[]>(() => undefined) },
    collaboratorTimeoutMs: 20
  });

  await assert.rejects(executeRun(context, { source: { kind: "query", query: "core" }, parameters }), SourceNotFoundError);
});

test("executeRun: a result store that hangs does not keep a job running past shutdown", async () => {
  const hangingFetch: typeof fetch = (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("request aborted")), { once: true });
    });
  const context = createContext("hung-store", {
    resultStore: new HttpResultStore("http://results.test/", hangingFetch),
    collaboratorTimeoutMs: 60_000
  });
  const scheduler = new JobScheduler({
    logger: createSilentLogger(),
    forceWaitMs: 1000,
    runJob: async (job, signal) => {
      const report = await executeRun(
        context,
        { jobName: job.name, source: job.source, parameters: job.parameters },
        signal
      );
      return report.summary;
    }
  });
  scheduler.add({ name: "hung", schedule: "0 0 1 1 *", source: { kind: "file", path: "mixed.txt" }, parameters });

  assert.equal(scheduler.trigger("hung"), "started");
  await assert.rejects(scheduler.stop(50), ShutdownTimeoutError);

  const snapshot = scheduler.get("hung");
  assert.equal(snapshot?.running, false);
  assert.equal(snapshot?.lastOutcome, "completed");
});

test("formatRunReport: totals always, per-target lines when verbose", async () => {
  const context = createContext("report");
  const report = await executeRun(context, { source: { kind: "file", path: "mixed.txt" }, parameters });
  const seconds = (report.summary.durationMs / 1000).toFixed(2);

  const quiet = formatRunReport(report, false);
  const verbose = formatRunReport(report, true);

  assert.equal(quiet[0], `Results: 1 reachable, 1 unreachable, 1 invalid (${seconds}s)`);
  assert.equal(quiet.filter((line) => line.startsWith("Log written: ")).length, 3);
  assert.deepEqual(verbose.slice(0, 3), [
    `${"10.0.0.1".padEnd(39)} REACHABLE    4ms [gateway]`,
    `${"10.0.0.2".padEnd(39)} UNREACHABLE  timeout`,
    `${"bad..ip".padEnd(39)} INVALID      line 4: bad..ip`
  ]);
});
