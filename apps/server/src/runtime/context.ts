import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import { HistoryAnalyzer } from "../analysis/history-analyzer";
import type { EnvConfig } from "../config/env";
import { defaultCollaboratorTimeoutMs } from "../lib/abort";
import type { Logger } from "../lib/logger";
import { ProbeEngine } from "../probe/probe-engine";
import { SystemPinger, type Pinger } from "../probe/system-pinger";
import { HttpResultStore, defaultStoreBatchSize, type ResultStore } from "../run-log/result-store";
import { RunLogWriter } from "../run-log/run-log-writer";
import { HttpInventoryClient, type InventoryClient } from "../targets/target-source";

export interface RuntimeContextOptions {
  baseDir: string;
  resultsDir: string;
  analysisDir: string;
  logger: Logger;
  pinger?: Pinger;
  inventory?: InventoryClient;
  resultStore?: ResultStore;
  storeBatchSize?: number;
  collaboratorTimeoutMs?: number;
}

/**
 * Process-wide state shared by one-shot runs, the scheduler and the analyzer:
 * directories, collaborators and the components built on them.
 */
export class RuntimeContext {
  readonly baseDir: string;
  readonly resultsDir: string;
  readonly analysisDir: string;
  readonly logger: Logger;
  readonly inventory?: InventoryClient;
  readonly resultStore?: ResultStore;
  readonly storeBatchSize: number;
  readonly collaboratorTimeoutMs: number;
  readonly engine: ProbeEngine;
  readonly writer: RunLogWriter;
  readonly analyzer: HistoryAnalyzer;

  private closed = false;

  constructor(options: RuntimeContextOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.resultsDir = path.resolve(this.baseDir, options.resultsDir);
    this.analysisDir = path.resolve(this.baseDir, options.analysisDir);
    this.logger = options.logger;
    this.inventory = options.inventory;
    this.resultStore = options.resultStore;
    this.storeBatchSize = options.storeBatchSize ?? defaultStoreBatchSize;
    this.collaboratorTimeoutMs = options.collaboratorTimeoutMs ?? defaultCollaboratorTimeoutMs;

    this.engine = new ProbeEngine({ pinger: options.pinger ?? new SystemPinger(), logger: this.logger });
    this.writer = new RunLogWriter({ resultsDir: this.resultsDir, logger: this.logger });
    this.analyzer = new HistoryAnalyzer({
      resultsDir: this.resultsDir,
      analysisDir: this.analysisDir,
      logger: this.logger
    });
  }

  static fromEnv(env: EnvConfig, logger: Logger, overrides: Partial<RuntimeContextOptions> = {}): RuntimeContext {
    const baseDir = env.REACHWATCH_BASE_DIR ?? process.cwd();

    return new RuntimeContext({
      baseDir,
      resultsDir: env.REACHWATCH_RESULTS_DIR ?? "logs",
      analysisDir: env.REACHWATCH_ANALYSIS_DIR ?? ".",
      logger,
      ...(env.INVENTORY_URL ? { inventory: new HttpInventoryClient(env.INVENTORY_URL) } : {}),
      ...(env.RESULT_STORE_URL ? { resultStore: new HttpResultStore(env.RESULT_STORE_URL) } : {}),
      storeBatchSize: env.RESULT_STORE_BATCH_SIZE,
      collaboratorTimeoutMs: env.COLLABORATOR_TIMEOUT_SECONDS * 1000,
      ...overrides
    });
  }

  async init(): Promise<void> {
    await mkdir(this.resultsDir, { recursive: true });
    await mkdir(this.analysisDir, { recursive: true });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.resultStore?.close?.();
    } finally {
      await new Promise<void>((resolve) => {
        this.logger.flush(() => resolve());
      });
    }
  }
}
