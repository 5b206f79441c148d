#!/usr/bin/env node
import { formatAnalysisReport } from "../runtime/report";
import { bootstrap, runMain, writeLines } from "./bootstrap";

const main = async (): Promise<number> => {
  const { logger, context } = await bootstrap("reachwatch-analyze");

  try {
    const { report, files } = await context.analyzer.run();

    if (report.records.length === 0) {
      logger.warn({ resultsDir: context.resultsDir }, "no run logs found, run some checks first");
    }

    writeLines(formatAnalysisReport(report, files));
    return 0;
  } finally {
    await context.close();
  }
};

runMain(main);
