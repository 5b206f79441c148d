import assert from "node:assert/strict";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { after, before, test } from "node:test";

import {
  HistoryAnalyzer,
  analysisFileNames,
  classify,
  formatSuccessRate,
  parseRunLogIdentifiers,
  renderAnalysisFile
} from "../../apps/server/src/analysis/history-analyzer";
import { createSilentLogger } from "../../apps/server/src/lib/logger";

let workDir: string;

before(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), "reachwatch-history-"));
});

after(async () => {
  await rm(workDir, { recursive: true, force: true });
});

interface RunFixture {
  stem: string;
  successful?: string[];
  failed?: string[];
}

// Four runs: .1 always up, .2 never, .3 up in two of four, .4 seen once and up.
const runs: RunFixture[] = [
  { stem: "20260101_000000_000", successful: ["10.0.0.1", "10.0.0.3"], failed: ["10.0.0.2"] },
  { stem: "20260101_000500_000", successful: ["10.0.0.1"], failed: ["10.0.0.2", "10.0.0.3"] },
  { stem: "20260101_001000_000", successful: ["10.0.0.1", "10.0.0.3", "10.0.0.4"], failed: ["10.0.0.2"] },
  { stem: "20260101_001500_000_core", successful: ["10.0.0.1"], failed: ["10.0.0.3"] }
];

const writeRuns = async (resultsDir: string, fixtures: RunFixture[]): Promise<void> => {
  await mkdir(resultsDir, { recursive: true });
  for (const fixture of fixtures) {
    if (fixture.successful) {
      const lines = fixture.successful.map((target) => `${target}\tSUCCESS\t1.5ms`);
      await writeFile(path.join(resultsDir, `${fixture.stem}_successful.txt`), `${lines.join("\n")}\n`, "utf8");
    }
    if (fixture.failed) {
      const lines = fixture.failed.map((target) => `${target}\tFAILED\ttimeout`);
      await writeFile(path.join(resultsDir, `${fixture.stem}_failed.txt`), `${lines.join("\n")}\n`, "utf8");
    }
  }
};

test("classify: always, never, sometimes", () => {
  assert.deepEqual(classify("a", 3, 3), { identifier: "a", successes: 3, total: 3, classification: "always" });
  assert.deepEqual(classify("b", 0, 3), { identifier: "b", successes: 0, total: 3, classification: "never" });
  assert.deepEqual(classify("c", 2, 4), {
    identifier: "c",
    successes: 2,
    total: 4,
    classification: "sometimes",
    successRate: 50
  });
});

test("formatSuccessRate: one decimal place", () => {
  assert.equal(formatSuccessRate(50), "50.0%");
  assert.equal(formatSuccessRate((1 / 3) * 100), "33.3%");
  assert.equal(formatSuccessRate((2 / 3) * 100), "66.7%");
});

test("parseRunLogIdentifiers: first column, lowercased, skipping noise", () => {
  const text = "# header\n\nHOST.example\tSUCCESS\t1ms\nnot-a-record\n10.0.0.9\tFAILED\ttimeout\n";

  assert.deepEqual(parseRunLogIdentifiers(text), ["host.example", "10.0.0.9"]);
});

test("renderAnalysisFile: header then one line per record", () => {
  const content = renderAnalysisFile("sometimes", [classify("10.0.0.3", 2, 4)]);

  assert.equal(content, "# Targets that sometimes responded\n# Total: 1\n10.0.0.3\t50.0%\n");
  assert.equal(renderAnalysisFile("never", []), "# Targets that never responded\n# Total: 0\n");
});

test("HistoryAnalyzer.analyze: classifies across every run log", async () => {
  const resultsDir = path.join(workDir, "classify", "logs");
  await writeRuns(resultsDir, runs);
  const analyzer = new HistoryAnalyzer({ resultsDir, analysisDir: workDir, logger: createSilentLogger() });

  const report = await analyzer.analyze();

  assert.equal(report.successFiles, 4);
  assert.equal(report.failureFiles, 4);
  assert.deepEqual(
    report.never.map((record) => record.identifier),
    ["10.0.0.2"]
  );
  assert.deepEqual(
    report.always.map((record) => record.identifier),
    ["10.0.0.1", "10.0.0.4"]
  );
  assert.deepEqual(report.sometimes, [
    { identifier: "10.0.0.3", successes: 2, total: 4, classification: "sometimes", successRate: 50 }
  ]);
  assert.equal(report.records.length, report.never.length + report.always.length + report.sometimes.length);
});

test("HistoryAnalyzer.analyze: a missing results directory is an empty report", async () => {
  const analyzer = new HistoryAnalyzer({
    resultsDir: path.join(workDir, "does-not-exist"),
    analysisDir: workDir,
    logger: createSilentLogger()
  });

  const report = await analyzer.analyze();

  assert.deepEqual(report, { successFiles: 0, failureFiles: 0, records: [], never: [], always: [], sometimes: [] });
});

test("HistoryAnalyzer.analyze: invalid-entry logs are ignored", async () => {
  const resultsDir = path.join(workDir, "invalid-only", "logs");
  await writeRuns(resultsDir, [{ stem: "20260102_000000_000", successful: ["10.0.0.7"] }]);
  await writeFile(path.join(resultsDir, "20260102_000000_000_invalid.txt"), "bad..ip\tINVALID\tbad..ip\n", "utf8");
  const analyzer = new HistoryAnalyzer({ resultsDir, analysisDir: workDir, logger: createSilentLogger() });

  const report = await analyzer.analyze();

  assert.deepEqual(
    report.records.map((record) => record.identifier),
    ["10.0.0.7"]
  );
});

test("HistoryAnalyzer.run: writes three files and is idempotent", async () => {
  const resultsDir = path.join(workDir, "write", "logs");
  const analysisDir = path.join(workDir, "write", "analysis");
  await writeRuns(resultsDir, runs);
  const analyzer = new HistoryAnalyzer({ resultsDir, analysisDir, logger: createSilentLogger() });

  const { files } = await analyzer.run();
  const firstPass = await Promise.all([files.never, files.always, files.sometimes].map((file) => readFile(file, "utf8")));
  await analyzer.run();
  const secondPass = await Promise.all([files.never, files.always, files.sometimes].map((file) => readFile(file, "utf8")));

  assert.equal(files.never, path.join(analysisDir, analysisFileNames.never));
  assert.deepEqual(firstPass, [
    "# Targets that never responded\n# Total: 1\n10.0.0.2\n",
    "# Targets that always responded\n# Total: 2\n10.0.0.1\n10.0.0.4\n",
    "# Targets that sometimes responded\n# Total: 1\n10.0.0.3\t50.0%\n"
  ]);
  assert.deepEqual(secondPass, firstPass);
});

test("HistoryAnalyzer.analyze: a target failing in every one of three runs is never", async () => {
  const resultsDir = path.join(workDir, "never", "logs");
  await writeRuns(resultsDir, [
    { stem: "20260103_000000_000", failed: ["192.0.2.1"] },
    { stem: "20260103_000100_000", failed: ["192.0.2.1"] },
    { stem: "20260103_000200_000", failed: ["192.0.2.1"] }
  ]);
  const analyzer = new HistoryAnalyzer({ resultsDir, analysisDir: workDir, logger: createSilentLogger() });

  const report = await analyzer.analyze();

  assert.deepEqual(report.never, [{ identifier: "192.0.2.1", successes: 0, total: 3, classification: "never" }]);
  assert.equal(report.successFiles, 0);
  assert.equal(report.failureFiles, 3);
});
