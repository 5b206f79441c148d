#!/usr/bin/env node
import { parseArgs } from "node:util";
import { z } from "zod";
import { isStartupError } from "../lib/errors";
import { defaultProbeParameters, isAllReachable, probeParameterLimits } from "../probe/probe-engine";
import { formatRunReport } from "../runtime/report";
import { executeRun } from "../runtime/run-job";
import type { TargetSourceDescriptor } from "../types";
import { bootstrap, runMain, writeLines } from "./bootstrap";

const usage = `Usage: reachwatch-check <target-file> [options]
       reachwatch-check --query <name> [options]

Options:
  -t, --timeout <seconds>  probe timeout (default ${defaultProbeParameters.timeoutSeconds})
  -c, --count <n>          packets per probe (default ${defaultProbeParameters.count})
  -w, --workers <n>        concurrent probes (default ${defaultProbeParameters.workers})
  -q, --query <name>       load targets from the inventory instead of a file
  -j, --job <name>         tag the run with a job name
  -v, --verbose            print every result`;

const checkArgsSchema = z
  .object({
    targetFile: z.string().min(1).optional(),
    query: z.string().min(1).optional(),
    job: z.string().regex(/^[a-zA-Z0-9._-]+$/).optional(),
    timeout: z.coerce
      .number()
      .positive()
      .max(probeParameterLimits.maxTimeoutSeconds)
      .default(defaultProbeParameters.timeoutSeconds),
    count: z.coerce.number().int().min(1).max(probeParameterLimits.maxCount).default(defaultProbeParameters.count),
    workers: z.coerce
      .number()
      .int()
      .min(1)
      .max(probeParameterLimits.maxWorkers)
      .default(defaultProbeParameters.workers),
    verbose: z.boolean().default(false)
  })
  .refine((args) => Boolean(args.targetFile) !== Boolean(args.query), "give either a target file or --query");

const readArgs = (argv: string[]) => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      timeout: { type: "string", short: "t" },
      count: { type: "string", short: "c" },
      workers: { type: "string", short: "w" },
      query: { type: "string", short: "q" },
      job: { type: "string", short: "j" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" }
    }
  });

  return { help: values.help === true, parsed: checkArgsSchema.safeParse({ ...values, targetFile: positionals[0] }) };
};

const main = async (): Promise<number> => {
  const { help, parsed } = readArgs(process.argv.slice(2));

  if (help || !parsed.success) {
    if (!help && !parsed.success) {
      process.stderr.write(`${parsed.error.issues[0]?.message ?? "invalid arguments"}\n`);
    }
    process.stderr.write(`${usage}\n`);
    return help ? 0 : 2;
  }

  const args = parsed.data;
  const { logger, context } = await bootstrap("reachwatch-check");
  const source: TargetSourceDescriptor = args.query
    ? { kind: "query", query: args.query }
    : { kind: "file", path: args.targetFile ?? "" };

  try {
    const report = await executeRun(context, {
      ...(args.job ? { jobName: args.job } : {}),
      source,
      parameters: { timeoutSeconds: args.timeout, count: args.count, workers: args.workers }
    });

    writeLines(formatRunReport(report, args.verbose));
    return isAllReachable(report.batch) ? 0 : 1;
  } catch (error) {
    if (isStartupError(error)) {
      logger.error({ err: error }, "run could not start");
      return 2;
    }
    throw error;
  } finally {
    await context.close();
  }
};

runMain(main);
