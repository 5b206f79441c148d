import { loadEnv, type EnvConfig } from "../config/env";
import { errorMessage } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import { RuntimeContext } from "../runtime/context";

export interface Runtime {
  env: EnvConfig;
  logger: Logger;
  context: RuntimeContext;
}

export const bootstrap = async (service: string): Promise<Runtime> => {
  const env = loadEnv();
  const logger = createLogger({
    level: env.LOG_LEVEL,
    pretty: env.LOG_PRETTY || (Boolean(process.stdout.isTTY) && env.NODE_ENV !== "production"),
    service
  });
  const context = RuntimeContext.fromEnv(env, logger);
  await context.init();
  return { env, logger, context };
};

export const writeLines = (lines: string[]): void => {
  if (lines.length > 0) {
    process.stdout.write(`${lines.join("\n")}\n`);
  }
};

/** Runs a command's main function and turns its result into the exit code. */
export const runMain = (main: () => Promise<number>): void => {
  void main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${errorMessage(error)}\n`);
      process.exitCode = 2;
    }
  );
};
