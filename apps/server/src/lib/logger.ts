import pino, { type Logger } from "pino";

export type { Logger };

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
  service?: string;
}

/**
 * Creates the process logger.
 *
 * Pretty output goes through the `pino-pretty` transport (a worker thread), so
 * it is only used for interactive terminals; everything else gets plain JSON
 * lines on stdout.
 */
export const createLogger = ({ level, pretty, service = "reachwatch" }: LoggerOptions): Logger => {
  const base = { service };

  if (!pretty) {
    return pino({ level, base });
  }

  const transport = pino.transport({
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname,service"
    }
  });

  return pino({ level, base }, transport);
};

export const createSilentLogger = (): Logger => pino({ level: "silent" });
