import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../lib/errors";

const booleanFlag = z
  .union([
    z.boolean(),
    z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .transform((value) => ["1", "true", "yes", "on"].includes(value))
  ])
  .default(false);

const optionalUrl = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .pipe(z.string().url().optional())
  .optional();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_PRETTY: booleanFlag,
  REACHWATCH_BASE_DIR: z.string().min(1).optional(),
  REACHWATCH_RESULTS_DIR: z.string().min(1).optional(),
  REACHWATCH_ANALYSIS_DIR: z.string().min(1).optional(),
  REACHWATCH_SCHEDULE_FILE: z.string().min(1).default("schedule.json"),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  INVENTORY_URL: optionalUrl,
  RESULT_STORE_URL: optionalUrl,
  RESULT_STORE_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  COLLABORATOR_TIMEOUT_SECONDS: z.coerce.number().positive().default(10),
  SHUTDOWN_GRACE_SECONDS: z.coerce.number().positive().default(30),
  SCHEDULER_TICK_SECONDS: z.coerce.number().positive().max(60).default(15)
});

export type EnvConfig = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): EnvConfig => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join("; ")}`)
      .join(", ");
    throw new ConfigurationError(`Invalid environment configuration: ${fields}`);
  }

  return parsed.data;
};

/** Reads `.env` (if any) into process.env, then validates it. */
export const loadEnv = (): EnvConfig => {
  dotenv.config();
  return parseEnv(process.env);
};
