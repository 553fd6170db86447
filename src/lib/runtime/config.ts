import { z } from "zod";
import { GridCsvError } from "../errors";
import { DEFAULT_SAMPLE_ROWS } from "../grid/detectColumn";
import type { LogLevel } from "./logger";

export type AppConfig = {
  logLevel: LogLevel;
  sampleRows: number;
};

const envSchema = z.object({
  MGRS_CSV_LOG_LEVEL: z.enum(["error", "info", "debug"]).default("error"),
  MGRS_CSV_SAMPLE_ROWS: z.coerce.number().int().positive().default(DEFAULT_SAMPLE_ROWS)
});

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new GridCsvError("INVALID_ARGS", `Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return {
    logLevel: parsed.data.MGRS_CSV_LOG_LEVEL,
    sampleRows: parsed.data.MGRS_CSV_SAMPLE_ROWS
  };
};
