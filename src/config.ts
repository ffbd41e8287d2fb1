/**
 * Environment configuration for the CLI and the application entry point.
 * Invalid values fail at startup rather than part-way through a run.
 */

import { z } from "zod";

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

/** Treats empty strings as unset so defaults apply. */
const optionalPath = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === "" ? fallback : val.trim()));

const ConfigSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((val) => (val === undefined || val === "" ? "info" : val.toLowerCase()))
    .pipe(LogLevel),
  RATEIO_PIPELINE: optionalPath("pipeline.yaml"),
  RATEIO_RAW_DIR: optionalPath("data/raw"),
  RATEIO_OUTPUT_DIR: optionalPath("data/processed"),
});

export interface Config {
  logLevel: z.infer<typeof LogLevel>;
  pipelinePath: string;
  rawDir: string;
  outputDir: string;
}

export function loadConfig(source: Record<string, string | undefined> = process.env): Config {
  const parsed = ConfigSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return {
    logLevel: parsed.data.LOG_LEVEL,
    pipelinePath: parsed.data.RATEIO_PIPELINE,
    rawDir: parsed.data.RATEIO_RAW_DIR,
    outputDir: parsed.data.RATEIO_OUTPUT_DIR,
  };
}
