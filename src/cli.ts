#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Usage:
 *   rateio run --pipeline data/sample/pipeline.yaml --raw data/sample/raw --out data/processed
 *   rateio validate --pipeline data/sample/pipeline.yaml [--raw data/sample/raw]
 *   rateio plan --pipeline data/sample/pipeline.yaml --raw data/sample/raw
 */

import { config as loadDotenv } from "dotenv";
import { Command } from "commander";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { catalogOf, execute, loadRunInputs, PipelineValidationError } from "./app.js";
import { loadPipeline } from "./pipeline/yaml.js";
import { planSchemas, validate } from "./pipeline/validate.js";
import { loadTables } from "./io/loader.js";
import { prepareTables } from "./prepare/prepare.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  loadDotenv();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const program = new Command()
    .name("rateio")
    .description("Apportion values across centers and segments through chained allocation stages")
    .version(VERSION);

  program
    .command("run")
    .description("Load raw JSON, run every stage and write one Parquet file per stage")
    .option("--pipeline <path>", "Pipeline manifest (YAML)", config.pipelinePath)
    .option("--raw <dir>", "Directory of raw JSON tables", config.rawDir)
    .option("--out <dir>", "Output directory for Parquet files", config.outputDir)
    .action(async (opts: { pipeline: string; raw: string; out: string }) => {
      const { files } = await execute({
        pipelinePath: opts.pipeline,
        rawDir: opts.raw,
        outputDir: opts.out,
        logger,
      });
      for (const file of files) console.log(file);
    });

  program
    .command("validate")
    .description("Check a pipeline manifest; with --raw, also check tables and columns")
    .option("--pipeline <path>", "Pipeline manifest (YAML)", config.pipelinePath)
    .option("--raw <dir>", "Directory of raw JSON tables")
    .action(async (opts: { pipeline: string; raw?: string }) => {
      const pipeline = loadPipeline(opts.pipeline);
      const catalog = opts.raw
        ? catalogOf(prepareTables(await loadTables(opts.raw, logger), pipeline.prepare, logger))
        : undefined;
      const errors = validate(pipeline, catalog);
      if (errors.length > 0) throw new PipelineValidationError(errors);
      console.log(`${opts.pipeline}: ${pipeline.stages.length} stages, no errors`);
    });

  program
    .command("plan")
    .description("Print the columns available at every stage boundary")
    .option("--pipeline <path>", "Pipeline manifest (YAML)", config.pipelinePath)
    .option("--raw <dir>", "Directory of raw JSON tables", config.rawDir)
    .action(async (opts: { pipeline: string; raw: string }) => {
      const pipeline = loadPipeline(opts.pipeline);
      const tables = await loadRunInputs(pipeline, opts.raw, logger);
      const schemas = planSchemas(pipeline, tables[pipeline.source].columns);
      schemas.forEach((schema, i) => {
        const added = schema.output.filter((column) => !schema.input.includes(column));
        console.log(`${i + 1}. ${schema.stage}`);
        console.log(`   in:    ${schema.input.join(", ")}`);
        console.log(`   adds:  ${added.length > 0 ? added.join(", ") : "(none)"}`);
      });
    });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error({ event: "rateio.cli.failed", err: error }, error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
