import { join } from "node:path";
import type { Table } from "./table/types.js";
import { loadTables } from "./io/loader.js";
import { writeParquet } from "./io/writer.js";
import { prepareTables } from "./prepare/prepare.js";
import { loadPipeline } from "./pipeline/yaml.js";
import { validate, type Catalog, type ValidationError } from "./pipeline/validate.js";
import type { Pipeline } from "./pipeline/types.js";
import { runOptionsFor, runStages, type RunResult } from "./engine/run.js";
import { log, type Logger } from "./logger.js";

export class PipelineValidationError extends Error {
  readonly name = "PipelineValidationError";

  constructor(public readonly errors: ValidationError[]) {
    super(`Pipeline is invalid:\n${errors.map((e) => `  [${e.rule}] ${e.message}`).join("\n")}`);
  }
}

export interface ExecuteOptions {
  pipelinePath: string;
  rawDir: string;
  outputDir: string;
  logger?: Logger;
}

export interface ExecuteResult {
  result: RunResult;
  /** One Parquet file per stage, in stage order. */
  files: string[];
}

export function catalogOf(tables: Readonly<Record<string, Table>>): Catalog {
  return Object.fromEntries(Object.entries(tables).map(([name, table]) => [name, table.columns]));
}

/** Load, prepare and validate everything a run needs, without running it. */
export async function loadRunInputs(
  pipeline: Pipeline,
  rawDir: string,
  logger: Logger = log
): Promise<Record<string, Table>> {
  const raw = await loadTables(rawDir, logger);
  const tables = prepareTables(raw, pipeline.prepare, logger);
  const errors = validate(pipeline, catalogOf(tables));
  if (errors.length > 0) throw new PipelineValidationError(errors);
  return tables;
}

export function stageFileName(index: number): string {
  return `rateio_etapa${index}.parquet`;
}

/** Loader → Preparer → Engine → Writer. */
export async function execute(options: ExecuteOptions): Promise<ExecuteResult> {
  const logger = options.logger ?? log;
  const pipeline = loadPipeline(options.pipelinePath);
  const tables = await loadRunInputs(pipeline, options.rawDir, logger);

  const result = runStages(tables[pipeline.source], pipeline.stages, runOptionsFor(pipeline, tables, logger));

  const files: string[] = [];
  for (const stage of result.stages) {
    const file = join(options.outputDir, stageFileName(stage.index));
    await writeParquet(stage.table, file, logger);
    files.push(file);
  }

  logger.info(
    { event: "rateio.run.completed", stages: result.stages.length, rows: result.table.rows.length },
    "allocation run completed"
  );
  return { result, files };
}
