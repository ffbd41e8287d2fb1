import type { Pipeline, StageDef } from "./types.js";
import { filterColumns } from "../table/helpers.js";

export interface ValidationError {
  rule: string;
  message: string;
  path?: string;
}

/** Column names of each loaded (and prepared) table, by table name. */
export type Catalog = Readonly<Record<string, readonly string[]>>;

/** Columns available on either side of one stage. */
export interface StageSchema {
  stage: string;
  input: string[];
  output: string[];
}

/**
 * Check a parsed pipeline. Rules that need to know the tables (existence,
 * column availability) run only when a catalog is given.
 */
export function validate(pipeline: Pipeline, catalog?: Catalog): ValidationError[] {
  const errors: ValidationError[] = [];

  checkDuplicateStages(pipeline, errors);
  checkTolerance(pipeline, errors);
  for (const stage of pipeline.stages) {
    checkMetricColumn(stage, errors);
    checkTargets(stage, errors);
    checkPoolMode(stage, errors);
  }

  if (catalog) {
    checkTablesExist(pipeline, catalog, errors);
    checkColumnAvailability(pipeline, catalog, errors);
  }

  return errors;
}

/**
 * Derive the schema at every stage boundary: the source table's columns,
 * grown by the output, stage and target columns each stage adds.
 */
export function planSchemas(pipeline: Pipeline, sourceColumns: readonly string[]): StageSchema[] {
  const schemas: StageSchema[] = [];
  let columns = [...sourceColumns];

  for (const stage of pipeline.stages) {
    const added = [
      ...(stage.metric.from === "table" ? [...stage.group_by, ...stage.metric.target] : []),
      stage.output_column ?? pipeline.output_column,
      pipeline.stage_column,
    ];
    const output = [...columns];
    for (const column of added) {
      if (!output.includes(column)) output.push(column);
    }
    schemas.push({ stage: stage.name, input: columns, output });
    columns = output;
  }

  return schemas;
}

// Rule: Stage names must be unique
function checkDuplicateStages(pipeline: Pipeline, errors: ValidationError[]): void {
  const seen = new Set<string>();
  for (const stage of pipeline.stages) {
    if (seen.has(stage.name)) {
      errors.push({
        rule: "no-duplicates",
        message: `Duplicate stage name: "${stage.name}"`,
        path: `stages.${stage.name}`,
      });
    }
    seen.add(stage.name);
  }
}

// Rule: Conservation tolerance must be a non-negative finite number
function checkTolerance(pipeline: Pipeline, errors: ValidationError[]): void {
  if (!Number.isFinite(pipeline.tolerance) || pipeline.tolerance < 0) {
    errors.push({
      rule: "positive-tolerance",
      message: `Tolerance must be a non-negative number, got ${pipeline.tolerance}`,
      path: "tolerance",
    });
  }
}

// Rule: A proportional criterion needs a metric column to weigh by
function checkMetricColumn(stage: StageDef, errors: ValidationError[]): void {
  if (stage.criterion.kind === "proportional" && stage.metric.column === undefined) {
    errors.push({
      rule: "metric-column-required",
      message: `Stage "${stage.name}" uses a proportional criterion but names no metric column`,
      path: `stages.${stage.name}.metric.column`,
    });
  }
}

// Rule: Table metrics need targets, and targets may not repeat grouping columns
function checkTargets(stage: StageDef, errors: ValidationError[]): void {
  if (stage.metric.from !== "table") return;

  if (stage.metric.target.length === 0) {
    errors.push({
      rule: "target-required",
      message: `Stage "${stage.name}" reads metric table "${stage.metric.table}" but names no target columns`,
      path: `stages.${stage.name}.metric.target`,
    });
  }

  const groupBy = new Set(stage.group_by);
  for (const column of stage.metric.target) {
    if (groupBy.has(column)) {
      errors.push({
        rule: "target-group-overlap",
        message: `Stage "${stage.name}" uses "${column}" both as a target and in group_by`,
        path: `stages.${stage.name}.metric.target`,
      });
    }
  }
}

// Rule: A pool is split across metric-table targets and takes no row selection
function checkPoolMode(stage: StageDef, errors: ValidationError[]): void {
  if (stage.pool === undefined) return;

  if (stage.metric.from !== "table") {
    errors.push({
      rule: "pool-mode",
      message: `Stage "${stage.name}" allocates a pool, which needs a metric table to name its targets`,
      path: `stages.${stage.name}.pool`,
    });
  }
  if (stage.where.length > 0 || stage.group_by.length > 0) {
    errors.push({
      rule: "pool-mode",
      message: `Stage "${stage.name}" allocates a pool and cannot also select rows with where or group_by`,
      path: `stages.${stage.name}.pool`,
    });
  }
}

// Rule: The source table and every metric table must be loaded
function checkTablesExist(pipeline: Pipeline, catalog: Catalog, errors: ValidationError[]): void {
  if (!(pipeline.source in catalog)) {
    errors.push({
      rule: "source-table-exists",
      message: `Source table "${pipeline.source}" was not loaded`,
      path: "source",
    });
  }
  for (const stage of pipeline.stages) {
    if (stage.metric.from === "table" && !(stage.metric.table in catalog)) {
      errors.push({
        rule: "metric-table-exists",
        message: `Stage "${stage.name}" references nonexistent metric table "${stage.metric.table}"`,
        path: `stages.${stage.name}.metric.table`,
      });
    }
  }
}

// Rule: Every column a stage reads must exist at its boundary
function checkColumnAvailability(
  pipeline: Pipeline,
  catalog: Catalog,
  errors: ValidationError[]
): void {
  const sourceColumns = catalog[pipeline.source];
  if (sourceColumns === undefined) return;

  const schemas = planSchemas(pipeline, sourceColumns);
  pipeline.stages.forEach((stage, i) => {
    const available = new Set(schemas[i].input);
    const read = [stage.value_column, ...filterColumns(stage.where), ...stage.group_by];
    if (stage.metric.from === "row" && stage.metric.column !== undefined) {
      read.push(stage.metric.column);
    }
    for (const column of new Set(read)) {
      if (!available.has(column)) {
        errors.push({
          rule: "column-available",
          message: `Stage "${stage.name}" reads column "${column}", which does not exist at that point in the pipeline`,
          path: `stages.${stage.name}`,
        });
      }
    }

    if (stage.metric.from !== "table") return;
    const metricColumns = catalog[stage.metric.table];
    if (metricColumns === undefined) return;
    const metricAvailable = new Set(metricColumns);
    const metricRead = [
      ...(stage.metric.column !== undefined ? [stage.metric.column] : []),
      ...stage.metric.target,
      ...stage.group_by,
      ...filterColumns(stage.metric.where),
    ];
    for (const column of new Set(metricRead)) {
      if (!metricAvailable.has(column)) {
        errors.push({
          rule: "column-available",
          message: `Stage "${stage.name}" reads column "${column}" from metric table "${stage.metric.table}", which has no such column`,
          path: `stages.${stage.name}.metric`,
        });
      }
    }
  });
}
