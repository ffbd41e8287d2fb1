import type { Table } from "../table/types.js";
import { columnValues, compensatedSum, sumMinorUnits, toMinorUnits } from "../table/helpers.js";
import {
  DEFAULT_DECIMALS,
  DEFAULT_OUTPUT_COLUMN,
  DEFAULT_STAGE_COLUMN,
  DEFAULT_TOLERANCE,
  type Pipeline,
  type StageDef,
} from "../pipeline/types.js";
import { log, type Logger } from "../logger.js";
import { applyStage, resolveDecimals, resolveOutputColumn, type StageContext } from "./stage.js";
import { ComputationError, ConservationError } from "./errors.js";

export interface RunOptions {
  /** Metric tables referenced by `metric.from: table` stages. */
  drivers?: Readonly<Record<string, Table>>;
  outputColumn?: string;
  stageColumn?: string;
  decimals?: number | null;
  tolerance?: number;
  logger?: Logger;
}

export interface StageOutcome {
  name: string;
  index: number;
  table: Table;
  /** Total entering the stage: Σ value_column plus any pool. */
  expected: number;
  /** Total leaving the stage: Σ output_column. */
  actual: number;
}

export interface RunResult {
  table: Table;
  stages: StageOutcome[];
}

/** Run options carried by a pipeline manifest. */
export function runOptionsFor(
  pipeline: Pipeline,
  drivers: Readonly<Record<string, Table>>,
  logger?: Logger
): RunOptions {
  return {
    drivers,
    outputColumn: pipeline.output_column,
    stageColumn: pipeline.stage_column,
    decimals: pipeline.decimals,
    tolerance: pipeline.tolerance,
    logger,
  };
}

/**
 * Run the stages in order, each consuming the table the previous one
 * produced, and keep every intermediate table. Fails fast: the first error
 * aborts the run and nothing is returned.
 */
export function runStages(
  prepared: Table,
  stages: readonly StageDef[],
  options: RunOptions = {}
): RunResult {
  const logger = options.logger ?? log;
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const outcomes: StageOutcome[] = [];
  let current = prepared;

  stages.forEach((stage, i) => {
    const context: StageContext = {
      index: i + 1,
      drivers: options.drivers ?? {},
      stageColumn: options.stageColumn ?? DEFAULT_STAGE_COLUMN,
      defaults: {
        outputColumn: options.outputColumn ?? DEFAULT_OUTPUT_COLUMN,
        decimals: options.decimals === undefined ? DEFAULT_DECIMALS : options.decimals,
      },
    };

    const next = applyStage(current, stage, context);
    const { expected, actual, allowed } = stageTotals(current, next, stage, context, tolerance);
    checkConservation(stage.name, expected, actual, allowed);

    logger.info(
      {
        event: "rateio.stage.completed",
        stage: stage.name,
        index: context.index,
        rows_in: current.rows.length,
        rows_out: next.rows.length,
        total: actual,
      },
      `stage ${context.index} (${stage.name}) completed: ${next.rows.length} rows`
    );

    outcomes.push({ name: stage.name, index: context.index, table: next, expected, actual });
    current = next;
  });

  return { table: current, stages: outcomes };
}

/** Run the stages and return the table produced by the last one. */
export function run(
  prepared: Table,
  stages: readonly StageDef[],
  options: RunOptions = {}
): Table {
  return runStages(prepared, stages, options).table;
}

/** Magnitude-relative allowance for unrounded sums, in units of Σ|x|. */
const UNROUNDED_RELATIVE_ERROR = 16 * Number.EPSILON;

export interface StageTotals {
  expected: number;
  actual: number;
  /** Largest difference between the two that still counts as conserved. */
  allowed: number;
}

/**
 * Totals entering and leaving a stage. With rounding on, both sides are
 * summed in whole minor units, so they compare exactly at any magnitude.
 * Unrounded totals use compensated sums, and the tolerance grows with the
 * size of the amounts involved.
 */
export function stageTotals(
  input: Table,
  output: Table,
  stage: StageDef,
  context: StageContext,
  tolerance: number
): StageTotals {
  const outputColumn = resolveOutputColumn(stage, context);
  const inputLabel = `Stage "${stage.name}" input`;
  const outputLabel = `Stage "${stage.name}" output`;
  const pool = stage.pool ?? 0;
  const decimals = resolveDecimals(stage, context);

  if (decimals !== null) {
    const scale = 10 ** decimals;
    const expectedUnits =
      sumMinorUnits(input, stage.value_column, decimals, inputLabel) + toMinorUnits(pool, decimals);
    const actualUnits = sumMinorUnits(output, outputColumn, decimals, outputLabel);
    return { expected: expectedUnits / scale, actual: actualUnits / scale, allowed: tolerance };
  }

  const inputValues = columnValues(input, stage.value_column, inputLabel);
  const outputValues = columnValues(output, outputColumn, outputLabel);
  const expected = compensatedSum(inputValues) + pool;
  const actual = compensatedSum(outputValues);
  if (!Number.isFinite(expected) || !Number.isFinite(actual)) {
    throw new ComputationError(`Stage "${stage.name}": totals overflowed`, stage.name);
  }
  const magnitude =
    compensatedSum(inputValues.map(Math.abs)) + Math.abs(pool) + compensatedSum(outputValues.map(Math.abs));
  return { expected, actual, allowed: Math.max(tolerance, UNROUNDED_RELATIVE_ERROR * magnitude) };
}

export function checkConservation(
  stage: string,
  expected: number,
  actual: number,
  tolerance: number
): void {
  if (!(Math.abs(actual - expected) <= tolerance)) {
    throw new ConservationError(
      `Stage "${stage}" does not conserve value: ${expected} entered, ${actual} left (tolerance ${tolerance})`,
      stage,
      expected,
      actual
    );
  }
}
