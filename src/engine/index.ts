export { applyStage, resolveDecimals, resolveOutputColumn } from "./stage.js";
export type { StageContext } from "./stage.js";

export { run, runStages, runOptionsFor, checkConservation, stageTotals } from "./run.js";
export type { StageTotals } from "./run.js";
export type { RunOptions, RunResult, StageOutcome } from "./run.js";

export {
  criterionFor,
  splitAmount,
  designatedMember,
  ProportionalByMetric,
  EqualSplit,
} from "./criteria.js";
export type { Criterion, Split } from "./criteria.js";

export {
  RateioError,
  SchemaError,
  UnmatchedKeyError,
  ComputationError,
  ConservationError,
} from "./errors.js";
export type { RateioErrorCode } from "./errors.js";
