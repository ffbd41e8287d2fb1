import type { RowFilter } from "../table/types.js";

export type CriterionKind = "proportional" | "equal";

/** What a proportional criterion does when a group's metrics sum to zero. */
export type ZeroMetricPolicy = "equal_split" | "fail";

/** Value-side scopes with no metric entries. */
export type UnmatchedValuePolicy = "fail" | "passthrough";

/** Metric-side scopes with no value rows to allocate. */
export type UnmatchedMetricPolicy = "drop" | "zero_fill" | "fail";

export type CriterionDef =
  | {
      kind: "proportional";
      zero_metric: ZeroMetricPolicy;
      allow_negative: boolean;
    }
  | { kind: "equal" };

/**
 * Where a stage's driver comes from.
 *
 * `row`: the metric is a column of the rows being allocated, and the members
 * of each group are those rows.
 *
 * `table`: the metric lives in a separate table. Members are the distinct
 * `target` keys within each scope, and each allocated row expands into one
 * row per member.
 */
export type MetricSource =
  | { from: "row"; column?: string }
  | {
      from: "table";
      table: string;
      column?: string;
      target: string[];
      where: RowFilter[];
    };

export interface StageDef {
  name: string;
  value_column: string;
  /** Defaults to the pipeline's output_column. */
  output_column?: string;
  /** Externally supplied amount allocated across the metric table's targets. */
  pool?: number;
  where: RowFilter[];
  group_by: string[];
  criterion: CriterionDef;
  metric: MetricSource;
  on_unmatched_value: UnmatchedValuePolicy;
  on_unmatched_metric: UnmatchedMetricPolicy;
  /** Minor-unit precision; null disables rounding. Defaults to the pipeline's. */
  decimals?: number | null;
}

/**
 * Record preparation for one loaded table. Steps run in the order
 * rename, dates, numbers, where, drop.
 */
export interface PrepareRules {
  rename: Record<string, string>;
  dates: string[];
  numbers: string[];
  where: RowFilter[];
  drop: string[];
}

export interface Pipeline {
  /** Name of the loaded table holding the values to allocate. */
  source: string;
  output_column: string;
  stage_column: string;
  tolerance: number;
  decimals: number | null;
  prepare: Record<string, PrepareRules>;
  stages: StageDef[];
}

export const DEFAULT_OUTPUT_COLUMN = "allocated_value";
export const DEFAULT_STAGE_COLUMN = "allocation_stage";
export const DEFAULT_TOLERANCE = 1e-6;
export const DEFAULT_DECIMALS = 2;
