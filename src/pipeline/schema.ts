import { z } from "zod";
import {
  DEFAULT_DECIMALS,
  DEFAULT_OUTPUT_COLUMN,
  DEFAULT_STAGE_COLUMN,
  DEFAULT_TOLERANCE,
  type Pipeline,
} from "./types.js";

const ColumnName = z.string().min(1);

// js-yaml turns unquoted timestamps into Date, so filters may carry dates.
const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.date(), z.null()]);

const RowFilterSchema = z.union([
  z.object({ column: ColumnName, in: z.array(CellSchema) }).strict(),
  z.object({ column: ColumnName, not_in: z.array(CellSchema) }).strict(),
  z
    .object({ column: ColumnName, months: z.array(z.number().int().min(1).max(12)).min(1) })
    .strict(),
]);

const Decimals = z.number().int().min(0).max(10).nullable();

const CriterionSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("proportional"),
      zero_metric: z.enum(["equal_split", "fail"]).default("equal_split"),
      allow_negative: z.boolean().default(false),
    })
    .strict(),
  z.object({ kind: z.literal("equal") }).strict(),
]);

const MetricSchema = z.discriminatedUnion("from", [
  z.object({ from: z.literal("row"), column: ColumnName.optional() }).strict(),
  z
    .object({
      from: z.literal("table"),
      table: ColumnName,
      column: ColumnName.optional(),
      target: z.array(ColumnName),
      where: z.array(RowFilterSchema).default([]),
    })
    .strict(),
]);

const StageSchema = z
  .object({
    name: z.string().min(1),
    value_column: ColumnName,
    output_column: ColumnName.optional(),
    pool: z.number().finite().optional(),
    where: z.array(RowFilterSchema).default([]),
    group_by: z.array(ColumnName).default([]),
    criterion: CriterionSchema.default({ kind: "proportional" }),
    metric: MetricSchema,
    on_unmatched_value: z.enum(["fail", "passthrough"]).default("fail"),
    on_unmatched_metric: z.enum(["drop", "zero_fill", "fail"]).default("drop"),
    decimals: Decimals.optional(),
  })
  .strict();

const PrepareSchema = z
  .object({
    rename: z.record(z.string(), ColumnName).default({}),
    dates: z.array(ColumnName).default([]),
    numbers: z.array(ColumnName).default([]),
    where: z.array(RowFilterSchema).default([]),
    drop: z.array(ColumnName).default([]),
  })
  .strict();

/**
 * Structural schema of a pipeline manifest. Fills defaults; semantic rules
 * (duplicate names, column availability, …) live in validate().
 */
export const PipelineSchema: z.ZodType<Pipeline, z.ZodTypeDef, unknown> = z
  .object({
    source: z.string().min(1),
    output_column: ColumnName.default(DEFAULT_OUTPUT_COLUMN),
    stage_column: ColumnName.default(DEFAULT_STAGE_COLUMN),
    tolerance: z.number().default(DEFAULT_TOLERANCE),
    decimals: Decimals.default(DEFAULT_DECIMALS),
    prepare: z.record(z.string(), PrepareSchema).default({}),
    stages: z.array(StageSchema).default([]),
  })
  .strict();
