import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { applyStage, type StageContext } from "../../src/engine/stage.js";
import { ComputationError, SchemaError, UnmatchedKeyError } from "../../src/engine/errors.js";
import { createTable } from "../../src/table/helpers.js";
import type { Table } from "../../src/table/types.js";
import type { StageDef } from "../../src/pipeline/types.js";

function stageDef(overrides: Partial<StageDef> & Pick<StageDef, "metric">): StageDef {
  return {
    name: "test_stage",
    value_column: "value",
    where: [],
    group_by: [],
    criterion: { kind: "proportional", zero_metric: "equal_split", allow_negative: false },
    on_unmatched_value: "fail",
    on_unmatched_metric: "drop",
    ...overrides,
  };
}

function context(drivers: Record<string, Table> = {}, index = 1): StageContext {
  return {
    index,
    drivers,
    stageColumn: "allocation_stage",
    defaults: { outputColumn: "allocated_value", decimals: 2 },
  };
}

function allocated(table: Table): unknown[] {
  return table.rows.map((row) => row.allocated_value);
}

describe("applyStage with row metrics", () => {
  const members = createTable([
    { center_id: "c1", segment_id: "s1", value: 40, headcount: 1, note: "north" },
    { center_id: "c2", segment_id: "s1", value: 30, headcount: 1, note: "south" },
    { center_id: "c3", segment_id: "s1", value: 30, headcount: 2, note: "east" },
  ]);

  it("splits the group total in proportion to the metric", () => {
    const out = applyStage(
      members,
      stageDef({ group_by: ["segment_id"], metric: { from: "row", column: "headcount" } }),
      context()
    );
    assert.deepStrictEqual(allocated(out), [25, 25, 50]);
    assert.deepStrictEqual(
      out.rows.map((row) => row.allocation_stage),
      [1, 1, 1]
    );
  });

  it("splits equally with the residual on the first member when metrics are all zero", () => {
    const zeroed = createTable(members.rows.map((row) => ({ ...row, headcount: 0 })));
    const out = applyStage(
      zeroed,
      stageDef({ group_by: ["segment_id"], metric: { from: "row", column: "headcount" } }),
      context()
    );
    assert.deepStrictEqual(allocated(out), [33.34, 33.33, 33.33]);
  });

  it("keeps descriptive columns unchanged", () => {
    const out = applyStage(
      members,
      stageDef({ metric: { from: "row", column: "headcount" } }),
      context()
    );
    assert.deepStrictEqual(
      out.rows.map((row) => [row.center_id, row.segment_id, row.value, row.note]),
      members.rows.map((row) => [row.center_id, row.segment_id, row.value, row.note])
    );
    assert.deepStrictEqual(out.columns, [
      "center_id", "segment_id", "value", "headcount", "note", "allocated_value", "allocation_stage",
    ]);
  });

  it("allocates each group independently", () => {
    const table = createTable([
      { segment_id: "s1", value: 60, headcount: 1 },
      { segment_id: "s2", value: 10, headcount: 5 },
      { segment_id: "s1", value: 0, headcount: 2 },
    ]);
    const out = applyStage(
      table,
      stageDef({ group_by: ["segment_id"], metric: { from: "row", column: "headcount" } }),
      context()
    );
    assert.deepStrictEqual(allocated(out), [20, 10, 40]);
  });

  it("passes unselected rows through with their value and stage 0", () => {
    const out = applyStage(
      members,
      stageDef({
        where: [{ column: "center_id", not_in: ["c3"] }],
        metric: { from: "row", column: "headcount" },
      }),
      context()
    );
    assert.deepStrictEqual(allocated(out), [35, 35, 30]);
    assert.deepStrictEqual(
      out.rows.map((row) => row.allocation_stage),
      [1, 1, 0]
    );
  });

  it("splits equally under the equal criterion without a metric column", () => {
    const out = applyStage(
      members,
      stageDef({ criterion: { kind: "equal" }, metric: { from: "row" } }),
      context()
    );
    assert.deepStrictEqual(allocated(out), [33.34, 33.33, 33.33]);
  });

  it("does not modify its input", () => {
    const before = JSON.stringify(members);
    applyStage(members, stageDef({ metric: { from: "row", column: "headcount" } }), context());
    assert.equal(JSON.stringify(members), before);
  });

  it("honours a stage-level decimals override", () => {
    const table = createTable([
      { value: 1, headcount: 1 },
      { value: 0, headcount: 2 },
    ]);
    const out = applyStage(
      table,
      stageDef({ decimals: null, metric: { from: "row", column: "headcount" } }),
      context()
    );
    const [first, second] = allocated(out);
    assert.equal(typeof first, "number");
    assert.equal(typeof second, "number");
    assert.ok(Math.abs(Number(first) - 1 / 3) < 1e-12);
    assert.ok(Math.abs(Number(first) + Number(second) - 1) < 1e-12);
  });
});

describe("applyStage with a metric table", () => {
  const companyTotal = createTable([
    { center_id: "X", segment_id: null, value: 1000, description: "company overhead" },
  ]);
  const segmentWeights = createTable([
    { segment_id: "B", revenue: 40 },
    { segment_id: "A", revenue: 60 },
  ]);

  it("expands each selected row into one row per target in key order", () => {
    const out = applyStage(
      companyTotal,
      stageDef({ metric: { from: "table", table: "revenue", column: "revenue", target: ["segment_id"], where: [] } }),
      context({ revenue: segmentWeights })
    );
    assert.deepStrictEqual(out.rows, [
      {
        center_id: "X",
        segment_id: "A",
        value: 1000,
        description: "company overhead",
        allocated_value: 600,
        allocation_stage: 1,
      },
      {
        center_id: "X",
        segment_id: "B",
        value: 1000,
        description: "company overhead",
        allocated_value: 400,
        allocation_stage: 1,
      },
    ]);
  });

  it("sums metric rows that share a target and honours metric filters", () => {
    const metrics = createTable([
      { segment_id: "A", revenue: 10, kind: "actual" },
      { segment_id: "A", revenue: 20, kind: "actual" },
      { segment_id: "B", revenue: 30, kind: "actual" },
      { segment_id: "B", revenue: 500, kind: "budget" },
    ]);
    const out = applyStage(
      companyTotal,
      stageDef({
        metric: {
          from: "table",
          table: "revenue",
          column: "revenue",
          target: ["segment_id"],
          where: [{ column: "kind", in: ["actual"] }],
        },
      }),
      context({ revenue: metrics })
    );
    assert.deepStrictEqual(allocated(out), [500, 500]);
  });

  const bySegment = createTable([
    { center_id: "X", segment_id: "A", allocated_value: 600 },
    { center_id: "X", segment_id: "B", allocated_value: 400 },
  ]);
  const centerWeights = createTable([
    { segment_id: "A", center_id: "c1", weight: 3 },
    { segment_id: "A", center_id: "c2", weight: 1 },
    { segment_id: "B", center_id: "c9", weight: 5 },
  ]);
  const cascade = (overrides: Partial<StageDef> = {}): StageDef =>
    stageDef({
      value_column: "allocated_value",
      group_by: ["segment_id"],
      metric: { from: "table", table: "centers", column: "weight", target: ["center_id"], where: [] },
      ...overrides,
    });

  it("matches value rows to metric rows on the grouping scope", () => {
    const out = applyStage(bySegment, cascade(), context({ centers: centerWeights }, 2));
    assert.deepStrictEqual(
      out.rows.map((row) => [row.center_id, row.segment_id, row.allocated_value, row.allocation_stage]),
      [
        ["c1", "A", 450, 2],
        ["c2", "A", 150, 2],
        ["c9", "B", 400, 2],
      ]
    );
  });

  it("fails on a value scope with no metric entries", () => {
    const withOrphan = createTable([...bySegment.rows, { center_id: "X", segment_id: "C", allocated_value: 5 }]);
    assert.throws(
      () => applyStage(withOrphan, cascade(), context({ centers: centerWeights })),
      (error: unknown) =>
        error instanceof UnmatchedKeyError && error.key === '["C"]' && error.stage === "test_stage"
    );
  });

  it("passes unmatched value rows through when configured to", () => {
    const withOrphan = createTable([...bySegment.rows, { center_id: "X", segment_id: "C", allocated_value: 5 }]);
    const out = applyStage(
      withOrphan,
      cascade({ on_unmatched_value: "passthrough" }),
      context({ centers: centerWeights })
    );
    assert.deepStrictEqual(out.rows[3], {
      center_id: "X",
      segment_id: "C",
      allocated_value: 5,
      allocation_stage: 0,
    });
  });

  it("drops metric scopes without value rows by default", () => {
    const out = applyStage(
      bySegment,
      cascade({ where: [{ column: "segment_id", in: ["A"] }] }),
      context({ centers: centerWeights })
    );
    assert.deepStrictEqual(
      out.rows.map((row) => [row.center_id, row.segment_id, row.allocated_value]),
      [
        ["c1", "A", 450],
        ["c2", "A", 150],
        ["X", "B", 400],
      ]
    );
  });

  it("zero-fills metric scopes without value rows when configured to", () => {
    const out = applyStage(
      bySegment,
      cascade({ where: [{ column: "segment_id", in: ["A"] }], on_unmatched_metric: "zero_fill" }),
      context({ centers: centerWeights })
    );
    assert.equal(out.rows.length, 4);
    assert.deepStrictEqual(out.rows[3], {
      center_id: "c9",
      segment_id: "B",
      allocated_value: 0,
      allocation_stage: 1,
    });
  });

  it("fails on metric scopes without value rows when configured to", () => {
    assert.throws(
      () =>
        applyStage(
          bySegment,
          cascade({ where: [{ column: "segment_id", in: ["A"] }], on_unmatched_metric: "fail" }),
          context({ centers: centerWeights })
        ),
      (error: unknown) => error instanceof UnmatchedKeyError && error.key === '["B"]'
    );
  });

  it("splits equally across targets whose metrics are all zero", () => {
    const zeroed = createTable([
      { segment_id: "A", revenue: 0 },
      { segment_id: "B", revenue: 0 },
      { segment_id: "C", revenue: 0 },
    ]);
    const out = applyStage(
      createTable([{ value: 100 }]),
      stageDef({ metric: { from: "table", table: "revenue", column: "revenue", target: ["segment_id"], where: [] } }),
      context({ revenue: zeroed })
    );
    assert.deepStrictEqual(
      out.rows.map((row) => [row.segment_id, row.allocated_value]),
      [
        ["A", 33.34],
        ["B", 33.33],
        ["C", 33.33],
      ]
    );
  });

  it("allocates an external pool as new rows", () => {
    const weights = createTable([
      { segment_id: "A", revenue: 1 },
      { segment_id: "B", revenue: 2 },
    ]);
    const out = applyStage(
      companyTotal,
      stageDef({
        pool: 90,
        metric: { from: "table", table: "revenue", column: "revenue", target: ["segment_id"], where: [] },
      }),
      context({ revenue: weights })
    );
    assert.deepStrictEqual(
      out.rows.map((row) => [row.center_id, row.segment_id, row.allocated_value, row.allocation_stage]),
      [
        ["X", null, 1000, 0],
        [null, "A", 30, 1],
        [null, "B", 60, 1],
      ]
    );
  });

  it("fails when a pool has no targets", () => {
    assert.throws(
      () =>
        applyStage(
          companyTotal,
          stageDef({
            pool: 90,
            metric: { from: "table", table: "revenue", column: "revenue", target: ["segment_id"], where: [] },
          }),
          context({ revenue: createTable([], ["segment_id", "revenue"]) })
        ),
      UnmatchedKeyError
    );
  });
});

describe("applyStage errors", () => {
  const table = createTable([{ value: 10, headcount: 1 }]);

  it("raises SchemaError for a missing value column", () => {
    assert.throws(
      () => applyStage(table, stageDef({ value_column: "amount", metric: { from: "row", column: "headcount" } }), context()),
      (error: unknown) => error instanceof SchemaError && error.column === "amount"
    );
  });

  it("raises SchemaError for a missing metric column", () => {
    assert.throws(
      () => applyStage(table, stageDef({ metric: { from: "row", column: "revenue" } }), context()),
      (error: unknown) => error instanceof SchemaError && error.column === "revenue"
    );
  });

  it("raises SchemaError for a metric table that was not provided", () => {
    assert.throws(
      () =>
        applyStage(
          table,
          stageDef({ metric: { from: "table", table: "missing", column: "w", target: ["segment_id"], where: [] } }),
          context()
        ),
      (error: unknown) => error instanceof SchemaError && error.table === "missing"
    );
  });

  it("raises SchemaError for a non-numeric value", () => {
    const bad = createTable([{ value: "10", headcount: 1 }]);
    assert.throws(
      () => applyStage(bad, stageDef({ metric: { from: "row", column: "headcount" } }), context()),
      SchemaError
    );
  });

  it("raises ComputationError for a non-finite value", () => {
    const bad = createTable([{ value: Number.POSITIVE_INFINITY, headcount: 1 }]);
    assert.throws(
      () => applyStage(bad, stageDef({ metric: { from: "row", column: "headcount" } }), context()),
      ComputationError
    );
  });

  it("raises ComputationError for negative metrics in a proportional split", () => {
    const bad = createTable([
      { value: 10, headcount: 3 },
      { value: 0, headcount: -1 },
    ]);
    assert.throws(
      () => applyStage(bad, stageDef({ metric: { from: "row", column: "headcount" } }), context()),
      (error: unknown) => error instanceof ComputationError && error.stage === "test_stage"
    );
  });

  it("keeps the untagged error as the cause when naming the stage", () => {
    const bad = createTable([
      { value: 10, headcount: 3 },
      { value: 0, headcount: -1 },
    ]);
    assert.throws(
      () => applyStage(bad, stageDef({ metric: { from: "row", column: "headcount" } }), context()),
      (error: unknown) =>
        error instanceof ComputationError &&
        error.cause instanceof ComputationError &&
        error.cause.stage === undefined &&
        error.cause.message === error.message &&
        typeof error.cause.stack === "string"
    );
  });
});
