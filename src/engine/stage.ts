import type { Cell, Row, RowFilter, Table } from "../table/types.js";
import {
  compareRows,
  createTable,
  filterColumns,
  keyOf,
  matchesFilters,
  pick,
  readNumber,
  requireColumns,
} from "../table/helpers.js";
import type { StageDef } from "../pipeline/types.js";
import { criterionFor, splitAmount, type Criterion } from "./criteria.js";
import { ComputationError, SchemaError, UnmatchedKeyError } from "./errors.js";

export interface StageContext {
  /** 1-based position of the stage; written to the stage column of allocated rows. */
  index: number;
  /** Metric tables by name. */
  drivers: Readonly<Record<string, Table>>;
  stageColumn: string;
  defaults: {
    outputColumn: string;
    decimals: number | null;
  };
}

/** A recipient of a table-driven split: its key cells and summed metric. */
interface Member {
  cells: Record<string, Cell>;
  weight: number;
}

interface Scope {
  key: string;
  members: Member[];
}

export function resolveOutputColumn(stage: StageDef, context: StageContext): string {
  return stage.output_column ?? context.defaults.outputColumn;
}

export function resolveDecimals(stage: StageDef, context: StageContext): number | null {
  return stage.decimals === undefined ? context.defaults.decimals : stage.decimals;
}

/**
 * Apply one allocation stage. The input table is left untouched; the result
 * is a new table holding every input column plus the output and stage
 * columns (and, for table-driven stages, the target columns).
 */
export function applyStage(input: Table, stage: StageDef, context: StageContext): Table {
  try {
    return allocate(input, stage, context);
  } catch (error) {
    if (error instanceof ComputationError && error.stage === undefined) {
      throw new ComputationError(error.message, stage.name, { cause: error });
    }
    throw error;
  }
}

function allocate(input: Table, stage: StageDef, context: StageContext): Table {
  const criterion = criterionFor(stage.criterion);
  const metricColumn = stage.metric.column;
  if (criterion.kind === "proportional" && metricColumn === undefined) {
    throw new SchemaError(
      `Stage "${stage.name}" uses a proportional criterion but names no metric column`,
      "metric.column"
    );
  }

  const inputName = `input of stage "${stage.name}"`;
  requireColumns(
    input,
    [stage.value_column, ...filterColumns(stage.where), ...stage.group_by],
    inputName
  );

  const run = new StageRun(input, stage, context, criterion);
  if (stage.metric.from === "row") {
    if (criterion.kind === "proportional" && metricColumn !== undefined) {
      requireColumns(input, [metricColumn], inputName);
    }
    return run.withinRows(metricColumn);
  }

  const driver = context.drivers[stage.metric.table];
  if (driver === undefined) {
    throw new SchemaError(
      `Stage "${stage.name}" reads metric table "${stage.metric.table}", which was not provided`,
      stage.metric.column ?? stage.metric.table,
      stage.metric.table
    );
  }
  requireColumns(
    driver,
    [
      ...(criterion.kind === "proportional" && metricColumn !== undefined ? [metricColumn] : []),
      ...stage.metric.target,
      ...stage.group_by,
      ...filterColumns(stage.metric.where),
    ],
    stage.metric.table
  );

  const scopes = run.collectScopes(driver, stage.metric.target, stage.metric.where, metricColumn);
  return stage.pool === undefined
    ? run.expandRows(scopes, stage.metric.target)
    : run.allocatePool(stage.pool, scopes);
}

class StageRun {
  private readonly outputColumn: string;
  private readonly decimals: number | null;
  private readonly label: string;

  constructor(
    private readonly input: Table,
    private readonly stage: StageDef,
    private readonly context: StageContext,
    private readonly criterion: Criterion
  ) {
    this.outputColumn = resolveOutputColumn(stage, context);
    this.decimals = resolveDecimals(stage, context);
    this.label = `Stage "${stage.name}"`;
  }

  /** Members are the selected rows themselves, grouped by `group_by`. */
  withinRows(metricColumn: string | undefined): Table {
    const groups = new Map<string, number[]>();
    this.input.rows.forEach((row, i) => {
      if (!matchesFilters(row, this.stage.where)) return;
      const key = keyOf(row, this.stage.group_by);
      const members = groups.get(key);
      if (members) members.push(i);
      else groups.set(key, [i]);
    });

    const out = this.input.rows.map((row) => this.passThrough(row));
    for (const [key, indices] of groups) {
      const context = `${this.label} group ${key}`;
      const rows = indices.map((i) => this.input.rows[i]);
      let total = 0;
      for (const row of rows) total += readNumber(row, this.stage.value_column, context);

      const weights = rows.map((row) =>
        this.criterion.kind === "proportional" && metricColumn !== undefined
          ? readNumber(row, metricColumn, context)
          : 1
      );
      const split = splitAmount(total, this.criterion.shares(weights, context), this.decimals, context);
      indices.forEach((rowIndex, member) => {
        out[rowIndex] = this.allocated(this.input.rows[rowIndex], {}, split.amounts[member]);
      });
    }

    return this.toTable(out, []);
  }

  /**
   * Aggregate the metric table into scopes keyed by `group_by`, each holding
   * its distinct targets in ascending key order. Rows sharing a target are
   * summed.
   */
  collectScopes(
    driver: Table,
    target: readonly string[],
    where: readonly RowFilter[],
    metricColumn: string | undefined
  ): Map<string, Scope> {
    const keyColumns = [...this.stage.group_by, ...target];
    const byScope = new Map<string, Map<string, Member>>();

    for (const row of driver.rows) {
      if (!matchesFilters(row, where)) continue;
      const scopeKey = keyOf(row, this.stage.group_by);
      const memberKey = keyOf(row, keyColumns);
      const weight =
        this.criterion.kind === "proportional" && metricColumn !== undefined
          ? readNumber(row, metricColumn, `${this.label} metric table "${this.metricTableName()}"`)
          : 0;

      let members = byScope.get(scopeKey);
      if (!members) {
        members = new Map();
        byScope.set(scopeKey, members);
      }
      const existing = members.get(memberKey);
      if (existing) existing.weight += weight;
      else members.set(memberKey, { cells: pick(row, keyColumns), weight });
    }

    const scopes = new Map<string, Scope>();
    for (const [key, members] of byScope) {
      const ordered = [...members.values()].sort((a, b) => compareRows(a.cells, b.cells, target));
      scopes.set(key, { key, members: ordered });
    }
    return scopes;
  }

  /** Expand every selected row into one row per member of its scope. */
  expandRows(scopes: Map<string, Scope>, target: readonly string[]): Table {
    const sharesByScope = new Map<string, number[]>();
    const matched = new Set<string>();
    const out: Row[] = [];

    for (const row of this.input.rows) {
      if (!matchesFilters(row, this.stage.where)) {
        out.push(this.passThrough(row));
        continue;
      }

      const key = keyOf(row, this.stage.group_by);
      const scope = scopes.get(key);
      if (!scope) {
        if (this.stage.on_unmatched_value === "fail") {
          throw new UnmatchedKeyError(
            `${this.label}: value scope ${key} has no entries in metric table "${this.metricTableName()}"`,
            this.stage.name,
            key
          );
        }
        out.push(this.passThrough(row));
        continue;
      }
      matched.add(key);

      const context = `${this.label} scope ${key}`;
      let shares = sharesByScope.get(key);
      if (!shares) {
        shares = this.criterion.shares(scope.members.map((m) => m.weight), context);
        sharesByScope.set(key, shares);
      }
      const value = readNumber(row, this.stage.value_column, context);
      const split = splitAmount(value, shares, this.decimals, context);
      scope.members.forEach((member, i) => {
        out.push(this.allocated(row, member.cells, split.amounts[i]));
      });
    }

    for (const scope of scopes.values()) {
      if (matched.has(scope.key)) continue;
      switch (this.stage.on_unmatched_metric) {
        case "drop":
          break;
        case "fail":
          throw new UnmatchedKeyError(
            `${this.label}: metric scope ${scope.key} has no value rows to allocate`,
            this.stage.name,
            scope.key
          );
        case "zero_fill":
          for (const member of scope.members) {
            out.push(this.zeroFilled(member.cells));
          }
          break;
      }
    }

    return this.toTable(out, [...this.stage.group_by, ...target]);
  }

  /** Input rows pass through; the pool becomes one new row per member. */
  allocatePool(pool: number, scopes: Map<string, Scope>): Table {
    const members = [...scopes.values()].flatMap((scope) => scope.members);
    if (members.length === 0) {
      throw new UnmatchedKeyError(
        `${this.label}: pool of ${pool} has no targets in metric table "${this.metricTableName()}"`,
        this.stage.name,
        "[]"
      );
    }

    const context = `${this.label} pool`;
    const shares = this.criterion.shares(members.map((m) => m.weight), context);
    const split = splitAmount(pool, shares, this.decimals, context);

    const out = this.input.rows.map((row) => this.passThrough(row));
    members.forEach((member, i) => {
      out.push(this.allocated({}, member.cells, split.amounts[i]));
    });

    return this.toTable(out, Object.keys(members[0].cells));
  }

  private passThrough(row: Row): Row {
    if (this.outputColumn === this.stage.value_column) {
      return { ...row, [this.context.stageColumn]: row[this.context.stageColumn] ?? 0 };
    }
    return {
      ...row,
      [this.outputColumn]: readNumber(row, this.stage.value_column, `${this.label} pass-through`),
      [this.context.stageColumn]: row[this.context.stageColumn] ?? 0,
    };
  }

  private allocated(row: Row, memberCells: Record<string, Cell>, amount: number): Row {
    return {
      ...row,
      ...memberCells,
      [this.outputColumn]: amount,
      [this.context.stageColumn]: this.context.index,
    };
  }

  private zeroFilled(memberCells: Record<string, Cell>): Row {
    return {
      ...memberCells,
      [this.stage.value_column]: 0,
      [this.outputColumn]: 0,
      [this.context.stageColumn]: this.context.index,
    };
  }

  private metricTableName(): string {
    return this.stage.metric.from === "table" ? this.stage.metric.table : "<rows>";
  }

  private toTable(rows: Row[], addedColumns: readonly string[]): Table {
    return createTable(rows, [
      ...this.input.columns,
      ...addedColumns,
      this.outputColumn,
      this.context.stageColumn,
    ]);
  }
}
