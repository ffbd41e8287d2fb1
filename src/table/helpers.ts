import type { Cell, Row, RowFilter, Table } from "./types.js";
import { ComputationError, SchemaError } from "../engine/errors.js";

/**
 * Build a table from loose records. Columns are the given list followed by
 * any other keys in first-seen order; every row is padded with nulls so it
 * carries the full schema.
 */
export function createTable(
  records: readonly Readonly<Record<string, Cell>>[],
  columns: readonly string[] = []
): Table {
  const allColumns = [...columns];
  const seen = new Set(allColumns);
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        allColumns.push(key);
      }
    }
  }

  const rows = records.map((record) => {
    const row: Record<string, Cell> = {};
    for (const column of allColumns) {
      row[column] = record[column] ?? null;
    }
    return row;
  });

  return { columns: allColumns, rows };
}

/** Throw SchemaError naming the first required column the table lacks. */
export function requireColumns(
  table: Table,
  required: readonly string[],
  tableName: string
): void {
  const present = new Set(table.columns);
  for (const column of required) {
    if (!present.has(column)) {
      throw new SchemaError(
        `Table "${tableName}" has no column "${column}" (columns: ${table.columns.join(", ")})`,
        column,
        tableName
      );
    }
  }
}

/** Read a numeric cell. Anything but a finite number is rejected. */
export function readNumber(row: Row, column: string, context: string): number {
  const cell = row[column];
  if (typeof cell !== "number") {
    throw new SchemaError(
      `${context}: column "${column}" must be numeric, got ${describeCell(cell)}`,
      column
    );
  }
  if (!Number.isFinite(cell)) {
    throw new ComputationError(`${context}: column "${column}" holds non-finite value ${cell}`);
  }
  return cell;
}

export function columnValues(table: Table, column: string, context: string): number[] {
  return table.rows.map((row) => readNumber(row, column, context));
}

/** Neumaier-compensated sum; the result does not depend on how large the running total grows. */
export function compensatedSum(values: Iterable<number>): number {
  let sum = 0;
  let compensation = 0;
  for (const value of values) {
    const next = sum + value;
    compensation += Math.abs(sum) >= Math.abs(value) ? sum - next + value : value - next + sum;
    sum = next;
  }
  return sum + compensation;
}

export function sumColumn(table: Table, column: string, context: string): number {
  const total = compensatedSum(columnValues(table, column, context));
  if (!Number.isFinite(total)) {
    throw new ComputationError(`${context}: sum of "${column}" overflowed`);
  }
  return total;
}

/** `value` as a whole count of 10^-decimals units. */
export function toMinorUnits(value: number, decimals: number): number {
  return Math.round(value * 10 ** decimals);
}

/** Sum of a column in minor units; exact while it stays within the safe integer range. */
export function sumMinorUnits(table: Table, column: string, decimals: number, context: string): number {
  let total = 0;
  for (const value of columnValues(table, column, context)) {
    total += toMinorUnits(value, decimals);
  }
  if (!Number.isSafeInteger(total)) {
    throw new ComputationError(
      `${context}: sum of "${column}" exceeds the exact range at ${decimals} decimals`
    );
  }
  return total;
}

/** Stable string identity of a row's cells under the given columns. */
export function keyOf(row: Row, columns: readonly string[]): string {
  return JSON.stringify(
    columns.map((column) => {
      const cell = row[column] ?? null;
      return cell instanceof Date ? { date: cell.toISOString() } : cell;
    })
  );
}

export function pick(row: Row, columns: readonly string[]): Record<string, Cell> {
  const picked: Record<string, Cell> = {};
  for (const column of columns) {
    picked[column] = row[column] ?? null;
  }
  return picked;
}

const TYPE_RANK = { null: 0, boolean: 1, number: 2, date: 3, string: 4 } as const;

function rankOf(cell: Cell): number {
  if (cell === null) return TYPE_RANK.null;
  if (cell instanceof Date) return TYPE_RANK.date;
  if (typeof cell === "boolean") return TYPE_RANK.boolean;
  if (typeof cell === "number") return TYPE_RANK.number;
  return TYPE_RANK.string;
}

/**
 * Total order over cells: nulls first, then booleans, numbers, dates and
 * strings. Strings compare by code unit so the order does not depend on
 * the host locale.
 */
export function compareCells(a: Cell, b: Cell): number {
  const rankA = rankOf(a);
  const rankB = rankOf(b);
  if (rankA !== rankB) return rankA - rankB;
  if (a === null || b === null) return 0;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export function compareRows(a: Row, b: Row, columns: readonly string[]): number {
  for (const column of columns) {
    const order = compareCells(a[column] ?? null, b[column] ?? null);
    if (order !== 0) return order;
  }
  return 0;
}

export function cellEquals(a: Cell, b: Cell): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b;
}

export function matchesFilter(row: Row, filter: RowFilter): boolean {
  const cell = row[filter.column] ?? null;
  if ("in" in filter) {
    return filter.in.some((candidate) => cellEquals(cell, candidate));
  }
  if ("not_in" in filter) {
    return !filter.not_in.some((candidate) => cellEquals(cell, candidate));
  }
  if (!(cell instanceof Date)) return false;
  return filter.months.includes(cell.getUTCMonth() + 1);
}

export function matchesFilters(row: Row, filters: readonly RowFilter[]): boolean {
  return filters.every((filter) => matchesFilter(row, filter));
}

export function filterColumns(filters: readonly RowFilter[]): string[] {
  return filters.map((f) => f.column);
}

function describeCell(cell: Cell | undefined): string {
  if (cell === undefined || cell === null) return "null";
  if (cell instanceof Date) return `date ${cell.toISOString()}`;
  return `${typeof cell} ${JSON.stringify(cell)}`;
}
