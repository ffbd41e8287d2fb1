import { isValid, parse, parseISO } from "date-fns";
import type { Cell, Row, Table } from "../table/types.js";
import { createTable, filterColumns, matchesFilters, requireColumns } from "../table/helpers.js";
import type { PrepareRules } from "../pipeline/types.js";
import { SchemaError } from "../engine/errors.js";
import { log, type Logger } from "../logger.js";

const DATE_FORMATS = ["yyyy-MM-dd", "yyyy/MM/dd", "dd/MM/yyyy"] as const;
const REFERENCE_DATE = new Date(2000, 0, 1);
// "yyyy" also matches one to three digits; shorter years are not dates in a ledger.
const MIN_YEAR = 1000;

// 1.234,56 / 12,5
const DECIMAL_COMMA = /^-?\d{1,3}(\.\d{3})*,\d+$|^-?\d+,\d+$/;

/**
 * Parse a raw date cell. Date-only strings become UTC midnight of that
 * calendar day; numbers are epoch milliseconds. Returns undefined when the
 * value cannot be read as a date.
 */
export function parseDate(cell: Cell): Date | null | undefined {
  if (cell === null) return null;
  if (cell instanceof Date) return isValid(cell) ? cell : undefined;
  if (typeof cell === "number") {
    const date = new Date(cell);
    return isValid(date) ? date : undefined;
  }
  if (typeof cell !== "string") return undefined;

  const text = cell.trim();
  if (text === "") return null;

  for (const format of DATE_FORMATS) {
    const local = parse(text, format, REFERENCE_DATE);
    if (isValid(local) && local.getFullYear() >= MIN_YEAR) {
      return new Date(Date.UTC(local.getFullYear(), local.getMonth(), local.getDate()));
    }
  }

  const iso = parseISO(text);
  return isValid(iso) ? iso : undefined;
}

/** Parse a raw numeric cell; decimal-comma strings are accepted. */
export function parseNumber(cell: Cell, column: string): number | null {
  if (cell === null) return null;
  if (typeof cell === "number") return cell;
  if (typeof cell === "string") {
    const text = cell.trim();
    if (text === "") return null;
    const normalized = DECIMAL_COMMA.test(text) ? text.replace(/\./g, "").replace(",", ".") : text;
    const value = Number(normalized);
    if (!Number.isNaN(value)) return value;
  }
  throw new SchemaError(
    `Column "${column}" must be numeric, got ${cell instanceof Date ? cell.toISOString() : JSON.stringify(cell)}`,
    column
  );
}

/**
 * Normalize one loaded table into the shape the engine expects. Steps run
 * in the order rename, dates, numbers, where, drop.
 */
export function prepareTable(
  table: Table,
  rules: PrepareRules,
  tableName: string,
  logger: Logger = log
): Table {
  let current = renameColumns(table, rules.rename, tableName);

  requireColumns(current, [...rules.dates, ...rules.numbers], tableName);
  const rows = current.rows.map((row, i) => {
    const next: Record<string, Cell> = { ...row };
    for (const column of rules.dates) {
      const parsed = parseDate(row[column]);
      if (parsed === undefined) {
        logger.warn(
          { event: "rateio.prepare.invalid_date", table: tableName, column, row: i, value: row[column] },
          `unparseable date in ${tableName}.${column}; stored as null`
        );
      }
      next[column] = parsed ?? null;
    }
    for (const column of rules.numbers) {
      try {
        next[column] = parseNumber(row[column], column);
      } catch (error) {
        if (error instanceof SchemaError) {
          throw new SchemaError(`Table "${tableName}" row ${i}: ${error.message}`, column, tableName);
        }
        throw error;
      }
    }
    return next;
  });
  current = { columns: current.columns, rows };

  requireColumns(current, filterColumns(rules.where), tableName);
  current = {
    columns: current.columns,
    rows: current.rows.filter((row) => matchesFilters(row, rules.where)),
  };

  requireColumns(current, rules.drop, tableName);
  const dropped = new Set(rules.drop);
  const kept = current.columns.filter((column) => !dropped.has(column));
  const result = createTable(
    current.rows.map((row) => Object.fromEntries(kept.map((column) => [column, row[column]]))),
    kept
  );

  logger.debug(
    { event: "rateio.prepare.table", table: tableName, rows_in: table.rows.length, rows_out: result.rows.length },
    `prepared ${tableName}`
  );
  return result;
}

/**
 * Prepare every table that has rules; tables without rules pass through.
 * Rules naming a table that was not loaded are an error.
 */
export function prepareTables(
  tables: Readonly<Record<string, Table>>,
  rulesByTable: Readonly<Record<string, PrepareRules>>,
  logger: Logger = log
): Record<string, Table> {
  for (const name of Object.keys(rulesByTable)) {
    if (!(name in tables)) {
      throw new Error(`Prepare rules reference table "${name}", which was not loaded`);
    }
  }

  const prepared: Record<string, Table> = {};
  for (const [name, table] of Object.entries(tables)) {
    const rules = rulesByTable[name];
    prepared[name] = rules ? prepareTable(table, rules, name, logger) : table;
  }
  return prepared;
}

function renameColumns(table: Table, rename: Readonly<Record<string, string>>, tableName: string): Table {
  const from = Object.keys(rename);
  if (from.length === 0) return table;
  requireColumns(table, from, tableName);

  const columns = table.columns.map((column) => rename[column] ?? column);
  const rows = table.rows.map((row): Row => {
    const next: Record<string, Cell> = {};
    for (const column of table.columns) {
      next[rename[column] ?? column] = row[column];
    }
    return next;
  });
  return createTable(rows, columns);
}
