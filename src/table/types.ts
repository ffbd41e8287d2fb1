export type Cell = string | number | boolean | Date | null;

/** One record of a working table. Rows are never mutated once built. */
export type Row = Readonly<Record<string, Cell>>;

/**
 * An ordered batch of rows sharing one schema. Every row carries every
 * column in `columns`; absent cells are stored as null.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/**
 * Row selection predicates. A row passes a filter list only when it passes
 * every entry.
 *
 * `months` matches Date cells by calendar month (1-12, UTC).
 */
export type RowFilter =
  | { column: string; in: Cell[] }
  | { column: string; not_in: Cell[] }
  | { column: string; months: number[] };
