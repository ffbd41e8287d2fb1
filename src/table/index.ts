export type { Cell, Row, Table, RowFilter } from "./types.js";

export {
  createTable,
  requireColumns,
  readNumber,
  sumColumn,
  columnValues,
  compensatedSum,
  toMinorUnits,
  sumMinorUnits,
  keyOf,
  pick,
  compareCells,
  compareRows,
  cellEquals,
  matchesFilter,
  matchesFilters,
  filterColumns,
} from "./helpers.js";
