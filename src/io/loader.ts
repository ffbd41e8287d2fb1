/**
 * Raw record loading. Every `*.json` file in a directory becomes one table
 * named after the file stem.
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { Cell, Table } from "../table/types.js";
import { createTable } from "../table/helpers.js";
import { log, type Logger } from "../logger.js";

/**
 * Convert parsed JSON into a table. Accepts an array of records, or an
 * object of records keyed by row index (`{"0": {...}, "1": {...}}`).
 */
export function recordsToTable(data: unknown, source: string): Table {
  let records: unknown[];
  if (Array.isArray(data)) {
    records = data;
  } else if (data !== null && typeof data === "object") {
    records = Object.values(data);
  } else {
    throw new Error(`${source}: expected an array or object of records, got ${data === null ? "null" : typeof data}`);
  }

  const rows = records.map((record, i) => {
    if (record === null || typeof record !== "object" || Array.isArray(record)) {
      throw new Error(`${source}: record ${i} is not an object`);
    }
    const row: Record<string, Cell> = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = toCell(value);
    }
    return row;
  });

  return createTable(rows);
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  // nested objects and arrays are carried as JSON text
  return JSON.stringify(value);
}

export async function loadJsonTable(filePath: string): Promise<Table> {
  const content = await readFile(filePath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in ${filePath}`, { cause: error });
  }
  return recordsToTable(data, filePath);
}

/** Load every JSON file in `directory`. Other files are skipped with a warning. */
export async function loadTables(
  directory: string,
  logger: Logger = log
): Promise<Record<string, Table>> {
  const info = await stat(directory).catch((error: unknown) => {
    throw new Error(`Raw data directory not found: ${directory}`, { cause: error });
  });
  if (!info.isDirectory()) {
    throw new Error(`Raw data path is not a directory: ${directory}`);
  }

  const tables: Record<string, Table> = {};
  const entries = await readdir(directory, { withFileTypes: true });
  const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();

  for (const fileName of files) {
    if (extname(fileName).toLowerCase() !== ".json") {
      logger.warn({ event: "rateio.load.skipped", file: fileName }, `unsupported file skipped: ${fileName}`);
      continue;
    }
    const name = basename(fileName, extname(fileName));
    const table = await loadJsonTable(join(directory, fileName));
    tables[name] = table;
    logger.info(
      { event: "rateio.load.table", table: name, rows: table.rows.length, columns: table.columns.length },
      `loaded ${name}`
    );
  }

  return tables;
}
