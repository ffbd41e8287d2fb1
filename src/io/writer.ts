/**
 * Columnar output. Tables are written as Parquet with one optional field per
 * column; the field type is inferred from the column's non-null cells.
 */

import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import type { Cell, Table } from "../table/types.js";
import { log, type Logger } from "../logger.js";

export type ParquetFieldType = "UTF8" | "DOUBLE" | "BOOLEAN" | "TIMESTAMP_MILLIS";

export interface ParquetField {
  type: ParquetFieldType;
  optional: true;
}

/**
 * All-number columns become DOUBLE, all-boolean BOOLEAN, all-date
 * TIMESTAMP_MILLIS. Mixed or empty columns fall back to UTF8.
 */
export function inferParquetSchema(table: Table): Record<string, ParquetField> {
  const fields: Record<string, ParquetField> = {};
  for (const column of table.columns) {
    fields[column] = { type: inferColumnType(table, column), optional: true };
  }
  return fields;
}

function inferColumnType(table: Table, column: string): ParquetFieldType {
  let type: ParquetFieldType | undefined;
  for (const row of table.rows) {
    const cell = row[column] ?? null;
    if (cell === null) continue;
    const cellType = typeOfCell(cell);
    if (type === undefined) type = cellType;
    else if (type !== cellType) return "UTF8";
  }
  return type ?? "UTF8";
}

function typeOfCell(cell: Exclude<Cell, null>): ParquetFieldType {
  if (cell instanceof Date) return "TIMESTAMP_MILLIS";
  if (typeof cell === "number") return "DOUBLE";
  if (typeof cell === "boolean") return "BOOLEAN";
  return "UTF8";
}

function toParquetValue(cell: Cell, type: ParquetFieldType): string | number | boolean | Date | undefined {
  if (cell === null) return undefined;
  if (type === "UTF8") return cell instanceof Date ? cell.toISOString() : String(cell);
  return cell;
}

export async function writeParquet(
  table: Table,
  filePath: string,
  logger: Logger = log
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const fields = inferParquetSchema(table);
  const writer = await ParquetWriter.openFile(new ParquetSchema(fields), filePath);
  try {
    for (const row of table.rows) {
      const record: Record<string, string | number | boolean | Date> = {};
      for (const column of table.columns) {
        const value = toParquetValue(row[column] ?? null, fields[column].type);
        if (value !== undefined) record[column] = value;
      }
      await writer.appendRow(record);
    }
  } finally {
    await writer.close();
  }

  logger.info(
    { event: "rateio.write.parquet", path: filePath, rows: table.rows.length },
    `wrote ${table.rows.length} rows to ${filePath}`
  );
}
