export * from "./table/index.js";
export * from "./engine/index.js";
export * from "./pipeline/index.js";

export { loadTables, loadJsonTable, recordsToTable } from "./io/loader.js";
export { writeParquet, inferParquetSchema } from "./io/writer.js";
export type { ParquetField, ParquetFieldType } from "./io/writer.js";
export { prepareTable, prepareTables, parseDate, parseNumber } from "./prepare/prepare.js";
export { execute, loadRunInputs, catalogOf, stageFileName, PipelineValidationError } from "./app.js";
export type { ExecuteOptions, ExecuteResult } from "./app.js";
export { createLogger, log } from "./logger.js";
export type { Logger } from "./logger.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
