import { after, before, describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { access, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import pino from "pino";
import { execute, loadRunInputs, PipelineValidationError, stageFileName } from "../src/app.js";
import { parsePipeline } from "../src/pipeline/yaml.js";

const logger = pino({ level: "silent" });
const SAMPLE = resolve(process.cwd(), "data/sample");

describe("execute", () => {
  let outputDir: string;

  before(async () => {
    outputDir = await mkdtemp(join(tmpdir(), "rateio-app-"));
  });

  after(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("runs the sample pipeline end to end", async () => {
    const { result, files } = await execute({
      pipelinePath: join(SAMPLE, "pipeline.yaml"),
      rawDir: join(SAMPLE, "raw"),
      outputDir,
      logger,
    });

    assert.deepStrictEqual(files, [join(outputDir, "rateio_etapa1.parquet"), join(outputDir, "rateio_etapa2.parquet")]);
    for (const file of files) await access(file);

    assert.deepStrictEqual(
      result.stages.map(({ name, expected, actual, table }) => [name, expected, actual, table.rows.length]),
      [
        ["canal_segmento", 2230, 2230, 10],
        ["segmento", 2230, 2230, 12],
      ]
    );

    assert.deepStrictEqual(
      result.table.rows.map((row) => [
        row.id_lancamento,
        row.ds_canal_aquisicao,
        row.ds_segmento,
        row.valor_rateado,
        row.etapa_rateio,
      ]),
      [
        [1, "canalA", "varejo", 400, 1],
        [1, "canalB", "atacado", 400, 1],
        [1, "canalB", "varejo", 200, 1],
        [2, "canalA", "varejo", 200, 1],
        [2, "canalB", "atacado", 200, 1],
        [2, "canalB", "varejo", 100, 1],
        [3, null, "atacado", 180, 2],
        [3, null, "varejo", 120, 2],
        [4, null, "atacado", 120, 2],
        [4, null, "varejo", 80, 2],
        [5, null, null, 150, 0],
        [6, null, null, 80, 0],
      ]
    );
  });

  it("keeps the original value on every row", async () => {
    const { result } = await execute({
      pipelinePath: join(SAMPLE, "pipeline.yaml"),
      rawDir: join(SAMPLE, "raw"),
      outputDir,
      logger,
    });
    assert.deepStrictEqual(
      result.table.rows.map((row) => row.valor),
      [1000, 1000, 1000, 500, 500, 500, 300, 300, 200, 200, 150, 80]
    );
  });
});

describe("loadRunInputs", () => {
  let rawDir: string;

  before(async () => {
    rawDir = await mkdtemp(join(tmpdir(), "rateio-inputs-"));
    await writeFile(join(rawDir, "entries.json"), JSON.stringify([{ amount: 10, weight: 1 }]));
  });

  after(async () => {
    await rm(rawDir, { recursive: true, force: true });
  });

  it("rejects a pipeline that reads a missing column", async () => {
    const pipeline = parsePipeline(`
source: entries
stages:
  - name: split
    value_column: value
    metric: { from: row, column: weight }
`);
    await assert.rejects(
      loadRunInputs(pipeline, rawDir, logger),
      (error: unknown) =>
        error instanceof PipelineValidationError &&
        error.errors.length === 1 &&
        error.errors[0].rule === "column-available"
    );
  });

  it("rejects a pipeline whose source was not loaded", async () => {
    const pipeline = parsePipeline("source: ledger\n");
    await assert.rejects(loadRunInputs(pipeline, rawDir, logger), /\[source-table-exists\]/);
  });
});

describe("stageFileName", () => {
  it("numbers files by stage", () => {
    assert.equal(stageFileName(3), "rateio_etapa3.parquet");
  });
});
