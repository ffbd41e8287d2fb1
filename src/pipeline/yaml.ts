import * as fs from "node:fs";
import * as yaml from "js-yaml";
import type { Pipeline } from "./types.js";
import { PipelineSchema } from "./schema.js";

/**
 * Parse a YAML string into a Pipeline. Structure is checked and defaults
 * are filled in here; call validate() for the semantic rules.
 */
export function parsePipeline(yamlString: string): Pipeline {
  const raw: unknown = yaml.load(yamlString);
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error("Invalid pipeline: expected a YAML object");
  }
  const parsed = PipelineSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`
    );
    throw new Error(`Invalid pipeline: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function serializePipeline(pipeline: Pipeline): string {
  return yaml.dump(pipeline, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
    quotingType: '"',
  });
}

export function loadPipeline(filePath: string): Pipeline {
  const content = fs.readFileSync(filePath, "utf-8");
  return parsePipeline(content);
}

export function savePipeline(pipeline: Pipeline, filePath: string): void {
  const content = serializePipeline(pipeline);
  fs.writeFileSync(filePath, content, "utf-8");
}
