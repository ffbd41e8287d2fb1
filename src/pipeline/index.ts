export type {
  Pipeline,
  StageDef,
  CriterionDef,
  CriterionKind,
  MetricSource,
  PrepareRules,
  ZeroMetricPolicy,
  UnmatchedValuePolicy,
  UnmatchedMetricPolicy,
} from "./types.js";

export { validate, planSchemas } from "./validate.js";
export type { ValidationError, Catalog, StageSchema } from "./validate.js";

export { PipelineSchema } from "./schema.js";

export {
  parsePipeline,
  serializePipeline,
  loadPipeline,
  savePipeline,
} from "./yaml.js";
