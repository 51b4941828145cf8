export { aggregate, isComplete } from "./result-aggregator.ts";
export { reportToJSON } from "./serialize.ts";
export { renderReportMarkdown } from "./markdown.ts";
export {
  AggregationError,
  type AggregateOptions,
  type AggregationErrorCode,
  type Report,
  type SerializedDimension,
  type SerializedEvidence,
  type SerializedFailure,
  type SerializedReport,
} from "./types.ts";
