export {
  EvaluationSession,
  rootCause,
  type EvaluateOptions,
  type RunOptions,
} from "./evaluation-session.ts";
export {
  ClaudeTextEvaluator,
  MockTextEvaluator,
  type ClaudeEvaluatorConfig,
} from "./text-evaluator.ts";
export { CueHeuristicEvaluator } from "./heuristic-evaluator.ts";
export { retryUnavailable, type RetryOptions } from "./retry.ts";
export { runWithConcurrency, type ConcurrencyOptions, type ConcurrencyResult } from "./concurrency.ts";
export { buildEvaluationPrompt, type EvaluationPrompt } from "./prompt-builder.ts";
export { parseVerdict } from "./response-parser.ts";
export { assessUncertainty, uncertaintyReasons } from "./guards.ts";
export {
  EvaluationError,
  createDefaultSessionConfig,
  type CitedEvidence,
  type CollaboratorVerdict,
  type DimensionFailure,
  type DimensionOutcome,
  type EvaluationErrorCode,
  type EvaluationRequest,
  type SessionConfig,
  type SessionOutcome,
  type TextEvaluator,
} from "./types.ts";
