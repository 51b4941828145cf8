export * from "./types/index.ts";
export * from "./rubric/index.ts";
export * from "./document/index.ts";
export * from "./collaborator/index.ts";
export * from "./evaluation/index.ts";
export * from "./report/index.ts";
export * from "./observability/index.ts";
export { loadConfig, ConfigError, EVALUATOR_KINDS, type EvaluatorKind, type RuntimeConfig } from "./config.ts";
export {
  bootstrap,
  type Application,
  type BootstrapOverrides,
  type ReviewOptions,
} from "./bootstrap.ts";
