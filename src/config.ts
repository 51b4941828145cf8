import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";
import { DEFAULT_EVALUATION_MODEL } from "./collaborator/types.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export const EVALUATOR_KINDS = ["claude", "heuristic"] as const;
export type EvaluatorKind = (typeof EVALUATOR_KINDS)[number];

export interface RuntimeConfig {
  readonly evaluator: EvaluatorKind;
  readonly anthropic: {
    /** Empty when the heuristic evaluator is selected. */
    readonly apiKey: string;
    readonly baseUrl: string | undefined;
    readonly model: string;
    readonly maxTokens: number;
  };
  readonly session: {
    readonly timeoutMs: number;
    readonly maxConcurrency: number;
  };
  readonly rubricDir: string;
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

const PROJECT_ROOT = fileURLToPath(new URL("..", import.meta.url));

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Optional env-var-style overrides for testing.
 *   Keys are env var names (e.g. "ANTHROPIC_API_KEY"), values are strings.
 * @returns Frozen RuntimeConfig object.
 * @throws ConfigError if required fields are missing or invalid.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env = (key: string): string | undefined =>
    envOverrides?.[key] ?? process.env[key];

  // ── Evaluator ──────────────────────────────────────────────────────────
  const evaluator = parseChoice(env("EVALUATOR"), "claude", EVALUATOR_KINDS, "EVALUATOR");

  // ── Anthropic ──────────────────────────────────────────────────────────
  const apiKey = env("ANTHROPIC_API_KEY")?.trim() ?? "";
  if (evaluator === "claude" && !apiKey) {
    throw new ConfigError(
      "ANTHROPIC_API_KEY is required when EVALUATOR=claude. Set it as an environment variable or use EVALUATOR=heuristic.",
      "ANTHROPIC_API_KEY",
    );
  }

  const baseUrl = env("ANTHROPIC_BASE_URL")?.trim() || undefined;
  const model = env("EVALUATION_MODEL")?.trim() || DEFAULT_EVALUATION_MODEL;
  const maxTokens = parsePositiveInt(env("EVALUATION_MAX_TOKENS"), 2048, "EVALUATION_MAX_TOKENS");

  // ── Session ────────────────────────────────────────────────────────────
  const timeoutMs = parsePositiveInt(env("EVALUATION_TIMEOUT_MS"), 60_000, "EVALUATION_TIMEOUT_MS");
  const maxConcurrency = parsePositiveInt(
    env("MAX_PARALLEL_EVALUATIONS"),
    4,
    "MAX_PARALLEL_EVALUATIONS",
  );

  // ── Rubrics ────────────────────────────────────────────────────────────
  const rubricDirRaw = env("RUBRIC_DIR")?.trim();
  const rubricDir = rubricDirRaw
    ? resolve(process.cwd(), rubricDirRaw)
    : resolve(PROJECT_ROOT, "rubrics");

  // ── Logging ────────────────────────────────────────────────────────────
  const logLevel = parseChoice(env("LOG_LEVEL"), "info", LOG_LEVELS, "LOG_LEVEL");
  const logFormat = parseChoice(env("LOG_FORMAT"), "pretty", LOG_FORMATS, "LOG_FORMAT");

  // ── Build and freeze ──────────────────────────────────────────────────
  return Object.freeze({
    evaluator,
    anthropic: Object.freeze({ apiKey, baseUrl, model, maxTokens }),
    session: Object.freeze({ timeoutMs, maxConcurrency }),
    rubricDir,
    logging: Object.freeze({ level: logLevel, format: logFormat }),
  });
}

// ── Helpers ────────────────────────────────────────────────────────────────

function parseChoice<T extends string>(
  raw: string | undefined,
  fallback: T,
  choices: readonly T[],
  field: string,
): T {
  const value = (raw || fallback).trim();
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(
      `${field} must be one of: ${choices.join(", ")}. Got "${value}".`,
      field,
    );
  }
  return match;
}

function parsePositiveInt(raw: string | undefined, fallback: number, field: string): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(
      `${field} must be a positive integer (>= 1), got "${raw}".`,
      field,
    );
  }
  return value;
}
