import type { RuntimeConfig } from "./config.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import { RubricRegistry } from "./rubric/rubric-registry.ts";
import { AnthropicClaudeClient } from "./collaborator/claude-client.ts";
import { createDocument } from "./document/evaluation-document.ts";
import { EvaluationSession, rootCause } from "./evaluation/evaluation-session.ts";
import { ClaudeTextEvaluator } from "./evaluation/text-evaluator.ts";
import { CueHeuristicEvaluator } from "./evaluation/heuristic-evaluator.ts";
import { retryUnavailable } from "./evaluation/retry.ts";
import type { DimensionFailure, TextEvaluator } from "./evaluation/types.ts";
import { EvaluationError } from "./evaluation/types.ts";
import type { EvaluationDocument, EvaluationResult } from "./types/evaluation.ts";
import { aggregate } from "./report/result-aggregator.ts";
import type { Report } from "./report/types.ts";

// ── Application Interface ──────────────────────────────────────────────────

export interface ReviewOptions {
  /** Defaults to every registered dimension. */
  readonly dimensionIds?: readonly string[];
  /** Keep going past failed dimensions and report them alongside the results. */
  readonly allowPartial?: boolean;
  /** Extra attempts for a dimension whose collaborator was unavailable. */
  readonly retries?: number;
  readonly retryDelayMs?: number;
  readonly signal?: AbortSignal;
}

export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly registry: RubricRegistry;
  readonly evaluator: TextEvaluator;
  readonly session: EvaluationSession;

  /** Split `text` into a document, evaluate it and aggregate the report. */
  review(documentId: string, text: string, options?: ReviewOptions): Promise<Report>;

  /** Evaluate an already chunked document (e.g. from a PDF) and aggregate the report. */
  reviewDocument(document: EvaluationDocument, options?: ReviewOptions): Promise<Report>;
}

export interface BootstrapOverrides {
  readonly logger?: Logger;
  readonly evaluator?: TextEvaluator;
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Wire all modules together with real implementations.
 * This is the composition root: the single place where dependency injection happens.
 *
 * @param config Runtime configuration (from loadConfig()).
 * @param overrides Replacements for the logger or evaluator, mainly for tests.
 */
export async function bootstrap(
  config: RuntimeConfig,
  overrides: BootstrapOverrides = {},
): Promise<Application> {
  // 1. Logger first, so all subsequent modules can log
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
    });

  logger.info("Bootstrapping application", {
    evaluator: overrides.evaluator?.name ?? config.evaluator,
    rubricDir: config.rubricDir,
    maxConcurrency: config.session.maxConcurrency,
    timeoutMs: config.session.timeoutMs,
  });

  // 2. Rubric registry, loaded once and read-only afterwards
  const registry = await RubricRegistry.fromDirectory(config.rubricDir);
  logger.info("Rubric registry loaded", { dimensions: registry.dimensionIds });

  // 3. Evaluator
  const evaluator = overrides.evaluator ?? createEvaluator(config);

  // 4. Session
  const session = new EvaluationSession(registry, evaluator, config.session, logger);

  const reviewDocument = async (
    document: EvaluationDocument,
    options: ReviewOptions = {},
  ): Promise<Report> => {
    const documentId = document.id;
    const ids = [...new Set(options.dimensionIds ?? registry.dimensionIds)];
    const retries = options.retries ?? 0;
    const allowPartial = options.allowPartial ?? false;
    const { signal } = options;

    logger.info("Reviewing report", {
      documentId,
      chunks: document.chunks.length,
      dimensions: ids,
    });

    // Without retries or partial output the session's fail-fast path applies
    if (retries === 0 && !allowPartial) {
      const results = await session.evaluate(document, ids, signal ? { signal } : {});
      return aggregate(results, { documentId });
    }

    const first = await session.run(document, ids, signal ? { signal } : {});
    const completed = new Map<string, EvaluationResult>(
      first.results.map((r) => [r.dimensionId, r]),
    );
    const failed = new Map<string, DimensionFailure>();

    for (const failure of first.failures) {
      if (retries === 0 || failure.error.code !== "COLLABORATOR_UNAVAILABLE") {
        failed.set(failure.dimensionId, failure);
        continue;
      }

      try {
        const result = await retryUnavailable(
          async () => {
            const outcome = await session.evaluateDimension(document, failure.dimensionId, signal);
            if (outcome.status === "failed") throw outcome.error;
            return outcome.result;
          },
          {
            maxRetries: retries - 1,
            delayMs: options.retryDelayMs ?? 1000,
            logger,
            ...(signal ? { signal } : {}),
          },
        );
        completed.set(result.dimensionId, result);
      } catch (err: unknown) {
        if (!(err instanceof EvaluationError)) throw err;
        if (err.code === "ABORTED" && signal?.aborted) {
          throw new EvaluationError("Evaluation aborted", "ABORTED", null, err);
        }
        failed.set(failure.dimensionId, { dimensionId: failure.dimensionId, error: err });
      }
    }

    const results = ids.flatMap((id) => completed.get(id) ?? []);
    const failures = ids.flatMap((id) => failed.get(id) ?? []);

    if (!allowPartial) {
      const cause = rootCause(failures);
      if (cause) throw cause.error;
    }

    return aggregate(results, { documentId, failures });
  };

  const review = (documentId: string, text: string, options?: ReviewOptions): Promise<Report> =>
    reviewDocument(createDocument(documentId, text), options);

  return { config, logger, registry, evaluator, session, review, reviewDocument };
}

function createEvaluator(config: RuntimeConfig): TextEvaluator {
  if (config.evaluator === "heuristic") {
    return new CueHeuristicEvaluator();
  }

  const client = new AnthropicClaudeClient({
    apiKey: config.anthropic.apiKey,
    ...(config.anthropic.baseUrl ? { baseUrl: config.anthropic.baseUrl } : {}),
  });
  return new ClaudeTextEvaluator(client, {
    model: config.anthropic.model,
    maxTokens: config.anthropic.maxTokens,
  });
}
