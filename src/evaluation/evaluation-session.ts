import type { Dimension } from "../types/rubric.ts";
import type {
  EvaluationDocument,
  EvaluationResult,
  EvidenceItem,
} from "../types/evaluation.ts";
import type { RubricRegistry } from "../rubric/rubric-registry.ts";
import { documentText } from "../document/evaluation-document.ts";
import { findCues, resolveEvidence } from "../document/evidence-resolver.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { errorMessage, toError } from "../collaborator/utils.ts";
import { runWithConcurrency } from "./concurrency.ts";
import { assessUncertainty } from "./guards.ts";
import type {
  CollaboratorVerdict,
  DimensionFailure,
  DimensionOutcome,
  SessionConfig,
  SessionOutcome,
  TextEvaluator,
} from "./types.ts";
import { EvaluationError } from "./types.ts";

// ── Options ─────────────────────────────────────────────────────────────────

export interface EvaluateOptions {
  readonly signal?: AbortSignal;
  /** Drop failed dimensions instead of throwing the first failure. */
  readonly allowPartial?: boolean;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
  /** Stop dispatching and cancel in-flight calls after the first failure. */
  readonly failFast?: boolean;
}

// ── Evaluation Session ──────────────────────────────────────────────────────

/**
 * Evaluates one document against a set of rubric dimensions.
 *
 * One collaborator call per dimension, dispatched concurrently up to
 * `maxConcurrency`, each bounded by `timeoutMs`. Verdicts are validated
 * against the dimension's declared tiers, their quotes are located in the
 * document and the uncertainty guards are applied before a result is built.
 */
export class EvaluationSession {
  private readonly logger: Logger;

  constructor(
    private readonly registry: RubricRegistry,
    private readonly evaluator: TextEvaluator,
    private readonly config: SessionConfig,
    logger: Logger = NULL_LOGGER,
  ) {
    this.logger = logger.child({ module: "evaluation-session" });
  }

  /**
   * Results in request order. Unless `allowPartial` is set, the first failure
   * in request order is thrown and the remaining calls are cancelled.
   */
  async evaluate(
    document: EvaluationDocument,
    dimensionIds: readonly string[],
    options: EvaluateOptions = {},
  ): Promise<EvaluationResult[]> {
    const allowPartial = options.allowPartial ?? false;
    const outcome = await this.run(document, dimensionIds, {
      signal: options.signal,
      failFast: !allowPartial,
    });

    if (!allowPartial) {
      const failure = rootCause(outcome.failures);
      if (failure) throw failure.error;
    }

    return [...outcome.results];
  }

  /** Every dimension's success or failure; failures are isolated per dimension. */
  async run(
    document: EvaluationDocument,
    dimensionIds: readonly string[],
    options: RunOptions = {},
  ): Promise<SessionOutcome> {
    // Unknown ids fail before any collaborator call; repeats are evaluated once
    const dimensions = [...new Set(dimensionIds)].map((id) => this.registry.get(id));
    const { signal } = options;

    if (signal?.aborted) {
      throw abortedByCaller();
    }

    const startTime = Date.now();
    this.logger.info("Evaluation started", {
      documentId: document.id,
      dimensions: dimensions.map((d) => d.id),
      evaluator: this.evaluator.name,
    });

    const batch = await runWithConcurrency<DimensionOutcome>({
      tasks: dimensions.map(
        (dimension) => (taskSignal: AbortSignal) =>
          this.evaluateResolved(document, dimension, taskSignal),
      ),
      maxConcurrency: this.config.maxConcurrency,
      ...(signal ? { signal } : {}),
      ...(options.failFast ? { isFailed: (o: DimensionOutcome) => o.status === "failed" } : {}),
    });

    if (batch.aborted || signal?.aborted) {
      this.logger.warn("Evaluation aborted", { documentId: document.id });
      throw abortedByCaller();
    }

    const byId = new Map<string, DimensionOutcome>();
    for (const outcome of batch.results) {
      byId.set(outcome.dimensionId, outcome);
    }

    const results: EvaluationResult[] = [];
    const failures: DimensionFailure[] = [];
    for (const dimension of dimensions) {
      const outcome = byId.get(dimension.id);
      if (!outcome) {
        failures.push({
          dimensionId: dimension.id,
          error: new EvaluationError(
            `Dimension ${dimension.id} was not started because an earlier dimension failed`,
            "ABORTED",
            dimension.id,
          ),
        });
      } else if (outcome.status === "completed") {
        results.push(outcome.result);
      } else {
        failures.push({ dimensionId: outcome.dimensionId, error: outcome.error });
      }
    }

    const durationMs = Date.now() - startTime;
    this.logger.info("Evaluation finished", {
      documentId: document.id,
      completed: results.length,
      failed: failures.length,
      durationMs,
    });

    return { documentId: document.id, results, failures, durationMs };
  }

  /**
   * Evaluate a single dimension. Collaborator failures are returned as a
   * `failed` outcome; only an unknown dimension id throws.
   */
  async evaluateDimension(
    document: EvaluationDocument,
    dimensionId: string,
    signal?: AbortSignal,
  ): Promise<DimensionOutcome> {
    const dimension = this.registry.get(dimensionId);
    return this.evaluateResolved(document, dimension, signal ?? new AbortController().signal);
  }

  // ── Per-dimension call ────────────────────────────────────────────────────

  private async evaluateResolved(
    document: EvaluationDocument,
    dimension: Dimension,
    batchSignal: AbortSignal,
  ): Promise<DimensionOutcome> {
    const startTime = Date.now();
    const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
    const signal = AbortSignal.any([batchSignal, timeoutSignal]);

    this.logger.debug("Dispatching dimension", {
      dimensionId: dimension.id,
      evaluator: this.evaluator.name,
    });

    try {
      const verdict = await raceWithSignal(
        this.evaluator.evaluate({ document, dimension }, signal),
        signal,
      );
      const result = toResult(document, dimension, verdict);
      const durationMs = Date.now() - startTime;

      this.logger.info("Dimension evaluated", {
        dimensionId: dimension.id,
        outcome: result.outcome.kind === "evidenced" ? result.outcome.tier : result.outcome.kind,
        uncertainty: result.uncertainty,
        ...(verdict.usage
          ? { inputTokens: verdict.usage.inputTokens, outputTokens: verdict.usage.outputTokens }
          : {}),
        durationMs,
      });

      return { status: "completed", dimensionId: dimension.id, result, durationMs };
    } catch (err: unknown) {
      const error = this.classifyError(err, dimension.id, timeoutSignal, batchSignal);
      const durationMs = Date.now() - startTime;

      this.logger.warn("Dimension evaluation failed", {
        dimensionId: dimension.id,
        code: error.code,
        error: error.message,
        durationMs,
      });

      return { status: "failed", dimensionId: dimension.id, error, durationMs };
    }
  }

  private classifyError(
    err: unknown,
    dimensionId: string,
    timeoutSignal: AbortSignal,
    batchSignal: AbortSignal,
  ): EvaluationError {
    if (timeoutSignal.aborted && !batchSignal.aborted) {
      return new EvaluationError(
        `Collaborator timed out after ${this.config.timeoutMs}ms for ${dimensionId}`,
        "COLLABORATOR_UNAVAILABLE",
        dimensionId,
        toError(err),
      );
    }

    if (batchSignal.aborted) {
      return new EvaluationError(
        `Evaluation of ${dimensionId} was cancelled`,
        "ABORTED",
        dimensionId,
        toError(err),
      );
    }

    if (err instanceof EvaluationError) {
      return err.dimensionId === dimensionId
        ? err
        : new EvaluationError(err.message, err.code, dimensionId, err.cause);
    }

    return new EvaluationError(
      `Collaborator failed for ${dimensionId}: ${errorMessage(err)}`,
      "COLLABORATOR_UNAVAILABLE",
      dimensionId,
      toError(err),
    );
  }
}

// ── Verdict → Result ────────────────────────────────────────────────────────

function toResult(
  document: EvaluationDocument,
  dimension: Dimension,
  verdict: CollaboratorVerdict,
): EvaluationResult {
  const evidence: EvidenceItem[] = verdict.evidence.map((item) => {
    const resolved = resolveEvidence(document, item.chunkId, item.quote);
    return Object.freeze({
      chunkId: resolved?.chunkId ?? null,
      page: resolved?.page ?? null,
      quote: item.quote,
      polarity: item.polarity,
    });
  });

  const base = {
    dimensionId: dimension.id,
    dimensionName: dimension.name,
    rationale: verdict.rationale,
    evidence: Object.freeze(evidence),
  };

  // Absence of a conditional subject is evidence-neutral, never the worst tier
  if (dimension.conditionality && subjectAbsent(document, dimension.conditionality.cues, verdict)) {
    return Object.freeze({
      ...base,
      outcome: Object.freeze({
        kind: "not_evidenced" as const,
        reason: `No ${dimension.conditionality.subject} found in the report`,
      }),
      uncertainty: verdict.uncertainty ?? false,
    });
  }

  const declared = dimension.tiers.find((t) => t.label === verdict.tier);
  if (!declared) {
    const returned = verdict.tier === null ? "no tier" : `tier "${verdict.tier}"`;
    throw new EvaluationError(
      `Collaborator returned ${returned} for ${dimension.id}; expected one of ${dimension.tiers.map((t) => t.label).join(", ")}`,
      "INVALID_TIER_RETURNED",
      dimension.id,
    );
  }

  return Object.freeze({
    ...base,
    outcome: Object.freeze({ kind: "evidenced" as const, tier: declared.label }),
    uncertainty: assessUncertainty(dimension, declared.label, evidence, verdict.uncertainty ?? false),
  });
}

function subjectAbsent(
  document: EvaluationDocument,
  subjectCues: readonly string[],
  verdict: CollaboratorVerdict,
): boolean {
  if (verdict.subjectPresent === false) return true;
  return verdict.evidence.length === 0 && findCues(documentText(document), subjectCues).length === 0;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Settles with `promise`, or rejects as soon as `signal` aborts. */
function raceWithSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/** First failure that is not a knock-on cancellation, else the first failure. */
export function rootCause(failures: readonly DimensionFailure[]): DimensionFailure | undefined {
  return failures.find((f) => f.error.code !== "ABORTED") ?? failures[0];
}

function abortedByCaller(): EvaluationError {
  return new EvaluationError("Evaluation aborted", "ABORTED", null);
}
