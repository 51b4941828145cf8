import type { ClaudeClient } from "../collaborator/types.ts";
import { ExecutionError } from "../collaborator/types.ts";
import { cancellableSleep } from "../collaborator/utils.ts";
import { buildEvaluationPrompt } from "./prompt-builder.ts";
import { parseVerdict } from "./response-parser.ts";
import type {
  CollaboratorVerdict,
  EvaluationRequest,
  TextEvaluator,
} from "./types.ts";
import { EvaluationError } from "./types.ts";

// ── Claude Evaluator ────────────────────────────────────────────────────────

export interface ClaudeEvaluatorConfig {
  readonly model: string;
  readonly maxTokens: number;
  readonly temperature?: number;
}

export class ClaudeTextEvaluator implements TextEvaluator {
  readonly name = "claude";

  constructor(
    private readonly client: ClaudeClient,
    private readonly config: ClaudeEvaluatorConfig,
  ) {}

  async evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<CollaboratorVerdict> {
    const dimensionId = request.dimension.id;
    const { systemPrompt, userMessage } = buildEvaluationPrompt(
      request.dimension,
      request.document,
    );

    const reply = await this.client.grade({
      system: systemPrompt,
      prompt: userMessage,
      model: this.config.model,
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature ?? 0,
      signal,
    });

    // A cut-off reply is incomplete JSON; name the limit instead of a parse failure
    if (reply.truncated) {
      throw new EvaluationError(
        `Collaborator reply for ${dimensionId} was cut off at the ${this.config.maxTokens}-token limit (${reply.usage.outputTokens} tokens generated); raise EVALUATION_MAX_TOKENS`,
        "RESPONSE_TRUNCATED",
        dimensionId,
      );
    }

    return { ...parseVerdict(reply.text, dimensionId), usage: reply.usage };
  }
}

// ── Mock Evaluator ──────────────────────────────────────────────────────────

export class MockTextEvaluator implements TextEvaluator {
  readonly name = "mock";
  readonly calls: EvaluationRequest[] = [];
  private readonly verdictGenerator: ((request: EvaluationRequest) => CollaboratorVerdict) | null;
  private readonly errors = new Map<string, { error: Error; oneShot: boolean }>();
  private readonly delays = new Map<string, number>();
  private readonly hanging = new Set<string>();
  private defaultDelayMs = 0;

  constructor(verdictGenerator?: (request: EvaluationRequest) => CollaboratorVerdict) {
    this.verdictGenerator = verdictGenerator ?? null;
  }

  /** Fail calls for one dimension, or every dimension when `dimensionId` is "*". */
  setError(dimensionId: string, error: Error, oneShot = false): void {
    this.errors.set(dimensionId, { error, oneShot });
  }

  clearErrors(): void {
    this.errors.clear();
  }

  setDelay(ms: number, dimensionId?: string): void {
    if (dimensionId) {
      this.delays.set(dimensionId, ms);
    } else {
      this.defaultDelayMs = ms;
    }
  }

  /** Calls for this dimension never settle and ignore their abort signal. */
  setHang(dimensionId: string): void {
    this.hanging.add(dimensionId);
  }

  async evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<CollaboratorVerdict> {
    const id = request.dimension.id;

    if (signal.aborted) {
      throw new ExecutionError("Aborted", "ABORTED");
    }

    if (this.hanging.has(id)) {
      this.calls.push(request);
      return new Promise<CollaboratorVerdict>(() => {});
    }

    const delay = this.delays.get(id) ?? this.defaultDelayMs;
    if (delay > 0) {
      await cancellableSleep(delay, signal);
    }

    this.calls.push(request);

    const configured = this.errors.get(id) ?? this.errors.get("*");
    if (configured) {
      if (configured.oneShot) {
        this.errors.delete(this.errors.has(id) ? id : "*");
      }
      throw configured.error;
    }

    if (this.verdictGenerator) {
      return this.verdictGenerator(request);
    }

    return {
      tier: "SOME",
      rationale: `Mock rationale for ${id}`,
      evidence: [],
    };
  }
}
