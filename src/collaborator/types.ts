// ── Grading Transport ───────────────────────────────────────────────────────

export interface ClaudeClientConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
}

/** One grading prompt for one dimension. */
export interface GradingCall {
  readonly system: string;
  readonly prompt: string;
  readonly model: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly signal?: AbortSignal;
}

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export interface GradingReply {
  readonly text: string;
  /** Model that actually served the call. */
  readonly model: string;
  readonly usage: TokenUsage;
  /** The reply hit `maxTokens` before the model finished. */
  readonly truncated: boolean;
}

export interface ClaudeClient {
  grade(call: GradingCall): Promise<GradingReply>;
}

// ── Transport Errors ────────────────────────────────────────────────────────

export type ExecutionErrorCode =
  | "API_ERROR"
  | "API_RATE_LIMITED"
  | "API_OVERLOADED"
  | "API_TIMEOUT"
  | "RESPONSE_EMPTY"
  | "ABORTED"
  | "UNKNOWN";

export interface ExecutionErrorOptions {
  /** HTTP status of the failed API call, when there was one. */
  readonly status?: number;
  readonly cause?: Error;
}

export class ExecutionError extends Error {
  override readonly name = "ExecutionError";
  readonly status: number | null;
  override readonly cause?: Error;

  constructor(
    message: string,
    public readonly code: ExecutionErrorCode,
    options: ExecutionErrorOptions = {},
  ) {
    super(message);
    this.status = options.status ?? null;
    if (options.cause) this.cause = options.cause;
  }
}

export const DEFAULT_EVALUATION_MODEL = "claude-sonnet-4-5-20250929";
