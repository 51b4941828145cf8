import Anthropic from "@anthropic-ai/sdk";
import type {
  ClaudeClient,
  ClaudeClientConfig,
  ExecutionErrorCode,
  GradingCall,
  GradingReply,
} from "./types.ts";
import { ExecutionError } from "./types.ts";
import { cancellableSleep, errorMessage, toError } from "./utils.ts";

// ── Anthropic Client ────────────────────────────────────────────────────────

export class AnthropicClaudeClient implements ClaudeClient {
  private readonly client: Anthropic;

  constructor(config: ClaudeClientConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      // Retries are the caller's policy, not the transport's
      maxRetries: 0,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
  }

  async grade(call: GradingCall): Promise<GradingReply> {
    if (call.signal?.aborted) {
      throw new ExecutionError("Grading call aborted before it was sent", "ABORTED");
    }

    const message = await this.client.messages
      .create(
        {
          model: call.model,
          max_tokens: call.maxTokens,
          temperature: call.temperature,
          system: call.system,
          messages: [{ role: "user", content: call.prompt }],
        },
        call.signal ? { signal: call.signal } : undefined,
      )
      .catch((error: unknown) => {
        throw toExecutionError(error);
      });

    const text = message.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("\n\n")
      .trim();

    if (text.length === 0) {
      throw new ExecutionError(`${message.model} replied without any text`, "RESPONSE_EMPTY");
    }

    return {
      text,
      model: message.model,
      usage: {
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
      },
      truncated: message.stop_reason === "max_tokens",
    };
  }
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const STATUS_CODES: ReadonlyMap<number, ExecutionErrorCode> = new Map<number, ExecutionErrorCode>([
  [408, "API_TIMEOUT"],
  [429, "API_RATE_LIMITED"],
  [529, "API_OVERLOADED"],
]);

/** Map anything the SDK throws onto a transport error code. */
export function toExecutionError(error: unknown): ExecutionError {
  if (error instanceof ExecutionError) return error;

  if (
    error instanceof Anthropic.APIUserAbortError ||
    (error instanceof Error && error.name === "AbortError")
  ) {
    return new ExecutionError("Grading call aborted", "ABORTED", { cause: error });
  }

  // Covers APIConnectionTimeoutError as well
  if (error instanceof Anthropic.APIConnectionError) {
    return new ExecutionError(`Could not reach the Anthropic API: ${error.message}`, "API_TIMEOUT", {
      cause: error,
    });
  }

  if (error instanceof Anthropic.APIError) {
    const { status } = error;
    const code = (status !== undefined ? STATUS_CODES.get(status) : undefined) ?? "API_ERROR";
    return new ExecutionError(`Anthropic API call failed: ${error.message}`, code, {
      ...(status !== undefined ? { status } : {}),
      cause: error,
    });
  }

  const cause = toError(error);
  return new ExecutionError(`Grading call failed: ${errorMessage(error)}`, "UNKNOWN", cause ? { cause } : {});
}

// ── Mock Client ─────────────────────────────────────────────────────────────

export function mockReply(text: string, overrides: Partial<GradingReply> = {}): GradingReply {
  return {
    text,
    model: "mock-model",
    usage: { inputTokens: 100, outputTokens: 200 },
    truncated: false,
    ...overrides,
  };
}

const DEFAULT_REPLY_TEXT =
  '{"rating":"SOME","rationale":"Mock rationale","evidence":[],"uncertainty":true}';

/**
 * Scripted client for tests. Queued replies and errors are consumed in
 * order; once the queue is empty every call goes to the fallback.
 */
export class MockClaudeClient implements ClaudeClient {
  readonly calls: GradingCall[] = [];
  private readonly queue: Array<GradingReply | Error> = [];
  private delayMs = 0;

  constructor(
    private readonly fallback: (call: GradingCall) => GradingReply = () => mockReply(DEFAULT_REPLY_TEXT),
  ) {}

  enqueue(...items: Array<GradingReply | Error>): this {
    this.queue.push(...items);
    return this;
  }

  setDelay(ms: number): void {
    this.delayMs = ms;
  }

  async grade(call: GradingCall): Promise<GradingReply> {
    if (call.signal?.aborted) {
      throw new ExecutionError("Grading call aborted before it was sent", "ABORTED");
    }
    if (this.delayMs > 0) {
      await cancellableSleep(this.delayMs, call.signal);
    }

    this.calls.push(call);

    const next = this.queue.shift();
    if (next instanceof Error) throw next;
    return next ?? this.fallback(call);
  }
}
