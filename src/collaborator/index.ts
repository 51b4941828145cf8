export {
  AnthropicClaudeClient,
  MockClaudeClient,
  mockReply,
  toExecutionError,
} from "./claude-client.ts";

export { cancellableSleep, errorMessage, toError } from "./utils.ts";

export {
  type ClaudeClient,
  type ClaudeClientConfig,
  type GradingCall,
  type GradingReply,
  type TokenUsage,
  type ExecutionErrorCode,
  type ExecutionErrorOptions,
  ExecutionError,
  DEFAULT_EVALUATION_MODEL,
} from "./types.ts";
