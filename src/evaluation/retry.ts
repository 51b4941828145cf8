import { cancellableSleep } from "../collaborator/utils.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { EvaluationError } from "./types.ts";

export interface RetryOptions {
  readonly maxRetries: number;
  /** Backoff before retry n (0-based) is `delayMs * 2^n`. */
  readonly delayMs: number;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

/**
 * Re-run `fn` while it fails with COLLABORATOR_UNAVAILABLE. Every other error,
 * and the last unavailable error once retries run out, is rethrown as is.
 */
export async function retryUnavailable<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const logger = options.logger ?? NULL_LOGGER;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (
        !(err instanceof EvaluationError) ||
        err.code !== "COLLABORATOR_UNAVAILABLE" ||
        attempt >= options.maxRetries
      ) {
        throw err;
      }

      const backoffMs = options.delayMs * 2 ** attempt;
      logger.warn("Retrying unavailable collaborator", {
        dimensionId: err.dimensionId,
        attempt: attempt + 1,
        backoffMs,
        error: err.message,
      });

      try {
        await cancellableSleep(backoffMs, options.signal);
      } catch (sleepErr: unknown) {
        throw new EvaluationError(
          "Retry aborted",
          "ABORTED",
          err.dimensionId,
          sleepErr instanceof Error ? sleepErr : undefined,
        );
      }
    }
  }
}
