import { ErrorKind } from '../../shared/types/protocol';
import { ProtocolError, toProtocolError } from '../protocol/errors';
import { logger } from '../utils/logger';

// Failures a fresh connection may get past. Everything else would fail again.
const TRANSIENT_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['TIMEOUT', 'TRUNCATED', 'WRITE_ERROR']);

export interface RetryPolicy {
  /** Total tries, including the first. */
  attempts: number;
  /** Base delay; the wait before retry `n` is `delayMs * n`. */
  delayMs: number;
  retryOn?: (error: ProtocolError) => boolean;
  onRetry?: (error: ProtocolError, attempt: number) => void;
}

export function isTransient(error: ProtocolError): boolean {
  return !error.remote && TRANSIENT_KINDS.has(error.kind);
}

/**
 * Reconnect-and-restart: runs `operation` again from the beginning after a
 * transient failure. The protocol has no resume, so each attempt is a new
 * connection and a whole transfer.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy
): Promise<T> {
  const retryOn = policy.retryOn ?? isTransient;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const failure = toProtocolError(error);
      if (attempt >= attempts || !retryOn(failure)) {
        throw failure;
      }

      logger.info(`Retrying after ${failure.kind} (attempt ${attempt + 1} of ${attempts})`);
      policy.onRetry?.(failure, attempt);
      await new Promise((resolve) => setTimeout(resolve, policy.delayMs * attempt));
    }
  }
}
