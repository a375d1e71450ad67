import { ERROR_KINDS, ErrorKind } from '../../shared/types/protocol';

// Rejections of a request that never started a transfer; the connection stays usable.
const RECOVERABLE_KINDS = new Set<ErrorKind>(['FILE_NOT_FOUND', 'INVALID_FILENAME', 'INVALID_CHUNK_SIZE']);

export interface ProtocolErrorOptions {
  cause?: unknown;
  /** Set when the error was reported by the peer in an ERROR message. */
  remote?: boolean;
}

export class ProtocolError extends Error {
  readonly kind: ErrorKind;
  readonly remote: boolean;

  constructor(kind: ErrorKind, message?: string, options: ProtocolErrorOptions = {}) {
    super(message ?? kind, { cause: options.cause });
    this.name = 'ProtocolError';
    this.kind = kind;
    this.remote = options.remote ?? false;
  }
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

export function errorKindToCode(kind: ErrorKind): number {
  return ERROR_KINDS.indexOf(kind) + 1;
}

export function errorKindFromCode(code: number): ErrorKind | undefined {
  return ERROR_KINDS[code - 1];
}

export function isFatal(kind: ErrorKind): boolean {
  return !RECOVERABLE_KINDS.has(kind);
}

export function errnoCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Normalizes anything thrown by I/O into a ProtocolError. Socket timeouts become
 * `TIMEOUT`; everything else that is not already classified gets `fallback`.
 */
export function toProtocolError(error: unknown, fallback: ErrorKind = 'WRITE_ERROR'): ProtocolError {
  if (isProtocolError(error)) {
    return error;
  }

  const code = errnoCode(error);
  if (code === 'ETIMEDOUT') {
    return new ProtocolError('TIMEOUT', 'Connection timed out', { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProtocolError(fallback, message, { cause: error });
}
