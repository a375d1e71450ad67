import {
  ALLOWED_CHUNK_SIZES,
  ALLOWED_COMPRESSION_LEVELS,
  isAllowedChunkSize,
  isAllowedCompressionLevel,
} from '../../shared/constants/protocol';
import { LogLevel, RetryConfig, TimeoutConfig, TransferConfig } from '../../shared/types/config';

type PlainObject = Record<string, unknown>;

const ALLOWED_LOG_LEVELS = new Set<string>(['error', 'warn', 'info', 'debug']);

const MAX_TIMEOUT_MS = 10 * 60 * 1000;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

function ensureString(value: unknown, field: string, options?: { allowEmpty?: boolean; maxLength?: number }): string {
  if (typeof value !== 'string') {
    throw new Error(`Field "${field}" must be a string.`);
  }
  const trimmed = value.trim();
  if (!options?.allowEmpty && trimmed.length === 0) {
    throw new Error(`Field "${field}" cannot be empty.`);
  }
  if (options?.maxLength && trimmed.length > options.maxLength) {
    throw new Error(`Field "${field}" exceeds maximum length of ${options.maxLength}`);
  }
  return trimmed;
}

function ensureBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new Error(`Field "${field}" must be a boolean.`);
  }
  return value;
}

function ensureNumber(
  value: unknown,
  field: string,
  options?: { min?: number; max?: number; integer?: boolean }
): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`Field "${field}" must be a number.`);
  }
  if (options?.integer && !Number.isInteger(value)) {
    throw new Error(`Field "${field}" must be an integer.`);
  }
  if (options?.min !== undefined && value < options.min) {
    throw new Error(`Field "${field}" must be >= ${options.min}.`);
  }
  if (options?.max !== undefined && value > options.max) {
    throw new Error(`Field "${field}" must be <= ${options.max}.`);
  }
  return value;
}

function sanitizeTimeouts(value: unknown, fallback: TimeoutConfig): TimeoutConfig {
  if (value === undefined) {
    return { ...fallback };
  }
  if (!isPlainObject(value)) {
    throw new Error('timeouts must be an object.');
  }
  const options = { min: 1, max: MAX_TIMEOUT_MS, integer: true };
  return {
    handshakeMs: ensureNumber(value.handshakeMs ?? fallback.handshakeMs, 'timeouts.handshakeMs', options),
    readMs: ensureNumber(value.readMs ?? fallback.readMs, 'timeouts.readMs', options),
    writeMs: ensureNumber(value.writeMs ?? fallback.writeMs, 'timeouts.writeMs', options),
  };
}

function sanitizeRetry(value: unknown, fallback: RetryConfig): RetryConfig {
  if (value === undefined) {
    return { ...fallback };
  }
  if (!isPlainObject(value)) {
    throw new Error('retry must be an object.');
  }
  return {
    attempts: ensureNumber(value.attempts ?? fallback.attempts, 'retry.attempts', { min: 1, max: 20, integer: true }),
    delayMs: ensureNumber(value.delayMs ?? fallback.delayMs, 'retry.delayMs', { min: 0, max: MAX_TIMEOUT_MS }),
  };
}

/**
 * Validates a partial configuration and fills in every missing field from `defaults`.
 * The result is frozen: configuration is fixed for the lifetime of a connection.
 */
export function sanitizeTransferConfig(input: unknown, defaults: TransferConfig): Readonly<TransferConfig> {
  if (!isPlainObject(input)) {
    throw new Error('Configuration must be an object.');
  }

  const chunkSize = ensureNumber(input.chunkSize ?? defaults.chunkSize, 'chunkSize', { integer: true });
  if (!isAllowedChunkSize(chunkSize)) {
    throw new Error(`Field "chunkSize" must be one of: ${ALLOWED_CHUNK_SIZES.join(', ')}`);
  }

  const compressionLevel = ensureNumber(input.compressionLevel ?? defaults.compressionLevel, 'compressionLevel', {
    integer: true,
  });
  if (!isAllowedCompressionLevel(compressionLevel)) {
    throw new Error(`Field "compressionLevel" must be one of: ${ALLOWED_COMPRESSION_LEVELS.join(', ')}`);
  }

  const logLevel = ensureString(input.logLevel ?? defaults.logLevel, 'logLevel');
  if (!isLogLevel(logLevel)) {
    throw new Error(`Field "logLevel" must be one of: ${Array.from(ALLOWED_LOG_LEVELS).join(', ')}`);
  }

  const config: TransferConfig = {
    host: ensureString(input.host ?? defaults.host, 'host', { maxLength: 255 }),
    port: ensureNumber(input.port ?? defaults.port, 'port', { min: 0, max: 65535, integer: true }),
    storageRoot: ensureString(input.storageRoot ?? defaults.storageRoot, 'storageRoot', { maxLength: 4096 }),
    chunkSize,
    compression: ensureBoolean(input.compression ?? defaults.compression, 'compression'),
    compressionLevel,
    ackWindow: ensureNumber(input.ackWindow ?? defaults.ackWindow, 'ackWindow', { min: 0, max: 65535, integer: true }),
    maxConcurrentTransfers: ensureNumber(
      input.maxConcurrentTransfers ?? defaults.maxConcurrentTransfers,
      'maxConcurrentTransfers',
      { min: 1, max: 64, integer: true }
    ),
    retry: sanitizeRetry(input.retry, defaults.retry),
    timeouts: sanitizeTimeouts(input.timeouts, defaults.timeouts),
    logLevel,
  };

  return Object.freeze({
    ...config,
    retry: Object.freeze(config.retry),
    timeouts: Object.freeze(config.timeouts),
  });
}
