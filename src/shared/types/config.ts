import type { ChunkSizeValue, CompressionLevelValue } from '../constants/protocol';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface TimeoutConfig {
  handshakeMs: number;
  readMs: number;
  writeMs: number;
}

export interface RetryConfig {
  attempts: number;
  delayMs: number;
}

export interface TransferConfig {
  host: string;
  port: number;
  storageRoot: string;
  chunkSize: ChunkSizeValue;
  compression: boolean;
  compressionLevel: CompressionLevelValue;
  ackWindow: number; // chunks per CHUNK_ACK, 0 = continuous streaming
  maxConcurrentTransfers: number;
  retry: RetryConfig;
  timeouts: TimeoutConfig;
  logLevel: LogLevel;
}
