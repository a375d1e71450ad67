import type { ChunkSizeValue } from '../constants/protocol';

export const MessageType = {
  HANDSHAKE: 0x01,
  HANDSHAKE_ACK: 0x02,
  FILE_REQUEST: 0x03,
  FILE_METADATA: 0x04,
  FILE_CHUNK: 0x05,
  CHUNK_ACK: 0x06,
  UPLOAD_START: 0x07,
  UPLOAD_COMPLETE: 0x08,
  LIST_REQUEST: 0x09,
  LIST_RESPONSE: 0x0a,
  ERROR: 0x0b,
} as const;

export type MessageTypeName = keyof typeof MessageType;
export type MessageTypeCode = (typeof MessageType)[MessageTypeName];

export interface ProtocolMessage {
  version: number;
  type: MessageTypeCode;
  length: number;
  payload: Buffer;
}

// Order matters: the wire code of a kind is its 1-based position.
export const ERROR_KINDS = [
  'VERSION_UNSUPPORTED',
  'MALFORMED_MESSAGE',
  'TRUNCATED',
  'INVALID_CHUNK_SIZE',
  'INVALID_FILENAME',
  'FILE_NOT_FOUND',
  'MISSING_CHUNK',
  'OUT_OF_ORDER',
  'CORRUPT_PAYLOAD',
  'CHECKSUM_MISMATCH',
  'WRITE_ERROR',
  'PROTOCOL_VIOLATION',
  'TIMEOUT',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface HandshakePayload {
  version: number;
  ackWindow: number;
}

export interface FileRequestPayload {
  name: string;
  chunkSize: ChunkSizeValue;
  compression: boolean;
}

export interface FileMetadata {
  readonly name: string;
  readonly size: number;
  readonly chunkSize: ChunkSizeValue;
  readonly compression: boolean;
  readonly digest: Buffer;
}

/** A chunk as the chunker produces it: raw file bytes, never compressed. */
export interface Chunk {
  index: number;
  data: Buffer;
}

/** A chunk as it travels on the wire. `rawLength` is the size after decompression. */
export interface WireChunk {
  index: number;
  compressed: boolean;
  rawLength: number;
  data: Buffer;
}

export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
}

export interface FileEntry {
  name: string;
  size: number;
  modifiedAt: Date;
}

export interface TransferProgress {
  fileName: string;
  direction: 'upload' | 'download';
  chunksTransferred: number;
  totalChunks: number;
  bytesTransferred: number;
  totalBytes: number;
  speed: number;
  eta: number;
  startedAt: Date;
  completedAt?: Date;
}

export interface TransferResult {
  name: string;
  size: number;
  chunks: number;
  digest: string;
  compressedChunks: number;
}
