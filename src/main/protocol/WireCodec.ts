import {
  DIGEST_LENGTH,
  HEADER_SIZE,
  MAX_PAYLOAD_LENGTH,
  PROTOCOL_VERSION,
  SUPPORTED_VERSIONS,
  isAllowedChunkSize,
} from '../../shared/constants/protocol';
import {
  ErrorPayload,
  FileEntry,
  FileMetadata,
  FileRequestPayload,
  HandshakePayload,
  MessageType,
  MessageTypeCode,
  ProtocolMessage,
  WireChunk,
} from '../../shared/types/protocol';
import { validateFileName } from '../utils/pathSecurity';
import { ProtocolError, errorKindFromCode, errorKindToCode } from './errors';

// Frame: [version:u8][type:u8][length:u32 BE][payload:length]

const MESSAGE_TYPE_CODES = new Set<number>(Object.values(MessageType));

const EMPTY = Buffer.alloc(0);

interface FrameHeader {
  version: number;
  type: MessageTypeCode;
  length: number;
}

function isMessageTypeCode(value: number): value is MessageTypeCode {
  return MESSAGE_TYPE_CODES.has(value);
}

export function messageTypeName(type: number): string {
  const entry = Object.entries(MessageType).find(([, code]) => code === type);
  return entry ? entry[0] : `0x${type.toString(16).padStart(2, '0')}`;
}

export function createMessage(
  type: MessageTypeCode,
  payload: Buffer = EMPTY,
  version: number = PROTOCOL_VERSION
): ProtocolMessage {
  return { version, type, length: payload.length, payload };
}

export function encode(message: ProtocolMessage): Buffer {
  if (message.length !== message.payload.length) {
    throw new ProtocolError(
      'MALFORMED_MESSAGE',
      `Declared length ${message.length} does not match payload size ${message.payload.length}`
    );
  }
  if (message.length > MAX_PAYLOAD_LENGTH) {
    throw new ProtocolError('MALFORMED_MESSAGE', `Payload of ${message.length} bytes exceeds the frame limit`);
  }

  const header = Buffer.alloc(HEADER_SIZE);
  header.writeUInt8(message.version, 0);
  header.writeUInt8(message.type, 1);
  header.writeUInt32BE(message.length, 2);
  return Buffer.concat([header, message.payload]);
}

function parseHeader(buffer: Buffer): FrameHeader {
  const version = buffer.readUInt8(0);
  const type = buffer.readUInt8(1);
  const length = buffer.readUInt32BE(2);

  if (!isMessageTypeCode(type)) {
    throw new ProtocolError('MALFORMED_MESSAGE', `Unknown message type ${messageTypeName(type)}`);
  }
  if (!SUPPORTED_VERSIONS.has(version)) {
    if (type === MessageType.HANDSHAKE) {
      throw new ProtocolError('VERSION_UNSUPPORTED', `Protocol version ${version} is not supported`);
    }
    throw new ProtocolError('MALFORMED_MESSAGE', `Unexpected protocol version ${version} in ${messageTypeName(type)}`);
  }
  if (length > MAX_PAYLOAD_LENGTH) {
    throw new ProtocolError('MALFORMED_MESSAGE', `Declared payload length ${length} exceeds the frame limit`);
  }

  return { version, type, length };
}

/**
 * Decodes exactly one complete frame. Use {@link FrameDecoder} for streams.
 */
export function decode(bytes: Buffer): ProtocolMessage {
  if (bytes.length < HEADER_SIZE) {
    throw new ProtocolError('TRUNCATED', `Frame ended after ${bytes.length} header bytes`);
  }

  const header = parseHeader(bytes);
  const available = bytes.length - HEADER_SIZE;
  if (available < header.length) {
    throw new ProtocolError('TRUNCATED', `Expected ${header.length} payload bytes, got ${available}`);
  }
  if (available > header.length) {
    throw new ProtocolError(
      'MALFORMED_MESSAGE',
      `Declared length ${header.length} does not match payload size ${available}`
    );
  }

  return { ...header, payload: Buffer.from(bytes.subarray(HEADER_SIZE)) };
}

/**
 * Resumable decoder for a byte stream. Bytes are pushed as they arrive; complete
 * frames come out in order. Boundaries come from the header only.
 */
export class FrameDecoder {
  private buffer: Buffer = EMPTY;
  private header: FrameHeader | null = null;

  push(chunk: Buffer): ProtocolMessage[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const messages: ProtocolMessage[] = [];

    for (;;) {
      if (!this.header) {
        if (this.buffer.length < HEADER_SIZE) {
          break;
        }
        this.header = parseHeader(this.buffer);
        this.buffer = this.buffer.subarray(HEADER_SIZE);
      }

      if (this.buffer.length < this.header.length) {
        break;
      }

      const payload = Buffer.from(this.buffer.subarray(0, this.header.length));
      this.buffer = this.buffer.subarray(this.header.length);
      messages.push({ ...this.header, payload });
      this.header = null;
    }

    return messages;
  }

  get pendingBytes(): number {
    return this.buffer.length + (this.header ? HEADER_SIZE : 0);
  }

  /**
   * Called when the stream ends.
   * @throws ProtocolError `TRUNCATED` if a frame was cut off
   */
  finish(): void {
    if (this.pendingBytes > 0) {
      const expected = this.header ? `${this.header.length} payload bytes` : 'a complete header';
      throw new ProtocolError('TRUNCATED', `Stream ended while waiting for ${expected}`);
    }
  }
}

class PayloadReader {
  private offset = 0;

  constructor(private readonly payload: Buffer, private readonly context: string) {}

  private take(size: number): Buffer {
    if (this.offset + size > this.payload.length) {
      throw new ProtocolError('MALFORMED_MESSAGE', `${this.context} payload is too short`);
    }
    const slice = this.payload.subarray(this.offset, this.offset + size);
    this.offset += size;
    return slice;
  }

  u8(): number {
    return this.take(1).readUInt8(0);
  }

  u16(): number {
    return this.take(2).readUInt16BE(0);
  }

  u32(): number {
    return this.take(4).readUInt32BE(0);
  }

  u64(): number {
    const value = this.take(8).readBigUInt64BE(0);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new ProtocolError('MALFORMED_MESSAGE', `${this.context} contains an out-of-range size`);
    }
    return Number(value);
  }

  bytes(size: number): Buffer {
    return Buffer.from(this.take(size));
  }

  string(): string {
    return this.take(this.u16()).toString('utf8');
  }

  rest(): Buffer {
    return this.bytes(this.payload.length - this.offset);
  }

  end(): void {
    if (this.offset !== this.payload.length) {
      throw new ProtocolError('MALFORMED_MESSAGE', `${this.context} payload has trailing bytes`);
    }
  }
}

function u8(value: number): Buffer {
  const buffer = Buffer.alloc(1);
  buffer.writeUInt8(value, 0);
  return buffer;
}

function u16(value: number): Buffer {
  const buffer = Buffer.alloc(2);
  buffer.writeUInt16BE(value, 0);
  return buffer;
}

function u32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32BE(value, 0);
  return buffer;
}

function u64(value: number): Buffer {
  const buffer = Buffer.alloc(8);
  buffer.writeBigUInt64BE(BigInt(value), 0);
  return buffer;
}

function lengthPrefixed(value: string): Buffer {
  const bytes = Buffer.from(value, 'utf8');
  return Buffer.concat([u16(bytes.length), bytes]);
}

export function encodeHandshake(handshake: HandshakePayload): Buffer {
  return Buffer.concat([u8(handshake.version), u16(handshake.ackWindow)]);
}

export function decodeHandshake(payload: Buffer): HandshakePayload {
  const reader = new PayloadReader(payload, 'HANDSHAKE');
  const version = reader.u8();
  if (!SUPPORTED_VERSIONS.has(version)) {
    throw new ProtocolError('VERSION_UNSUPPORTED', `Protocol version ${version} is not supported`);
  }
  const ackWindow = reader.u16();
  reader.end();
  return { version, ackWindow };
}

export function encodeFileRequest(request: FileRequestPayload): Buffer {
  return Buffer.concat([
    lengthPrefixed(request.name),
    u32(request.chunkSize),
    u8(request.compression ? 1 : 0),
  ]);
}

export function decodeFileRequest(payload: Buffer): FileRequestPayload {
  const reader = new PayloadReader(payload, 'FILE_REQUEST');
  const name = reader.string();
  const chunkSize = reader.u32();
  const compression = reader.u8() !== 0;
  reader.end();

  validateFileName(name);
  if (!isAllowedChunkSize(chunkSize)) {
    throw new ProtocolError('INVALID_CHUNK_SIZE', `Chunk size ${chunkSize} is not allowed`);
  }
  return { name, chunkSize, compression };
}

export function encodeFileMetadata(metadata: FileMetadata): Buffer {
  if (metadata.digest.length !== DIGEST_LENGTH) {
    throw new ProtocolError('MALFORMED_MESSAGE', `Digest must be ${DIGEST_LENGTH} bytes`);
  }
  return Buffer.concat([
    lengthPrefixed(metadata.name),
    u64(metadata.size),
    u32(metadata.chunkSize),
    u8(metadata.compression ? 1 : 0),
    metadata.digest,
  ]);
}

export function decodeFileMetadata(payload: Buffer): FileMetadata {
  const reader = new PayloadReader(payload, 'FILE_METADATA');
  const name = reader.string();
  const size = reader.u64();
  const chunkSize = reader.u32();
  const compression = reader.u8() !== 0;
  const digest = reader.bytes(DIGEST_LENGTH);
  reader.end();

  validateFileName(name);
  if (!isAllowedChunkSize(chunkSize)) {
    throw new ProtocolError('INVALID_CHUNK_SIZE', `Chunk size ${chunkSize} is not allowed`);
  }
  return { name, size, chunkSize, compression, digest };
}

export function encodeChunk(chunk: WireChunk): Buffer {
  return Buffer.concat([u32(chunk.index), u8(chunk.compressed ? 1 : 0), u32(chunk.rawLength), chunk.data]);
}

export function decodeChunk(payload: Buffer): WireChunk {
  const reader = new PayloadReader(payload, 'FILE_CHUNK');
  const index = reader.u32();
  const compressed = reader.u8() !== 0;
  const rawLength = reader.u32();
  const data = reader.rest();
  if (!compressed && data.length !== rawLength) {
    throw new ProtocolError('MALFORMED_MESSAGE', `Chunk ${index} declares ${rawLength} bytes but carries ${data.length}`);
  }
  return { index, compressed, rawLength, data };
}

export function encodeChunkAck(index: number): Buffer {
  return u32(index);
}

export function decodeChunkAck(payload: Buffer): number {
  const reader = new PayloadReader(payload, 'CHUNK_ACK');
  const index = reader.u32();
  reader.end();
  return index;
}

export function encodeUploadComplete(digest: Buffer): Buffer {
  if (digest.length !== DIGEST_LENGTH) {
    throw new ProtocolError('MALFORMED_MESSAGE', `Digest must be ${DIGEST_LENGTH} bytes`);
  }
  return Buffer.from(digest);
}

export function decodeUploadComplete(payload: Buffer): Buffer {
  const reader = new PayloadReader(payload, 'UPLOAD_COMPLETE');
  const digest = reader.bytes(DIGEST_LENGTH);
  reader.end();
  return digest;
}

export function encodeFileList(entries: readonly FileEntry[]): Buffer {
  const parts: Buffer[] = [u32(entries.length)];
  for (const entry of entries) {
    parts.push(lengthPrefixed(entry.name), u64(entry.size), u64(Math.max(0, entry.modifiedAt.getTime())));
  }
  return Buffer.concat(parts);
}

export function decodeFileList(payload: Buffer): FileEntry[] {
  const reader = new PayloadReader(payload, 'LIST_RESPONSE');
  const count = reader.u32();
  const entries: FileEntry[] = [];
  for (let i = 0; i < count; i++) {
    const name = reader.string();
    const size = reader.u64();
    const modifiedAt = new Date(reader.u64());
    entries.push({ name, size, modifiedAt });
  }
  reader.end();
  return entries;
}

const MAX_ERROR_MESSAGE_CHARS = 1024;

export function encodeError(error: ErrorPayload): Buffer {
  const message = error.message.slice(0, MAX_ERROR_MESSAGE_CHARS);
  return Buffer.concat([u8(errorKindToCode(error.kind)), lengthPrefixed(message)]);
}

export function decodeError(payload: Buffer): ErrorPayload {
  const reader = new PayloadReader(payload, 'ERROR');
  const code = reader.u8();
  const message = reader.string();
  reader.end();

  const kind = errorKindFromCode(code);
  if (!kind) {
    throw new ProtocolError('MALFORMED_MESSAGE', `Unknown error code ${code}`);
  }
  return { kind, message };
}
