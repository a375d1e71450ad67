import * as crypto from 'crypto';
import { promisify } from 'util';
import { deflate as deflateCallback, inflate as inflateCallback } from 'zlib';
import { CompressionLevelValue } from '../../shared/constants/protocol';
import { Chunk, WireChunk } from '../../shared/types/protocol';
import { ProtocolError } from './errors';

const deflate = promisify(deflateCallback);
const inflate = promisify(inflateCallback);

const DIGEST_ALGORITHM = 'sha256';

export function digest(bytes: Buffer): Buffer {
  return crypto.createHash(DIGEST_ALGORITHM).update(bytes).digest();
}

/**
 * Whole-file digest built up as chunks are accepted in order.
 */
export class DigestAccumulator {
  private readonly hash = crypto.createHash(DIGEST_ALGORITHM);
  private result: Buffer | null = null;

  update(bytes: Buffer): void {
    if (this.result) {
      throw new Error('Digest already finalized');
    }
    this.hash.update(bytes);
  }

  digest(): Buffer {
    if (!this.result) {
      this.result = this.hash.digest();
    }
    return this.result;
  }
}

export function digestsEqual(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export async function compress(bytes: Buffer, level: CompressionLevelValue): Promise<Buffer> {
  return await deflate(bytes, { level });
}

export async function decompress(bytes: Buffer, maxOutputLength?: number): Promise<Buffer> {
  try {
    return await inflate(bytes, maxOutputLength === undefined ? {} : { maxOutputLength: Math.max(maxOutputLength, 1) });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProtocolError('CORRUPT_PAYLOAD', `Failed to decompress payload: ${reason}`, { cause: error });
  }
}

/**
 * Prepares a chunk for the wire. A chunk that does not shrink under compression
 * is sent raw, so the flag is per chunk.
 */
export async function packChunk(
  chunk: Chunk,
  compression: boolean,
  level: CompressionLevelValue
): Promise<WireChunk> {
  const raw: WireChunk = { index: chunk.index, compressed: false, rawLength: chunk.data.length, data: chunk.data };
  if (!compression || chunk.data.length === 0) {
    return raw;
  }

  const packed = await compress(chunk.data, level);
  if (packed.length >= chunk.data.length) {
    return raw;
  }
  return { ...raw, compressed: true, data: packed };
}

export async function unpackChunk(wire: WireChunk): Promise<Chunk> {
  if (!wire.compressed) {
    return { index: wire.index, data: wire.data };
  }

  const data = await decompress(wire.data, wire.rawLength);
  if (data.length !== wire.rawLength) {
    throw new ProtocolError(
      'CORRUPT_PAYLOAD',
      `Chunk ${wire.index} inflated to ${data.length} bytes, expected ${wire.rawLength}`
    );
  }
  return { index: wire.index, data };
}
