import { ChunkSizeValue, isAllowedChunkSize } from '../../shared/constants/protocol';
import { Chunk } from '../../shared/types/protocol';
import { ProtocolError } from './errors';

export interface ChunkRange {
  index: number;
  start: number;
  end: number;
}

export function assertChunkSize(chunkSize: number): ChunkSizeValue {
  if (!isAllowedChunkSize(chunkSize)) {
    throw new ProtocolError('INVALID_CHUNK_SIZE', `Chunk size ${chunkSize} is not allowed`);
  }
  return chunkSize;
}

export function countChunks(totalSize: number, chunkSize: number): number {
  return Math.ceil(totalSize / assertChunkSize(chunkSize));
}

/** Byte range `[start, end)` covered by chunk `index`. */
export function chunkRange(index: number, chunkSize: number, totalSize: number): ChunkRange {
  const start = index * chunkSize;
  return { index, start, end: Math.min(start + chunkSize, totalSize) };
}

export function* chunkRanges(totalSize: number, chunkSize: number): Generator<ChunkRange> {
  const total = countChunks(totalSize, chunkSize);
  for (let index = 0; index < total; index++) {
    yield chunkRange(index, chunkSize, totalSize);
  }
}

export function split(fileBytes: Buffer, chunkSize: number): Chunk[] {
  const chunks: Chunk[] = [];
  for (const range of chunkRanges(fileBytes.length, chunkSize)) {
    chunks.push({ index: range.index, data: fileBytes.subarray(range.start, range.end) });
  }
  return chunks;
}

/**
 * Concatenates chunks presented in increasing index order. Nothing is reordered:
 * a skipped index is `MISSING_CHUNK`, a repeated or decreasing one `OUT_OF_ORDER`.
 */
export function join(chunks: readonly Chunk[]): Buffer {
  let expected = 0;
  for (const chunk of chunks) {
    if (chunk.index < expected) {
      throw new ProtocolError('OUT_OF_ORDER', `Chunk ${chunk.index} presented after chunk ${expected - 1}`);
    }
    if (chunk.index > expected) {
      throw new ProtocolError('MISSING_CHUNK', `Chunk ${expected} is missing`);
    }
    expected++;
  }
  return Buffer.concat(chunks.map((chunk) => chunk.data));
}
