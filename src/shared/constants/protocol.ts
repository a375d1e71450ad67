export const PROTOCOL_VERSION = 1;

export const SUPPORTED_VERSIONS: ReadonlySet<number> = new Set([PROTOCOL_VERSION]);

// [version:u8][type:u8][length:u32]
export const HEADER_SIZE = 6;

export const MAX_PAYLOAD_LENGTH = 16 * 1024 * 1024;

// SHA-256
export const DIGEST_LENGTH = 32;

export const MAX_FILENAME_BYTES = 255;

export const ChunkSize = {
  SMALL: 1024, // ultra-low bandwidth
  MEDIUM: 4096, // low bandwidth
  LARGE: 16384, // normal bandwidth
  XLARGE: 65536, // high bandwidth
} as const;

export type ChunkSizeValue = (typeof ChunkSize)[keyof typeof ChunkSize];

export const ALLOWED_CHUNK_SIZES: readonly ChunkSizeValue[] = Object.values(ChunkSize);

export const CompressionLevel = {
  NONE: 0,
  LOW: 1,
  MEDIUM: 6,
  HIGH: 9,
} as const;

export type CompressionLevelValue = (typeof CompressionLevel)[keyof typeof CompressionLevel];

export const ALLOWED_COMPRESSION_LEVELS: readonly CompressionLevelValue[] =
  Object.values(CompressionLevel);

export const TEMP_FILE_PREFIX = '.';
export const TEMP_FILE_SUFFIX = '.part';

export function isAllowedChunkSize(value: number): value is ChunkSizeValue {
  return ALLOWED_CHUNK_SIZES.some((size) => size === value);
}

export function isAllowedCompressionLevel(value: number): value is CompressionLevelValue {
  return ALLOWED_COMPRESSION_LEVELS.some((level) => level === value);
}
