import * as path from 'path';
import { logger } from './logger';
import { MAX_FILENAME_BYTES } from '../../shared/constants/protocol';
import { ProtocolError } from '../protocol/errors';

/**
 * Security utility for file name validation.
 * Prevents path traversal out of the storage root.
 */

const FORBIDDEN_SEGMENTS = new Set(['', '.', '..']);

/**
 * Validates a file name received from a peer or supplied by a caller.
 * Names are flat: no separators, no dot segments, no NUL bytes.
 * @throws ProtocolError `INVALID_FILENAME` when the name is rejected
 */
export function validateFileName(name: string): string {
  if (FORBIDDEN_SEGMENTS.has(name)) {
    throw new ProtocolError('INVALID_FILENAME', `Invalid file name: "${name}"`);
  }

  if (Buffer.byteLength(name, 'utf8') > MAX_FILENAME_BYTES) {
    throw new ProtocolError('INVALID_FILENAME', `File name exceeds ${MAX_FILENAME_BYTES} bytes`);
  }

  if (/[/\\\0]/.test(name)) {
    throw new ProtocolError('INVALID_FILENAME', `File name contains a path separator: "${name}"`);
  }

  return name;
}

/**
 * Resolves a validated name inside the base directory.
 * @throws ProtocolError `INVALID_FILENAME` if the resolved path escapes the base directory
 */
export function resolveInside(baseDir: string, name: string): string {
  const normalizedBase = path.resolve(baseDir);
  const resolved = path.resolve(normalizedBase, validateFileName(name));

  if (path.dirname(resolved) !== normalizedBase) {
    logger.error(`Path traversal attempt detected: ${name} (resolved: ${resolved}, base: ${normalizedBase})`);
    throw new ProtocolError('INVALID_FILENAME', `Path traversal detected: ${name}`);
  }

  return resolved;
}
