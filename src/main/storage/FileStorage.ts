import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { TEMP_FILE_PREFIX, TEMP_FILE_SUFFIX } from '../../shared/constants/protocol';
import { FileEntry } from '../../shared/types/protocol';
import { ProtocolError, errnoCode, toProtocolError } from '../protocol/errors';
import { DigestAccumulator } from '../protocol/Integrity';
import { logger } from '../utils/logger';
import { resolveInside, validateFileName } from '../utils/pathSecurity';

const DIGEST_BLOCK_SIZE = 64 * 1024;

export interface ReadHandle {
  readonly name: string;
  readonly size: number;
  readonly modifiedAt: Date;
  read(position: number, length: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface WriteHandle {
  readonly id: string;
  readonly tempPath: string;
  readonly bytesWritten: number;
  write(bytes: Buffer): Promise<void>;
}

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR';
}

function isTempName(name: string): boolean {
  return name.startsWith(TEMP_FILE_PREFIX) && name.endsWith(TEMP_FILE_SUFFIX);
}

/**
 * Opens any regular file for positional reads. The size and modification time
 * are captured once, at open.
 * @throws ProtocolError `FILE_NOT_FOUND` if the path is missing or not a regular file
 */
export async function openReadHandle(filePath: string, name: string): Promise<ReadHandle> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    if (isMissing(error)) {
      throw new ProtocolError('FILE_NOT_FOUND', `File not found: ${name}`, { cause: error });
    }
    throw toProtocolError(error);
  }

  const stats = await handle.stat().catch(async (error: unknown) => {
    await handle.close();
    throw toProtocolError(error);
  });
  if (!stats.isFile()) {
    await handle.close();
    throw new ProtocolError('FILE_NOT_FOUND', `Not a regular file: ${name}`);
  }

  return {
    name,
    size: stats.size,
    modifiedAt: stats.mtime,
    async read(position: number, length: number): Promise<Buffer> {
      const buffer = Buffer.alloc(length);
      let offset = 0;
      while (offset < length) {
        const { bytesRead } = await handle.read(buffer, offset, length - offset, position + offset);
        if (bytesRead === 0) {
          throw new ProtocolError('TRUNCATED', `${name} shrank while being read`);
        }
        offset += bytesRead;
      }
      return buffer;
    },
    async close(): Promise<void> {
      await handle.close();
    },
  };
}

/** Whole-file digest of an open handle, read block by block. */
export async function computeDigest(handle: ReadHandle): Promise<Buffer> {
  const accumulator = new DigestAccumulator();
  for (let position = 0; position < handle.size; position += DIGEST_BLOCK_SIZE) {
    const length = Math.min(DIGEST_BLOCK_SIZE, handle.size - position);
    accumulator.update(await handle.read(position, length));
  }
  return accumulator.digest();
}

class TempFile implements WriteHandle {
  private written = 0;

  constructor(
    readonly id: string,
    readonly tempPath: string,
    readonly fileHandle: fs.FileHandle
  ) {}

  get bytesWritten(): number {
    return this.written;
  }

  async write(bytes: Buffer): Promise<void> {
    try {
      let offset = 0;
      while (offset < bytes.length) {
        const { bytesWritten } = await this.fileHandle.write(bytes, offset, bytes.length - offset, this.written + offset);
        offset += bytesWritten;
      }
      this.written += bytes.length;
    } catch (error) {
      throw toProtocolError(error, 'WRITE_ERROR');
    }
  }
}

/**
 * Flat file namespace under one root directory. Writers go to a private temp
 * file next to their destination and are published by an atomic rename, so a
 * file under its final name is always complete.
 */
export class FileStorage {
  private readonly openTemps = new Map<string, TempFile>();

  constructor(readonly root: string) {}

  async initialize(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
  }

  async openForRead(name: string): Promise<ReadHandle> {
    return await openReadHandle(resolveInside(this.root, name), name);
  }

  async openForWriteTemp(): Promise<WriteHandle> {
    const id = uuidv4();
    const tempPath = path.join(this.root, `${TEMP_FILE_PREFIX}${id}${TEMP_FILE_SUFFIX}`);
    try {
      const fileHandle = await fs.open(tempPath, 'wx');
      const temp = new TempFile(id, tempPath, fileHandle);
      this.openTemps.set(id, temp);
      return temp;
    } catch (error) {
      throw toProtocolError(error, 'WRITE_ERROR');
    }
  }

  private takeTemp(handle: WriteHandle): TempFile {
    const temp = this.openTemps.get(handle.id);
    if (!temp) {
      throw new ProtocolError('WRITE_ERROR', `Unknown or already released temp file ${handle.id}`);
    }
    this.openTemps.delete(handle.id);
    return temp;
  }

  /**
   * Flushes the temp file and renames it to `name`, replacing any previous file.
   * @throws ProtocolError `WRITE_ERROR` if the file cannot be published
   */
  async commit(handle: WriteHandle, name: string): Promise<string> {
    const temp = this.takeTemp(handle);
    let target: string;
    try {
      target = resolveInside(this.root, validateFileName(name));
      await temp.fileHandle.sync();
      await temp.fileHandle.close();
      await fs.rename(temp.tempPath, target);
    } catch (error) {
      await temp.fileHandle.close().catch(() => undefined);
      await fs.rm(temp.tempPath, { force: true });
      throw toProtocolError(error, 'WRITE_ERROR');
    }
    logger.debug(`Committed ${temp.tempPath} as ${target}`);
    return target;
  }

  /** Closes and deletes a temp file that will never be committed. */
  async discard(handle: WriteHandle): Promise<void> {
    const temp = this.openTemps.get(handle.id);
    if (!temp) {
      return;
    }
    this.openTemps.delete(handle.id);
    await temp.fileHandle.close().catch((error: unknown) => {
      logger.warn(`Failed to close temp file ${temp.tempPath}`, { error });
    });
    await fs.rm(temp.tempPath, { force: true });
  }

  async list(): Promise<FileEntry[]> {
    const entries = await fs.readdir(this.root, { withFileTypes: true });
    const files: FileEntry[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || isTempName(entry.name)) {
        continue;
      }
      try {
        const stats = await fs.stat(path.join(this.root, entry.name));
        files.push({ name: entry.name, size: stats.size, modifiedAt: stats.mtime });
      } catch (error) {
        // Removed between readdir and stat.
        if (!isMissing(error)) {
          throw error;
        }
      }
    }

    return files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}
