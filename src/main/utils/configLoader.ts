import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ChunkSize, CompressionLevel } from '../../shared/constants/protocol';
import { TransferConfig } from '../../shared/types/config';
import { errnoCode } from '../protocol/errors';
import { sanitizeTransferConfig } from './validation';

export const defaultTransferConfig: TransferConfig = {
  host: '0.0.0.0',
  port: 5000,
  storageRoot: './shared_files',
  chunkSize: ChunkSize.MEDIUM,
  compression: true,
  compressionLevel: CompressionLevel.MEDIUM,
  ackWindow: 0,
  maxConcurrentTransfers: 3,
  retry: {
    attempts: 3,
    delayMs: 1000,
  },
  timeouts: {
    handshakeMs: 10_000,
    readMs: 30_000,
    writeMs: 30_000,
  },
  logLevel: 'info',
};

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  return path.join(os.homedir(), '.bytetrickle', 'config.json');
}

// Addresses a server binds to that mean "every interface"; not a place to connect to.
const WILDCARD_HOSTS: Readonly<Record<string, string>> = {
  '0.0.0.0': '127.0.0.1',
  '::': '::1',
};

/** The address a client dials for `host`: a wildcard bind address becomes loopback. */
export function connectableHost(host: string): string {
  return WILDCARD_HOSTS[host] ?? host;
}

async function readConfigFile(configPath: string): Promise<unknown> {
  let contents: string;
  try {
    contents = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return {};
    }
    throw error;
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new Error(`Configuration file ${configPath} is not valid JSON`, { cause: error });
  }
}

export type ConfigOverrides = Partial<Record<keyof TransferConfig, unknown>>;

/**
 * Loads the configuration file (a missing file means all defaults), applies
 * `overrides` on top, and validates the result.
 */
export async function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {}
): Promise<Readonly<TransferConfig>> {
  const fromFile = await readConfigFile(resolveConfigPath(configPath));
  const base = sanitizeTransferConfig(fromFile, defaultTransferConfig);
  // Fields left undefined in `overrides` fall back to the file's values.
  return sanitizeTransferConfig({ ...base, ...overrides }, base);
}
