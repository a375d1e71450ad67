#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { TransferConfig } from '../shared/types/config';
import { FileShareClient } from './network/FileShareClient';
import { FileShareServer } from './network/FileShareServer';
import { TransferJob, TransferOutcome, TransferQueue } from './transfer/TransferQueue';
import { ConfigOverrides, loadConfig, resolveConfigPath } from './utils/configLoader';
import { logger, setLogLevel } from './utils/logger';

interface ConnectionOptions {
  config?: string;
  host?: string;
  port?: number;
  chunkSize?: number;
  compression?: boolean;
  ackWindow?: number;
}

interface DownloadCommandOptions extends ConnectionOptions {
  output: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function withConnectionOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to configuration JSON file')
    .option('-H, --host <host>', 'Server host')
    .option('-p, --port <port>', 'Server port', parseInteger)
    .option('--chunk-size <bytes>', 'Chunk size (1024, 4096, 16384 or 65536)', parseInteger)
    .option('--no-compression', 'Disable chunk compression')
    .option('--ack-window <chunks>', 'Chunks per acknowledgement, 0 to stream', parseInteger);
}

async function configure(options: ConnectionOptions, extra: ConfigOverrides = {}): Promise<Readonly<TransferConfig>> {
  const config = await loadConfig(options.config, {
    host: options.host,
    port: options.port,
    chunkSize: options.chunkSize,
    // commander sets this to true unless --no-compression is given
    compression: options.compression === false ? false : undefined,
    ackWindow: options.ackWindow,
    ...extra,
  });
  setLogLevel(config.logLevel);
  return config;
}

function reportOutcomes(outcomes: TransferOutcome[]): void {
  for (const outcome of outcomes) {
    const target = outcome.job.type === 'download' ? outcome.job.name : outcome.job.localPath;
    if (outcome.result) {
      logger.info(`${outcome.job.type} ${target}: ${outcome.result.size} bytes, sha256 ${outcome.result.digest}`);
    } else {
      logger.error(`${outcome.job.type} ${target} failed: ${outcome.error?.kind ?? 'unknown'} ${outcome.error?.message ?? ''}`);
      process.exitCode = 1;
    }
  }
}

async function handleServe(options: ConnectionOptions & { root?: string }): Promise<void> {
  const config = await configure(options, { storageRoot: options.root });
  const server = new FileShareServer(config);
  await server.start();

  const shutdown = (): void => {
    logger.info('Shutting down');
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Failed to stop server cleanly', { error });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function handleList(options: ConnectionOptions): Promise<void> {
  const config = await configure(options);
  const client = new FileShareClient(config);
  await client.connect();
  try {
    const entries = await client.list();
    for (const entry of entries) {
      // eslint-disable-next-line no-console
      console.log(`${entry.size.toString().padStart(12)}  ${entry.modifiedAt.toISOString()}  ${entry.name}`);
    }
  } finally {
    await client.close();
  }
}

async function handleDownload(names: string[], options: DownloadCommandOptions): Promise<void> {
  const config = await configure(options);
  const queue = new TransferQueue(config);
  const jobs = names.map((name): TransferJob => ({ type: 'download', name, destination: options.output }));
  reportOutcomes(await queue.runAll(jobs));
}

async function handleUpload(paths: string[], options: ConnectionOptions): Promise<void> {
  const config = await configure(options);
  const queue = new TransferQueue(config);
  const jobs = paths.map((localPath): TransferJob => ({ type: 'upload', localPath }));
  reportOutcomes(await queue.runAll(jobs));
}

async function handleConfig(options: { config?: string }): Promise<void> {
  const config = await loadConfig(options.config);
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ path: resolveConfigPath(options.config), config }, null, 2));
}

const program = new Command();

program.name('bytetrickle').description('Chunked file transfer for slow links').version('1.0.0');

withConnectionOptions(program.command('serve').description('Serve a directory'))
  .option('-r, --root <dir>', 'Directory to serve')
  .action(async (options: ConnectionOptions & { root?: string }) => {
    await handleServe(options);
  });

withConnectionOptions(program.command('list').description('List files on a server')).action(
  async (options: ConnectionOptions) => {
    await handleList(options);
  }
);

withConnectionOptions(program.command('download <names...>').description('Download files from a server'))
  .option('-o, --output <dir>', 'Directory to save into', '.')
  .action(async (names: string[], options: DownloadCommandOptions) => {
    await handleDownload(names, options);
  });

withConnectionOptions(program.command('upload <paths...>').description('Upload files to a server')).action(
  async (paths: string[], options: ConnectionOptions) => {
    await handleUpload(paths, options);
  }
);

program
  .command('config')
  .description('Print the effective configuration')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (options: { config?: string }) => {
    await handleConfig(options);
  });

void program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('CLI command failed', { error });
  process.exit(1);
});
