import { EventEmitter } from 'events';
import PQueue from 'p-queue';
import { v4 as uuidv4 } from 'uuid';
import { TransferConfig } from '../../shared/types/config';
import { TransferResult } from '../../shared/types/protocol';
import { ProtocolError, toProtocolError } from '../protocol/errors';
import { FileShareClient } from '../network/FileShareClient';
import { RetryPolicy, withRetry } from '../network/retryPolicy';
import { logger } from '../utils/logger';

export type TransferJob =
  | {
      type: 'download';
      name: string;
      destination: string;
      localName?: string;
    }
  | {
      type: 'upload';
      localPath: string;
      remoteName?: string;
    };

export interface TransferOutcome {
  id: string;
  job: TransferJob;
  attempts: number;
  result?: TransferResult;
  error?: ProtocolError;
}

/** Opens a connected, handshaken client. Swapped out in tests. */
export type ClientFactory = () => Promise<FileShareClient>;

function describeJob(job: TransferJob): string {
  return job.type === 'download' ? `download ${job.name}` : `upload ${job.localPath}`;
}

/**
 * Runs a batch of transfers with bounded concurrency. Each job gets its own
 * connection, and a job that fails transiently is restarted on a fresh one.
 */
export class TransferQueue extends EventEmitter {
  private readonly queue: PQueue;
  private readonly retry: RetryPolicy;

  constructor(
    private readonly config: Readonly<TransferConfig>,
    private readonly connect: ClientFactory = async () => {
      const client = new FileShareClient(config);
      await client.connect();
      return client;
    },
    retry: Partial<RetryPolicy> = {}
  ) {
    super();
    this.queue = new PQueue({ concurrency: Math.max(1, config.maxConcurrentTransfers) });
    this.retry = {
      attempts: retry.attempts ?? config.retry.attempts,
      delayMs: retry.delayMs ?? config.retry.delayMs,
      retryOn: retry.retryOn,
      onRetry: retry.onRetry,
    };
  }

  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  /** Queues one job. The returned promise never rejects; failures are in the outcome. */
  add(job: TransferJob): Promise<TransferOutcome> {
    const id = uuidv4();
    return this.queue.add(() => this.execute(id, job));
  }

  async runAll(jobs: readonly TransferJob[]): Promise<TransferOutcome[]> {
    return await Promise.all(jobs.map((job) => this.add(job)));
  }

  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  private async execute(id: string, job: TransferJob): Promise<TransferOutcome> {
    let attempts = 0;
    this.emit('job-started', { id, job });

    try {
      const result = await withRetry(
        async (attempt) => {
          attempts = attempt;
          return await this.runOnce(job);
        },
        {
          ...this.retry,
          onRetry: (error, attempt) => {
            logger.warn(`Job ${id} (${describeJob(job)}) failed with ${error.kind}, retrying`);
            this.retry.onRetry?.(error, attempt);
          },
        }
      );
      const outcome: TransferOutcome = { id, job, attempts, result };
      this.emit('job-complete', outcome);
      return outcome;
    } catch (error) {
      const outcome: TransferOutcome = { id, job, attempts, error: toProtocolError(error) };
      logger.error(`Job ${id} (${describeJob(job)}) failed after ${attempts} attempt(s)`, { error });
      this.emit('job-failed', outcome);
      return outcome;
    }
  }

  private async runOnce(job: TransferJob): Promise<TransferResult> {
    const client = await this.connect();
    try {
      if (job.type === 'download') {
        return await client.download(job.name, { destination: job.destination, localName: job.localName });
      }
      return await client.upload(job.localPath, { remoteName: job.remoteName });
    } finally {
      await client.close();
    }
  }
}
