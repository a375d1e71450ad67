import { EventEmitter } from 'events';
import * as net from 'net';
import * as path from 'path';
import { Duplex } from 'stream';
import { PROTOCOL_VERSION } from '../../shared/constants/protocol';
import { TransferConfig } from '../../shared/types/config';
import { FileEntry, MessageType, TransferProgress, TransferResult } from '../../shared/types/protocol';
import { assertChunkSize } from '../protocol/Chunker';
import { ProtocolError, isFatal, toProtocolError } from '../protocol/errors';
import { digestsEqual } from '../protocol/Integrity';
import { Direction, TransferSession, TransferState, TransferStateMachine } from '../protocol/TransferStateMachine';
import {
  createMessage,
  decodeFileList,
  decodeFileMetadata,
  decodeHandshake,
  decodeUploadComplete,
  encodeError,
  encodeFileMetadata,
  encodeFileRequest,
  encodeHandshake,
} from '../protocol/WireCodec';
import { FileStorage, WriteHandle, openReadHandle } from '../storage/FileStorage';
import { TransferContext, collectChunks, describeFile, receiveExpected, streamChunks } from '../transfer/chunkStreams';
import { connectableHost, defaultTransferConfig } from '../utils/configLoader';
import { logger } from '../utils/logger';
import { validateFileName } from '../utils/pathSecurity';
import { MessageChannel, remoteError } from './MessageChannel';

export type ClientConfig = Pick<
  TransferConfig,
  'host' | 'port' | 'chunkSize' | 'compression' | 'compressionLevel' | 'ackWindow' | 'timeouts'
>;

export interface DownloadOptions {
  /** Directory or storage the file is committed to. */
  destination: string | FileStorage;
  /** Name to store the file under locally. Defaults to the remote name. */
  localName?: string;
  chunkSize?: number;
  compression?: boolean;
}

export interface UploadOptions {
  /** Name to store the file under on the server. Defaults to the local base name. */
  remoteName?: string;
  chunkSize?: number;
  compression?: boolean;
}

export interface TransferFailure {
  name: string;
  direction: Direction;
  error: ProtocolError;
}

function toResult(session: TransferSession, digest: Buffer, compressedChunks: number): TransferResult {
  return {
    name: session.metadata?.name ?? '',
    size: session.metadata?.size ?? 0,
    chunks: session.totalChunks,
    digest: digest.toString('hex'),
    compressedChunks,
  };
}

/**
 * Client end of one connection. Operations run one at a time; a transfer that
 * fails fatally closes the connection, while a rejected request leaves it
 * ready for the next one.
 */
export class FileShareClient extends EventEmitter {
  private readonly machine = new TransferStateMachine('client');
  private channel: MessageChannel | null = null;
  private busy = false;

  constructor(private readonly config: Readonly<ClientConfig> = defaultTransferConfig) {
    super();
    this.machine.on('transition', (from: TransferState, to: TransferState) => {
      logger.debug(`Client ${from} -> ${to}`);
    });
  }

  get state(): TransferState {
    return this.machine.state;
  }

  get isConnected(): boolean {
    return this.channel?.isOpen === true && this.machine.state !== 'IDLE';
  }

  /** Opens a TCP connection and performs the handshake. */
  async connect(host: string = connectableHost(this.config.host), port: number = this.config.port): Promise<void> {
    if (this.channel) {
      throw new ProtocolError('PROTOCOL_VIOLATION', 'Client is already attached to a connection');
    }
    const timeoutMs = this.config.timeouts.handshakeMs;
    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const client = net.createConnection({ host, port });
      const timer = setTimeout(() => {
        client.destroy();
        reject(new ProtocolError('TIMEOUT', `Could not connect to ${host}:${port} within ${timeoutMs} ms`));
      }, timeoutMs);

      client.once('connect', () => {
        clearTimeout(timer);
        client.off('error', onError);
        resolve(client);
      });
      const onError = (error: Error): void => {
        clearTimeout(timer);
        reject(toProtocolError(error, 'WRITE_ERROR'));
      };
      client.once('error', onError);
    });

    logger.info(`Connected to ${host}:${port}`);
    await this.attach(socket);
  }

  /** Performs the handshake over an already-open stream. */
  async attach(socket: Duplex): Promise<void> {
    if (this.channel) {
      throw new ProtocolError('PROTOCOL_VIOLATION', 'Client is already attached to a connection');
    }
    this.channel = new MessageChannel(socket, this.config.timeouts);

    const channel = this.channel;
    try {
      await this.handshake(channel);
    } catch (error) {
      const failure = toProtocolError(error);
      // A rejected version has already sent the machine back to IDLE.
      if (this.machine.state !== 'IDLE') {
        this.machine.fail(failure);
      }
      logger.error(`Handshake failed with ${failure.kind}: ${failure.message}`);
      if (!failure.remote && channel.isOpen) {
        await channel
          .send(createMessage(MessageType.ERROR, encodeError({ kind: failure.kind, message: failure.message })))
          .catch((sendError: unknown) => {
            logger.debug('Could not deliver ERROR to server', { error: sendError });
          });
      }
      await channel.close();
      throw failure;
    }
  }

  private async handshake(channel: MessageChannel): Promise<void> {
    this.machine.beginHandshake();
    await channel.send(
      createMessage(
        MessageType.HANDSHAKE,
        encodeHandshake({ version: PROTOCOL_VERSION, ackWindow: this.config.ackWindow })
      )
    );

    const reply = await channel.receive(this.config.timeouts.handshakeMs);
    if (!reply) {
      throw this.machine.fail(new ProtocolError('TRUNCATED', 'Server closed the connection during the handshake'));
    }
    if (reply.type === MessageType.ERROR) {
      const rejection = remoteError(reply);
      if (rejection.kind === 'VERSION_UNSUPPORTED') {
        this.machine.rejectHandshake();
      } else {
        this.machine.fail(rejection);
      }
      throw rejection;
    }
    this.machine.assertInbound(reply.type);

    const accepted = decodeHandshake(reply.payload);
    if (accepted.ackWindow > this.config.ackWindow) {
      throw this.machine.fail(
        new ProtocolError(
          'PROTOCOL_VIOLATION',
          `Server chose ack window ${accepted.ackWindow}, larger than the proposed ${this.config.ackWindow}`
        )
      );
    }
    this.machine.completeHandshake(accepted.ackWindow);
    logger.info(`Handshake complete (protocol v${accepted.version}, ack window ${accepted.ackWindow})`);
  }

  private context(channel: MessageChannel): TransferContext {
    return {
      channel,
      machine: this.machine,
      compressionLevel: this.config.compressionLevel,
      onProgress: (progress: TransferProgress) => this.emit('transfer-progress', progress),
    };
  }

  private async exclusive<T>(operation: (channel: MessageChannel) => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new ProtocolError('PROTOCOL_VIOLATION', 'Another operation is already running on this connection');
    }
    const channel = this.channel;
    if (!channel || !channel.isOpen) {
      throw new ProtocolError('WRITE_ERROR', 'Not connected');
    }
    if (this.machine.state !== 'READY') {
      throw new ProtocolError('PROTOCOL_VIOLATION', `Connection is not ready (state ${this.machine.state})`);
    }

    this.busy = true;
    try {
      return await operation(channel);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Fails the current session. A request the server turned down keeps the
   * connection; anything else tears it down, telling the server why when the
   * fault is ours.
   */
  private async handleFailure(error: ProtocolError, requestPhase: boolean): Promise<ProtocolError> {
    this.machine.fail(error);

    if (requestPhase && error.remote && !isFatal(error.kind)) {
      this.machine.reset();
      return error;
    }

    const channel = this.channel;
    if (channel && !error.remote && channel.isOpen) {
      await channel
        .send(createMessage(MessageType.ERROR, encodeError({ kind: error.kind, message: error.message })))
        .catch((sendError: unknown) => {
          logger.debug('Could not deliver ERROR to server', { error: sendError });
        });
    }
    await this.close();
    return error;
  }

  private reportFailure(name: string, direction: Direction, error: ProtocolError): void {
    logger.error(`Transfer failed: ${direction} ${name} (${error.kind}): ${error.message}`);
    const failure: TransferFailure = { name, direction, error };
    this.emit('transfer-failed', failure);
  }

  /**
   * Downloads `name` and commits it under `options.destination` once the digest
   * has been verified. Nothing appears under the final name on failure.
   */
  async download(name: string, options: DownloadOptions): Promise<TransferResult> {
    validateFileName(name);
    const localName = validateFileName(options.localName ?? name);
    const chunkSize = assertChunkSize(options.chunkSize ?? this.config.chunkSize);
    const compression = options.compression ?? this.config.compression;
    const storage =
      typeof options.destination === 'string' ? new FileStorage(options.destination) : options.destination;
    await storage.initialize();

    return await this.exclusive(async (channel) => {
      const ctx = this.context(channel);
      let requestPhase = true;
      let temp: WriteHandle | null = null;

      this.machine.beginTransfer('download');
      try {
        await channel.send(createMessage(MessageType.FILE_REQUEST, encodeFileRequest({ name, chunkSize, compression })));

        const announcement = await receiveExpected(ctx);
        requestPhase = false;
        if (announcement.type !== MessageType.FILE_METADATA) {
          throw this.machine.fail(new ProtocolError('PROTOCOL_VIOLATION', 'FILE_CHUNK received before FILE_METADATA'));
        }
        const metadata = decodeFileMetadata(announcement.payload);
        if (metadata.name !== name || metadata.chunkSize !== chunkSize) {
          throw this.machine.fail(
            new ProtocolError(
              'PROTOCOL_VIOLATION',
              `Server described ${metadata.name} with ${metadata.chunkSize}-byte chunks, requested ${name} with ${chunkSize}`
            )
          );
        }
        this.machine.setMetadata(metadata);
        this.emit('transfer-started', this.machine.progress());
        logger.info(`Downloading ${name} (${metadata.size} bytes)`);

        temp = await storage.openForWriteTemp();
        const compressedChunks = await collectChunks(ctx, temp);
        const digest = this.machine.verify();
        await storage.commit(temp, localName);
        temp = null;

        const session = this.machine.complete();
        this.machine.reset();

        const result = toResult(session, digest, compressedChunks);
        logger.info(`Downloaded ${name}: ${result.chunks} chunks, ${compressedChunks} compressed`);
        this.emit('transfer-complete', result);
        return result;
      } catch (error) {
        if (temp) {
          const abandoned = temp;
          await storage.discard(abandoned).catch((discardError: unknown) => {
            logger.warn(`Failed to discard ${abandoned.tempPath}`, { error: discardError });
          });
        }
        const failure = await this.handleFailure(toProtocolError(error), requestPhase);
        this.reportFailure(name, 'download', failure);
        throw failure;
      }
    });
  }

  /**
   * Uploads a local file. Resolves once the server has verified and stored it.
   */
  async upload(localPath: string, options: UploadOptions = {}): Promise<TransferResult> {
    const remoteName = validateFileName(options.remoteName ?? path.basename(localPath));
    const chunkSize = assertChunkSize(options.chunkSize ?? this.config.chunkSize);
    const compression = options.compression ?? this.config.compression;
    const source = await openReadHandle(localPath, remoteName);

    try {
      return await this.exclusive(async (channel) => {
        const ctx = this.context(channel);

        this.machine.beginTransfer('upload');
        try {
          const metadata = await describeFile(source, { chunkSize, compression });
          await channel.send(createMessage(MessageType.UPLOAD_START));
          await channel.send(createMessage(MessageType.FILE_METADATA, encodeFileMetadata(metadata)));
          this.machine.setMetadata(metadata);
          this.emit('transfer-started', this.machine.progress());
          logger.info(`Uploading ${localPath} as ${remoteName} (${metadata.size} bytes)`);

          const compressedChunks = await streamChunks(ctx, source, metadata);

          const reply = await receiveExpected(ctx);
          if (reply.type !== MessageType.UPLOAD_COMPLETE) {
            throw this.machine.fail(new ProtocolError('PROTOCOL_VIOLATION', 'Expected UPLOAD_COMPLETE'));
          }
          const confirmed = decodeUploadComplete(reply.payload);
          if (!digestsEqual(confirmed, metadata.digest)) {
            throw this.machine.fail(
              new ProtocolError('CHECKSUM_MISMATCH', `Server stored ${remoteName} with digest ${confirmed.toString('hex')}`)
            );
          }

          const session = this.machine.complete();
          this.machine.reset();

          const result = toResult(session, confirmed, compressedChunks);
          logger.info(`Uploaded ${remoteName}: ${result.chunks} chunks, ${compressedChunks} compressed`);
          this.emit('transfer-complete', result);
          return result;
        } catch (error) {
          const failure = await this.handleFailure(toProtocolError(error), false);
          this.reportFailure(remoteName, 'upload', failure);
          throw failure;
        }
      });
    } finally {
      await source.close();
    }
  }

  async list(): Promise<FileEntry[]> {
    return await this.exclusive(async (channel) => {
      try {
        await channel.send(createMessage(MessageType.LIST_REQUEST));
        const reply = await receiveExpected(this.context(channel));
        return decodeFileList(reply.payload);
      } catch (error) {
        throw await this.handleFailure(toProtocolError(error), false);
      }
    });
  }

  async close(): Promise<void> {
    const channel = this.channel;
    if (channel) {
      await channel.close();
    }
  }
}
