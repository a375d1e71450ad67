import { EventEmitter } from 'events';
import { Duplex } from 'stream';
import { PROTOCOL_VERSION } from '../../shared/constants/protocol';
import { TransferConfig } from '../../shared/types/config';
import { FileRequestPayload, MessageType, ProtocolMessage } from '../../shared/types/protocol';
import { ProtocolError, isFatal, toProtocolError } from '../protocol/errors';
import { TransferStateMachine, TransferState } from '../protocol/TransferStateMachine';
import {
  createMessage,
  decodeFileMetadata,
  decodeFileRequest,
  decodeHandshake,
  encodeError,
  encodeFileList,
  encodeFileMetadata,
  encodeHandshake,
  encodeUploadComplete,
  messageTypeName,
} from '../protocol/WireCodec';
import { FileStorage, ReadHandle, WriteHandle } from '../storage/FileStorage';
import {
  TransferContext,
  collectChunks,
  describeFile,
  receiveExpected,
  streamChunks,
} from '../transfer/chunkStreams';
import { logger } from '../utils/logger';
import { MessageChannel, remoteError } from './MessageChannel';

/**
 * Serves one accepted connection: handshake, then any number of downloads,
 * uploads and listings, strictly one after another. Owns its state machine and
 * the single transfer session; nothing here is shared with other connections.
 */
export class ConnectionHandler extends EventEmitter {
  private readonly channel: MessageChannel;
  private readonly machine = new TransferStateMachine('server');
  private readonly ctx: TransferContext;
  private tempFile: WriteHandle | null = null;
  private source: ReadHandle | null = null;
  private failure: ProtocolError | null = null;

  constructor(
    readonly id: string,
    socket: Duplex,
    private readonly storage: FileStorage,
    private readonly config: Readonly<TransferConfig>
  ) {
    super();
    this.channel = new MessageChannel(socket, config.timeouts);
    this.ctx = {
      channel: this.channel,
      machine: this.machine,
      compressionLevel: config.compressionLevel,
    };
    this.machine.on('transition', (from: TransferState, to: TransferState) => {
      logger.debug(`[${this.id}] ${from} -> ${to}`);
    });
  }

  get state(): TransferState {
    return this.machine.state;
  }

  get lastError(): ProtocolError | null {
    return this.failure;
  }

  /** Runs the connection to completion. Never rejects; failures end up in {@link lastError}. */
  async run(): Promise<void> {
    try {
      if (await this.handshake()) {
        await this.serve();
      }
    } catch (error) {
      await this.abort(toProtocolError(error));
    } finally {
      await this.release();
      await this.channel.close();
      this.emit('closed', this.failure);
    }
  }

  private async handshake(): Promise<boolean> {
    const message = await this.channel.receive(this.config.timeouts.handshakeMs);
    if (!message) {
      return false;
    }
    if (message.type === MessageType.ERROR) {
      throw remoteError(message);
    }
    this.machine.assertInbound(message.type);

    // An unsupported version throws here, before any state change.
    const proposal = decodeHandshake(message.payload);
    this.machine.beginHandshake();

    const ackWindow = Math.min(proposal.ackWindow, this.config.ackWindow);
    await this.channel.send(
      createMessage(MessageType.HANDSHAKE_ACK, encodeHandshake({ version: PROTOCOL_VERSION, ackWindow }))
    );
    this.machine.completeHandshake(ackWindow);
    logger.info(`[${this.id}] Handshake complete (protocol v${proposal.version}, ack window ${ackWindow})`);
    return true;
  }

  private async serve(): Promise<void> {
    for (;;) {
      const message = await this.channel.receive();
      if (!message) {
        return;
      }
      if (message.type === MessageType.ERROR) {
        throw remoteError(message);
      }
      this.machine.assertInbound(message.type);

      switch (message.type) {
        case MessageType.FILE_REQUEST:
          await this.handleDownload(message);
          break;
        case MessageType.UPLOAD_START:
          await this.handleUpload();
          break;
        case MessageType.LIST_REQUEST:
          await this.handleList();
          break;
        default:
          throw this.machine.fail(
            new ProtocolError('PROTOCOL_VIOLATION', `Unexpected ${messageTypeName(message.type)}`)
          );
      }
    }
  }

  private async handleDownload(message: ProtocolMessage): Promise<void> {
    this.machine.beginTransfer('download');

    let request: FileRequestPayload;
    try {
      request = decodeFileRequest(message.payload);
      this.source = await this.storage.openForRead(request.name);
    } catch (error) {
      const rejection = toProtocolError(error);
      if (isFatal(rejection.kind)) {
        throw rejection;
      }
      // The request never turned into a transfer: report it and stay usable.
      logger.warn(`[${this.id}] Rejected download request: ${rejection.message}`);
      this.machine.fail(rejection);
      await this.sendError(rejection);
      this.machine.reset();
      return;
    }

    const metadata = await describeFile(this.source, {
      chunkSize: request.chunkSize,
      compression: request.compression && this.config.compression,
    });
    await this.channel.send(createMessage(MessageType.FILE_METADATA, encodeFileMetadata(metadata)));
    this.machine.setMetadata(metadata);

    logger.info(`[${this.id}] Sending ${metadata.name} (${metadata.size} bytes, ${metadata.chunkSize}-byte chunks)`);
    const compressedChunks = await streamChunks(this.ctx, this.source, metadata);
    const session = this.machine.complete();
    logger.info(`[${this.id}] Sent ${metadata.name}: ${session.totalChunks} chunks, ${compressedChunks} compressed`);

    await this.closeSource();
    this.machine.reset();
  }

  private async handleUpload(): Promise<void> {
    this.machine.beginTransfer('upload');

    const announcement = await receiveExpected(this.ctx);
    if (announcement.type !== MessageType.FILE_METADATA) {
      throw this.machine.fail(new ProtocolError('PROTOCOL_VIOLATION', 'FILE_CHUNK received before FILE_METADATA'));
    }
    const metadata = decodeFileMetadata(announcement.payload);
    this.machine.setMetadata(metadata);

    logger.info(`[${this.id}] Receiving ${metadata.name} (${metadata.size} bytes)`);
    this.tempFile = await this.storage.openForWriteTemp();
    const compressedChunks = await collectChunks(this.ctx, this.tempFile);

    const digest = this.machine.verify();
    await this.storage.commit(this.tempFile, metadata.name);
    this.tempFile = null;
    const session = this.machine.complete();

    await this.channel.send(createMessage(MessageType.UPLOAD_COMPLETE, encodeUploadComplete(digest)));
    logger.info(
      `[${this.id}] Stored ${metadata.name}: ${session.totalChunks} chunks, ${compressedChunks} compressed`
    );
    this.machine.reset();
  }

  private async handleList(): Promise<void> {
    const entries = await this.storage.list();
    await this.channel.send(createMessage(MessageType.LIST_RESPONSE, encodeFileList(entries)));
    logger.debug(`[${this.id}] Listed ${entries.length} files`);
  }

  private async abort(error: ProtocolError): Promise<void> {
    this.failure = error;
    // A rejected version leaves the machine where it was.
    if (!(error.kind === 'VERSION_UNSUPPORTED' && this.machine.state === 'IDLE')) {
      this.machine.fail(error);
    }

    if (error.remote) {
      logger.warn(`[${this.id}] Peer reported ${error.kind}: ${error.message}`);
      return;
    }

    logger.error(`[${this.id}] Connection failed with ${error.kind}: ${error.message}`);
    await this.sendError(error).catch((sendError: unknown) => {
      logger.debug(`[${this.id}] Could not deliver ERROR to peer`, { error: sendError });
    });
  }

  private async sendError(error: ProtocolError): Promise<void> {
    if (!this.channel.isOpen) {
      return;
    }
    await this.channel.send(
      createMessage(MessageType.ERROR, encodeError({ kind: error.kind, message: error.message }))
    );
  }

  private async closeSource(): Promise<void> {
    const source = this.source;
    this.source = null;
    if (source) {
      await source.close();
    }
  }

  private async release(): Promise<void> {
    if (this.tempFile) {
      const temp = this.tempFile;
      this.tempFile = null;
      await this.storage.discard(temp).catch((error: unknown) => {
        logger.error(`[${this.id}] Failed to discard ${temp.tempPath}`, { error });
      });
    }
    await this.closeSource().catch((error: unknown) => {
      logger.warn(`[${this.id}] Failed to close source file`, { error });
    });
  }
}
