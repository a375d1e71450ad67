import { CompressionLevelValue } from '../../shared/constants/protocol';
import { FileMetadata, MessageType, ProtocolMessage, TransferProgress } from '../../shared/types/protocol';
import { chunkRanges } from '../protocol/Chunker';
import { ProtocolError } from '../protocol/errors';
import { packChunk, unpackChunk } from '../protocol/Integrity';
import { TransferStateMachine } from '../protocol/TransferStateMachine';
import {
  createMessage,
  decodeChunk,
  decodeChunkAck,
  encodeChunk,
  encodeChunkAck,
  messageTypeName,
} from '../protocol/WireCodec';
import { MessageChannel, remoteError } from '../network/MessageChannel';
import { ReadHandle, WriteHandle, computeDigest } from '../storage/FileStorage';

export interface TransferContext {
  channel: MessageChannel;
  machine: TransferStateMachine;
  compressionLevel: CompressionLevelValue;
  onProgress?: (progress: TransferProgress) => void;
}

export async function describeFile(
  handle: ReadHandle,
  options: Pick<FileMetadata, 'chunkSize' | 'compression'>
): Promise<FileMetadata> {
  return {
    name: handle.name,
    size: handle.size,
    chunkSize: options.chunkSize,
    compression: options.compression,
    digest: await computeDigest(handle),
  };
}

function reportProgress(ctx: TransferContext): void {
  if (!ctx.onProgress) {
    return;
  }
  const progress = ctx.machine.progress();
  if (progress) {
    ctx.onProgress(progress);
  }
}

/**
 * Receives the next message of an active transfer. A closed stream is
 * `TRUNCATED`, a peer ERROR is rethrown as its own kind, and anything the state
 * machine does not expect is `PROTOCOL_VIOLATION`.
 */
export async function receiveExpected(ctx: TransferContext): Promise<ProtocolMessage> {
  const message = await ctx.channel.receive();
  if (!message) {
    throw new ProtocolError('TRUNCATED', 'Connection closed during transfer');
  }
  if (message.type === MessageType.ERROR) {
    throw remoteError(message);
  }
  ctx.machine.assertInbound(message.type);
  return message;
}

async function awaitChunkAck(ctx: TransferContext, index: number): Promise<void> {
  const message = await receiveExpected(ctx);
  if (message.type !== MessageType.CHUNK_ACK) {
    throw new ProtocolError('PROTOCOL_VIOLATION', `Expected CHUNK_ACK for chunk ${index}, got ${messageTypeName(message.type)}`);
  }
  const acknowledged = decodeChunkAck(message.payload);
  if (acknowledged !== index) {
    throw new ProtocolError('PROTOCOL_VIOLATION', `CHUNK_ACK for chunk ${acknowledged}, expected ${index}`);
  }
}

/**
 * Sends every chunk of `source` in order. Returns how many went out compressed.
 */
export async function streamChunks(ctx: TransferContext, source: ReadHandle, metadata: FileMetadata): Promise<number> {
  let compressedChunks = 0;

  try {
    for (const range of chunkRanges(metadata.size, metadata.chunkSize)) {
      const aborted = ctx.channel.takeRemoteError();
      if (aborted) {
        throw aborted;
      }

      const chunk = { index: range.index, data: await source.read(range.start, range.end - range.start) };
      const wire = await packChunk(chunk, metadata.compression, ctx.compressionLevel);
      if (wire.compressed) {
        compressedChunks++;
      }

      await ctx.channel.send(createMessage(MessageType.FILE_CHUNK, encodeChunk(wire)));
      ctx.machine.recordSentChunk(chunk);
      reportProgress(ctx);

      if (ctx.machine.expectsAck(range.index)) {
        await awaitChunkAck(ctx, range.index);
      }
    }
  } catch (error) {
    // A write that failed because the peer hung up: prefer the reason it sent.
    throw ctx.channel.takeRemoteError() ?? error;
  }

  return compressedChunks;
}

/**
 * Takes chunks until the state machine reaches VERIFYING, appending each one to
 * `sink` as it is accepted. Returns how many arrived compressed.
 */
export async function collectChunks(ctx: TransferContext, sink: WriteHandle): Promise<number> {
  let compressedChunks = 0;

  while (ctx.machine.state !== 'VERIFYING') {
    const message = await receiveExpected(ctx);
    if (message.type !== MessageType.FILE_CHUNK) {
      throw ctx.machine.fail(
        new ProtocolError('PROTOCOL_VIOLATION', `Expected FILE_CHUNK, got ${messageTypeName(message.type)}`)
      );
    }

    const wire = decodeChunk(message.payload);
    ctx.machine.expectChunk(wire);
    const chunk = await unpackChunk(wire);
    if (wire.compressed) {
      compressedChunks++;
    }

    ctx.machine.acceptChunk(chunk);
    await sink.write(chunk.data);
    reportProgress(ctx);

    if (ctx.machine.expectsAck(chunk.index)) {
      await ctx.channel.send(createMessage(MessageType.CHUNK_ACK, encodeChunkAck(chunk.index)));
    }
  }

  return compressedChunks;
}
