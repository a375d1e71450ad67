import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  Chunk,
  FileMetadata,
  MessageType,
  MessageTypeCode,
  TransferProgress,
  WireChunk,
} from '../../shared/types/protocol';
import { chunkRange, countChunks, assertChunkSize } from './Chunker';
import { ProtocolError } from './errors';
import { DigestAccumulator, digestsEqual } from './Integrity';
import { messageTypeName } from './WireCodec';

export type TransferState =
  | 'IDLE'
  | 'HANDSHAKING'
  | 'READY'
  | 'DOWNLOADING'
  | 'UPLOADING'
  | 'VERIFYING'
  | 'COMPLETE'
  | 'FAILED';

export type Role = 'client' | 'server';
export type Direction = 'download' | 'upload';

export interface TransferSession {
  readonly id: string;
  readonly direction: Direction;
  readonly sending: boolean;
  readonly startedAt: Date;
  metadata: FileMetadata | null;
  totalChunks: number;
  chunksTransferred: number;
  bytesTransferred: number;
  digest: DigestAccumulator | null;
}

// Messages a peer may send us in each state. ERROR is accepted everywhere.
const INBOUND: Record<Role, Partial<Record<TransferState, readonly MessageTypeCode[]>>> = {
  server: {
    IDLE: [MessageType.HANDSHAKE],
    READY: [MessageType.FILE_REQUEST, MessageType.UPLOAD_START, MessageType.LIST_REQUEST],
    UPLOADING: [MessageType.FILE_METADATA, MessageType.FILE_CHUNK],
    DOWNLOADING: [MessageType.CHUNK_ACK],
  },
  client: {
    HANDSHAKING: [MessageType.HANDSHAKE_ACK],
    READY: [MessageType.LIST_RESPONSE],
    DOWNLOADING: [MessageType.FILE_METADATA, MessageType.FILE_CHUNK],
    UPLOADING: [MessageType.CHUNK_ACK, MessageType.UPLOAD_COMPLETE],
  },
};

/**
 * Connection-level state machine shared by both ends:
 * IDLE -> HANDSHAKING -> READY -> {DOWNLOADING | UPLOADING} -> VERIFYING -> {COMPLETE | FAILED}.
 *
 * Owns the single TransferSession of its connection. COMPLETE and FAILED end the
 * session; {@link reset} returns to READY for the next request.
 */
export class TransferStateMachine extends EventEmitter {
  private current: TransferState = 'IDLE';
  private activeSession: TransferSession | null = null;
  private lastFailure: ProtocolError | null = null;
  private negotiated = false;
  private window = 0;

  constructor(readonly role: Role) {
    super();
  }

  get state(): TransferState {
    return this.current;
  }

  get session(): TransferSession | null {
    return this.activeSession;
  }

  get failure(): ProtocolError | null {
    return this.lastFailure;
  }

  get ackWindow(): number {
    return this.window;
  }

  private transition(next: TransferState): void {
    const previous = this.current;
    this.current = next;
    this.emit('transition', previous, next);
  }

  private require(expected: readonly TransferState[], action: string): void {
    if (!expected.includes(this.current)) {
      throw this.fail(new ProtocolError('PROTOCOL_VIOLATION', `Cannot ${action} in state ${this.current}`));
    }
  }

  private requireSession(): TransferSession {
    if (!this.activeSession) {
      throw this.fail(new ProtocolError('PROTOCOL_VIOLATION', 'No transfer in progress'));
    }
    return this.activeSession;
  }

  private requireMetadata(session: TransferSession): FileMetadata {
    if (!session.metadata) {
      throw this.fail(new ProtocolError('PROTOCOL_VIOLATION', 'FILE_METADATA has not been exchanged'));
    }
    return session.metadata;
  }

  /**
   * Checks that a message received from the peer is legal right now. Anything
   * else fails the machine with `PROTOCOL_VIOLATION`; there is no resync.
   */
  assertInbound(type: number): void {
    if (type === MessageType.ERROR) {
      return;
    }
    const allowed = INBOUND[this.role][this.current] ?? [];
    if (!allowed.some((code) => code === type)) {
      throw this.fail(
        new ProtocolError('PROTOCOL_VIOLATION', `Unexpected ${messageTypeName(type)} in state ${this.current}`)
      );
    }
  }

  beginHandshake(): void {
    this.require(['IDLE'], 'start a handshake');
    this.transition('HANDSHAKING');
  }

  completeHandshake(ackWindow: number): void {
    this.require(['HANDSHAKING'], 'complete a handshake');
    this.window = ackWindow;
    this.negotiated = true;
    this.transition('READY');
  }

  rejectHandshake(): void {
    this.require(['HANDSHAKING'], 'reject a handshake');
    this.transition('IDLE');
  }

  beginTransfer(direction: Direction): TransferSession {
    this.require(['READY'], `start a ${direction}`);

    const sending = (this.role === 'server') === (direction === 'download');
    this.activeSession = {
      id: uuidv4(),
      direction,
      sending,
      startedAt: new Date(),
      metadata: null,
      totalChunks: 0,
      chunksTransferred: 0,
      bytesTransferred: 0,
      digest: null,
    };
    this.lastFailure = null;
    this.transition(direction === 'download' ? 'DOWNLOADING' : 'UPLOADING');
    return this.activeSession;
  }

  /**
   * Binds the file description to the session. A receiver expecting zero chunks
   * moves straight to VERIFYING.
   */
  setMetadata(metadata: FileMetadata): void {
    this.require(['DOWNLOADING', 'UPLOADING'], 'accept FILE_METADATA');
    const session = this.requireSession();
    if (session.metadata) {
      throw this.fail(new ProtocolError('PROTOCOL_VIOLATION', 'FILE_METADATA sent twice'));
    }

    assertChunkSize(metadata.chunkSize);
    session.metadata = metadata;
    session.totalChunks = countChunks(metadata.size, metadata.chunkSize);
    if (!session.sending) {
      session.digest = new DigestAccumulator();
      if (session.totalChunks === 0) {
        this.transition('VERIFYING');
      }
    }
  }

  private checkChunk(session: TransferSession, metadata: FileMetadata, index: number, length: number): void {
    if (index !== session.chunksTransferred || index >= session.totalChunks) {
      throw this.fail(
        new ProtocolError(
          'PROTOCOL_VIOLATION',
          `Expected chunk ${session.chunksTransferred} of ${session.totalChunks}, got ${index}`
        )
      );
    }

    const range = chunkRange(index, metadata.chunkSize, metadata.size);
    if (length !== range.end - range.start) {
      throw this.fail(
        new ProtocolError(
          'PROTOCOL_VIOLATION',
          `Chunk ${index} carries ${length} bytes, expected ${range.end - range.start}`
        )
      );
    }
  }

  /**
   * Checks a chunk as it came off the wire, before its payload is inflated: the
   * index must be the next one and the declared raw length must match its range.
   */
  expectChunk(wire: WireChunk): void {
    this.require(['DOWNLOADING', 'UPLOADING'], 'accept FILE_CHUNK');
    const session = this.requireSession();
    const metadata = this.requireMetadata(session);
    this.checkChunk(session, metadata, wire.index, wire.rawLength);
  }

  /**
   * Accepts the next chunk on the receiving side. Returns true once the final
   * chunk has been taken and the machine is VERIFYING.
   */
  acceptChunk(chunk: Chunk): boolean {
    this.require(['DOWNLOADING', 'UPLOADING'], 'accept FILE_CHUNK');
    const session = this.requireSession();
    const metadata = this.requireMetadata(session);
    this.checkChunk(session, metadata, chunk.index, chunk.data.length);

    session.digest?.update(chunk.data);
    session.chunksTransferred++;
    session.bytesTransferred += chunk.data.length;

    if (session.chunksTransferred === session.totalChunks) {
      this.transition('VERIFYING');
      return true;
    }
    return false;
  }

  recordSentChunk(chunk: Chunk): void {
    this.require(['DOWNLOADING', 'UPLOADING'], 'send FILE_CHUNK');
    const session = this.requireSession();
    this.requireMetadata(session);
    if (chunk.index !== session.chunksTransferred) {
      throw this.fail(new ProtocolError('PROTOCOL_VIOLATION', `Chunk ${chunk.index} sent out of order`));
    }
    session.chunksTransferred++;
    session.bytesTransferred += chunk.data.length;
  }

  /** Whether the receiver must acknowledge chunk `index` under the negotiated window. */
  expectsAck(index: number): boolean {
    const session = this.activeSession;
    if (this.window === 0 || !session) {
      return false;
    }
    return (index + 1) % this.window === 0 || index + 1 === session.totalChunks;
  }

  /**
   * Compares the accumulated digest with the declared one. On mismatch the
   * machine fails with `CHECKSUM_MISMATCH`; on match it stays VERIFYING until
   * the caller has committed the file and calls {@link complete}.
   */
  verify(): Buffer {
    this.require(['VERIFYING'], 'verify');
    const session = this.requireSession();
    const metadata = this.requireMetadata(session);
    const actual = (session.digest ?? new DigestAccumulator()).digest();

    if (!digestsEqual(actual, metadata.digest)) {
      throw this.fail(
        new ProtocolError(
          'CHECKSUM_MISMATCH',
          `Digest of ${metadata.name} is ${actual.toString('hex')}, expected ${metadata.digest.toString('hex')}`
        )
      );
    }
    return actual;
  }

  complete(): TransferSession {
    const session = this.requireSession();
    if (session.sending) {
      this.require(['DOWNLOADING', 'UPLOADING'], 'complete a transfer');
      if (!session.metadata || session.chunksTransferred !== session.totalChunks) {
        throw this.fail(
          new ProtocolError(
            'PROTOCOL_VIOLATION',
            `Transfer finished after ${session.chunksTransferred} of ${session.totalChunks} chunks`
          )
        );
      }
    } else {
      this.require(['VERIFYING'], 'complete a transfer');
    }

    this.transition('COMPLETE');
    this.activeSession = null;
    return session;
  }

  /**
   * Moves to FAILED, drops the session and returns the error so callers can `throw machine.fail(...)`.
   */
  fail(error: ProtocolError): ProtocolError {
    if (this.current !== 'FAILED') {
      this.lastFailure = error;
      this.activeSession = null;
      this.transition('FAILED');
    }
    return error;
  }

  /** Starts over from READY after a finished or failed session. */
  reset(): void {
    if (!this.negotiated) {
      throw new ProtocolError('PROTOCOL_VIOLATION', 'Handshake has not completed');
    }
    if (this.current !== 'COMPLETE' && this.current !== 'FAILED') {
      throw new ProtocolError('PROTOCOL_VIOLATION', `Cannot reset from state ${this.current}`);
    }
    this.activeSession = null;
    this.transition('READY');
  }

  progress(): TransferProgress | null {
    const session = this.activeSession;
    if (!session?.metadata) {
      return null;
    }

    const elapsed = Math.max(Date.now() - session.startedAt.getTime(), 1);
    const speed = (session.bytesTransferred / elapsed) * 1000; // bytes/second
    const remaining = session.metadata.size - session.bytesTransferred;

    return {
      fileName: session.metadata.name,
      direction: session.direction,
      chunksTransferred: session.chunksTransferred,
      totalChunks: session.totalChunks,
      bytesTransferred: session.bytesTransferred,
      totalBytes: session.metadata.size,
      speed,
      eta: speed > 0 ? Math.round(remaining / speed) : 0,
      startedAt: session.startedAt,
    };
  }
}
