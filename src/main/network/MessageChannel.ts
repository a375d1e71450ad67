import { Duplex } from 'stream';
import { MessageType, ProtocolMessage } from '../../shared/types/protocol';
import { TimeoutConfig } from '../../shared/types/config';
import { ProtocolError, toProtocolError } from '../protocol/errors';
import { FrameDecoder, decodeError, encode } from '../protocol/WireCodec';

// Decoded messages held before the socket is paused.
const HIGH_WATER_MESSAGES = 16;
const MAX_LINGER_MS = 2000;

interface PendingReceive {
  resolve: (message: ProtocolMessage | null) => void;
  reject: (error: ProtocolError) => void;
  timer: NodeJS.Timeout;
}

export function remoteError(message: ProtocolMessage): ProtocolError {
  try {
    const payload = decodeError(message.payload);
    return new ProtocolError(payload.kind, payload.message, { remote: true });
  } catch (error) {
    return toProtocolError(error, 'MALFORMED_MESSAGE');
  }
}

/**
 * Framed message I/O over any byte stream. Incoming bytes run through a
 * {@link FrameDecoder}; complete messages are handed out one at a time by
 * {@link receive}. All waits are bounded by the configured timeouts.
 */
export class MessageChannel {
  private readonly decoder = new FrameDecoder();
  private readonly inbox: ProtocolMessage[] = [];
  private waiter: PendingReceive | null = null;
  private readError: ProtocolError | null = null;
  private ended = false;
  private closing: Promise<void> | null = null;

  constructor(
    private readonly socket: Duplex,
    private readonly timeouts: Pick<TimeoutConfig, 'readMs' | 'writeMs'>
  ) {
    socket.on('data', this.onData);
    socket.on('end', this.onEnd);
    socket.on('error', this.onError);
    socket.on('close', this.onClose);
  }

  get isOpen(): boolean {
    return this.closing === null && !this.socket.destroyed && this.socket.writable;
  }

  private readonly onData = (chunk: Buffer | string): void => {
    if (this.readError || this.closing) {
      return;
    }

    try {
      const messages = this.decoder.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      this.inbox.push(...messages);
    } catch (error) {
      this.readError = toProtocolError(error, 'MALFORMED_MESSAGE');
      this.socket.pause();
    }

    if (this.inbox.length >= HIGH_WATER_MESSAGES) {
      this.socket.pause();
    }
    this.settle();
  };

  private readonly onEnd = (): void => {
    if (!this.readError) {
      try {
        this.decoder.finish();
      } catch (error) {
        this.readError = toProtocolError(error, 'TRUNCATED');
      }
    }
    this.ended = true;
    this.settle();
  };

  private readonly onError = (error: Error): void => {
    if (!this.readError) {
      this.readError = toProtocolError(error, 'WRITE_ERROR');
    }
    this.settle();
  };

  private readonly onClose = (): void => {
    this.ended = true;
    this.settle();
  };

  private nextQueued(): ProtocolMessage | undefined {
    const message = this.inbox.shift();
    if (message && this.inbox.length < HIGH_WATER_MESSAGES && !this.readError && !this.closing) {
      this.socket.resume();
    }
    return message;
  }

  private settle(): void {
    const waiter = this.waiter;
    if (!waiter) {
      return;
    }

    const message = this.nextQueued();
    if (message) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(message);
    } else if (this.readError) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.reject(this.readError);
    } else if (this.ended) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }

  /**
   * Resolves with the next complete message, or null when the peer closed the
   * stream cleanly between frames.
   * @throws ProtocolError `TIMEOUT`, `TRUNCATED`, `MALFORMED_MESSAGE` or `VERSION_UNSUPPORTED`
   */
  receive(timeoutMs: number = this.timeouts.readMs): Promise<ProtocolMessage | null> {
    if (this.waiter) {
      return Promise.reject(new ProtocolError('PROTOCOL_VIOLATION', 'A receive is already pending'));
    }

    const queued = this.nextQueued();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.readError) {
      return Promise.reject(this.readError);
    }
    if (this.ended || this.closing) {
      return Promise.resolve(null);
    }

    return new Promise<ProtocolMessage | null>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new ProtocolError('TIMEOUT', `No message received within ${timeoutMs} ms`));
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  /**
   * Removes and returns an ERROR the peer has already sent, if any. Lets a sender
   * that streams without waiting notice an abort between chunks.
   */
  takeRemoteError(): ProtocolError | null {
    const index = this.inbox.findIndex((message) => message.type === MessageType.ERROR);
    if (index === -1) {
      return null;
    }
    const [message] = this.inbox.splice(index, 1);
    return remoteError(message);
  }

  async send(message: ProtocolMessage): Promise<void> {
    if (!this.isOpen) {
      throw new ProtocolError('WRITE_ERROR', 'Connection is closed');
    }

    const bytes = encode(message);
    const timeoutMs = this.timeouts.writeMs;

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        // A stalled write would hold back anything sent after it, ERROR included.
        this.socket.destroy();
        reject(new ProtocolError('TIMEOUT', `Write did not drain within ${timeoutMs} ms`));
      }, timeoutMs);

      this.socket.write(bytes, (error?: Error | null) => {
        clearTimeout(timer);
        if (error) {
          reject(toProtocolError(error, 'WRITE_ERROR'));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Ends our side, gives the peer a moment to read what was already written,
   * then tears the socket down. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }

    if (!this.socket.destroyed) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, Math.min(this.timeouts.writeMs, MAX_LINGER_MS));
        this.socket.once('close', () => {
          clearTimeout(timer);
          resolve();
        });
        // Keep draining so the peer's half-close can arrive.
        this.socket.resume();
        this.socket.end();
      });
    }

    this.socket.destroy();
    this.socket.off('data', this.onData);
    this.socket.off('end', this.onEnd);
    this.socket.off('close', this.onClose);
    // 'error' stays subscribed: a late reset must not become an uncaught exception.
  }
}
