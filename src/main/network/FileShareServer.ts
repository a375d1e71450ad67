import { EventEmitter } from 'events';
import * as net from 'net';
import { Duplex } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { TransferConfig } from '../../shared/types/config';
import { ProtocolError } from '../protocol/errors';
import { FileStorage } from '../storage/FileStorage';
import { logger } from '../utils/logger';
import { ConnectionHandler } from './ConnectionHandler';

interface ActiveConnection {
  handler: ConnectionHandler;
  socket: Duplex;
  done: Promise<void>;
}

/**
 * TCP front end: accepts connections and gives each its own
 * {@link ConnectionHandler}. Connections share only the storage root.
 */
export class FileShareServer extends EventEmitter {
  private server: net.Server | null = null;
  private readonly connections = new Map<string, ActiveConnection>();
  readonly storage: FileStorage;

  constructor(private readonly config: Readonly<TransferConfig>) {
    super();
    this.storage = new FileStorage(config.storageRoot);
  }

  get activeConnections(): number {
    return this.connections.size;
  }

  /** Address the server is bound to, or null before {@link start}. */
  address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    await this.storage.initialize();

    const server = net.createServer((socket) => {
      this.handleConnection(socket, `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`);
    });
    server.on('error', (error) => {
      logger.error('File share server error', { error });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(this.config.port, this.config.host, () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      logger.error('Failed to start file share server:', error);
      throw error;
    }

    this.server = server;
    const bound = this.address();
    logger.info(`File share server listening on ${bound?.address ?? this.config.host}:${bound?.port ?? this.config.port}`);
    logger.info(`Serving files from ${this.storage.root}`);
  }

  /**
   * Serves one already-accepted stream. Public so any Duplex, not just a TCP
   * socket, can be served.
   */
  handleConnection(socket: Duplex, remoteAddress = 'local'): ConnectionHandler {
    const id = uuidv4();
    const handler = new ConnectionHandler(id, socket, this.storage, this.config);
    logger.info(`[${id}] Connection from ${remoteAddress}`);

    handler.once('closed', (failure: ProtocolError | null) => {
      this.connections.delete(id);
      logger.info(`[${id}] Connection closed${failure ? ` (${failure.kind})` : ''}`);
      this.emit('connection-closed', { id, error: failure });
    });

    const done = handler.run();
    this.connections.set(id, { handler, socket, done });
    this.emit('connection-opened', { id, remoteAddress });
    return handler;
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;

    const pending: Promise<void>[] = [];
    for (const connection of this.connections.values()) {
      connection.socket.destroy();
      pending.push(connection.done);
    }
    await Promise.all(pending);

    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
      logger.info('File share server stopped');
    }
  }
}
