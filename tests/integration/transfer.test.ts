import { randomBytes } from 'crypto';
import { once } from 'events';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ChunkSize } from '../../src/shared/constants/protocol';
import { TransferConfig } from '../../src/shared/types/config';
import { ErrorPayload, MessageType, TransferProgress, TransferResult } from '../../src/shared/types/protocol';
import { split } from '../../src/main/protocol/Chunker';
import { digest } from '../../src/main/protocol/Integrity';
import {
  createMessage,
  decodeChunk,
  decodeError,
  decodeFileList,
  decodeFileMetadata,
  decodeFileRequest,
  decodeHandshake,
  encodeChunk,
  encodeChunkAck,
  encodeError,
  encodeFileMetadata,
  encodeFileRequest,
  encodeHandshake,
} from '../../src/main/protocol/WireCodec';
import { ConnectionHandler } from '../../src/main/network/ConnectionHandler';
import { FileShareClient } from '../../src/main/network/FileShareClient';
import { FileShareServer } from '../../src/main/network/FileShareServer';
import { MessageChannel } from '../../src/main/network/MessageChannel';
import { ProtocolError } from '../../src/main/protocol/errors';
import { defaultTransferConfig } from '../../src/main/utils/configLoader';
import { sanitizeTransferConfig } from '../../src/main/utils/validation';
import { TEST_TIMEOUTS, createSocketPair, rawChannel } from '../helpers/memorySocket';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

function patterned(size: number): Buffer {
  const bytes = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    bytes[i] = (i * 7) % 256;
  }
  return bytes;
}

describe('file transfer over a connection', () => {
  let serverRoot: string;
  let clientRoot: string;
  let localRoot: string;
  let config: Readonly<TransferConfig>;
  let server: FileShareServer;
  let clients: FileShareClient[];
  let peers: MessageChannel[];

  function useServer(overrides: Partial<TransferConfig> = {}): void {
    server = new FileShareServer({ ...config, ...overrides });
  }

  async function connect(
    clientConfig: Readonly<TransferConfig> = config
  ): Promise<{ client: FileShareClient; handler: ConnectionHandler; closed: Promise<unknown[]> }> {
    const [clientSocket, serverSocket] = createSocketPair();
    const handler = server.handleConnection(serverSocket);
    const closed = once(handler, 'closed');
    const client = new FileShareClient(clientConfig);
    clients.push(client);
    await client.attach(clientSocket);
    return { client, handler, closed };
  }

  /** Connects a hand-driven peer and completes the handshake. */
  async function rawConnect(
    ackWindow = 0
  ): Promise<{ peer: MessageChannel; handler: ConnectionHandler; closed: Promise<unknown[]>; agreedWindow: number }> {
    const [peerSocket, serverSocket] = createSocketPair();
    const handler = server.handleConnection(serverSocket);
    const closed = once(handler, 'closed');
    const peer = rawChannel(peerSocket);
    peers.push(peer);

    await peer.send(createMessage(MessageType.HANDSHAKE, encodeHandshake({ version: 1, ackWindow })));
    const reply = await peer.receive();
    if (reply?.type !== MessageType.HANDSHAKE_ACK) {
      throw new Error('Handshake was not acknowledged');
    }
    return { peer, handler, closed, agreedWindow: decodeHandshake(reply.payload).ackWindow };
  }

  async function expectError(peer: MessageChannel): Promise<ErrorPayload> {
    const message = await peer.receive();
    if (message?.type !== MessageType.ERROR) {
      throw new Error(`Expected ERROR, got ${message ? message.type : 'end of stream'}`);
    }
    return decodeError(message.payload);
  }

  async function receiveType(peer: MessageChannel, type: number): Promise<Buffer> {
    const message = await peer.receive();
    if (message?.type !== type) {
      throw new Error(`Expected message type ${type}, got ${message ? message.type : 'end of stream'}`);
    }
    return message.payload;
  }

  beforeEach(async () => {
    serverRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'bytetrickle-server-'));
    clientRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'bytetrickle-client-'));
    localRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'bytetrickle-local-'));
    config = sanitizeTransferConfig(
      { storageRoot: serverRoot, timeouts: TEST_TIMEOUTS, retry: { attempts: 2, delayMs: 0 } },
      defaultTransferConfig
    );
    clients = [];
    peers = [];
    useServer();
  });

  afterEach(async () => {
    await Promise.all(clients.map((client) => client.close()));
    await Promise.all(peers.map((peer) => peer.close()));
    await server.stop();
    await Promise.all(
      [serverRoot, clientRoot, localRoot].map((dir) => fs.rm(dir, { recursive: true, force: true }))
    );
  });

  describe('downloads', () => {
    it('delivers a file byte for byte and reports progress', async () => {
      const contents = Buffer.alloc(10000, 'abcdefghij');
      await fs.writeFile(path.join(serverRoot, 'notes.txt'), contents);
      const { client, handler } = await connect();

      const progress: TransferProgress[] = [];
      const completed: TransferResult[] = [];
      client.on('transfer-progress', (update: TransferProgress) => progress.push(update));
      client.on('transfer-complete', (result: TransferResult) => completed.push(result));

      const result = await client.download('notes.txt', { destination: clientRoot });

      expect(result).toEqual({
        name: 'notes.txt',
        size: 10000,
        chunks: 3,
        digest: digest(contents).toString('hex'),
        compressedChunks: 3,
      });
      expect(completed).toEqual([result]);
      expect(progress.map((update) => update.chunksTransferred)).toEqual([1, 2, 3]);
      expect(progress[2].bytesTransferred).toBe(10000);
      expect((await fs.readFile(path.join(clientRoot, 'notes.txt'))).equals(contents)).toBe(true);
      expect(client.state).toBe('READY');

      // The server answers the next request only once it is back in READY.
      await client.list();
      expect(handler.state).toBe('READY');
    });

    it('transfers an empty file as zero chunks', async () => {
      await fs.writeFile(path.join(serverRoot, 'empty.txt'), '');
      const { client } = await connect();

      const result = await client.download('empty.txt', { destination: clientRoot });

      expect(result).toEqual({ name: 'empty.txt', size: 0, chunks: 0, digest: EMPTY_SHA256, compressedChunks: 0 });
      expect((await fs.stat(path.join(clientRoot, 'empty.txt'))).size).toBe(0);
    });

    it('uses exactly size / chunkSize chunks for an exact multiple', async () => {
      const contents = patterned(8192);
      await fs.writeFile(path.join(serverRoot, 'block.bin'), contents);
      const { client } = await connect();

      const small = await client.download('block.bin', { destination: clientRoot, chunkSize: ChunkSize.SMALL });
      const medium = await client.download('block.bin', {
        destination: clientRoot,
        localName: 'block-copy.bin',
        chunkSize: ChunkSize.MEDIUM,
      });

      expect(small.chunks).toBe(8);
      expect(medium.chunks).toBe(2);
      expect((await fs.readFile(path.join(clientRoot, 'block-copy.bin'))).equals(contents)).toBe(true);
    });

    it('sends chunks raw when the client turns compression off', async () => {
      await fs.writeFile(path.join(serverRoot, 'notes.txt'), Buffer.alloc(6000, 'a'));
      const { client } = await connect();

      const result = await client.download('notes.txt', { destination: clientRoot, compression: false });
      expect(result.compressedChunks).toBe(0);
    });

    it('keeps the connection usable after FILE_NOT_FOUND', async () => {
      await fs.writeFile(path.join(serverRoot, 'present.txt'), 'here');
      const { client, handler } = await connect();
      const failures: unknown[] = [];
      client.on('transfer-failed', (failure: unknown) => failures.push(failure));

      await expect(client.download('missing.txt', { destination: clientRoot })).rejects.toMatchObject({
        kind: 'FILE_NOT_FOUND',
        remote: true,
      });

      expect(client.state).toBe('READY');
      expect(failures).toHaveLength(1);
      expect(await fs.readdir(clientRoot)).toEqual([]);

      const entries = await client.list();
      expect(entries.map((entry) => entry.name)).toEqual(['present.txt']);
      expect(handler.state).toBe('READY');
    });

    it('refuses an invalid name before sending anything', async () => {
      const { client } = await connect();
      await expect(client.download('../etc/passwd', { destination: clientRoot })).rejects.toMatchObject({
        kind: 'INVALID_FILENAME',
      });
      expect(client.state).toBe('READY');
    });

    it('acknowledges every window of chunks when an ack window is negotiated', async () => {
      useServer({ ackWindow: 2 });
      const contents = patterned(5 * 1024);
      await fs.writeFile(path.join(serverRoot, 'windowed.bin'), contents);
      const { client } = await connect({ ...config, ackWindow: 4 });

      const result = await client.download('windowed.bin', { destination: clientRoot, chunkSize: ChunkSize.SMALL });

      expect(result.chunks).toBe(5);
      expect((await fs.readFile(path.join(clientRoot, 'windowed.bin'))).equals(contents)).toBe(true);
    });

    it('discards the download and reports CHECKSUM_MISMATCH when a chunk is corrupted', async () => {
      const [clientSocket, serverSocket] = createSocketPair();
      const fakeServer = rawChannel(serverSocket);
      peers.push(fakeServer);
      const client = new FileShareClient(config);
      clients.push(client);

      const attaching = client.attach(clientSocket);
      await receiveType(fakeServer, MessageType.HANDSHAKE);
      await fakeServer.send(createMessage(MessageType.HANDSHAKE_ACK, encodeHandshake({ version: 1, ackWindow: 0 })));
      await attaching;

      const downloading = client.download('doc.txt', { destination: clientRoot, compression: false });
      const request = decodeFileRequest(await receiveType(fakeServer, MessageType.FILE_REQUEST));
      expect(request).toEqual({ name: 'doc.txt', chunkSize: 4096, compression: false });

      const original = Buffer.alloc(5000, 'q');
      await fakeServer.send(
        createMessage(
          MessageType.FILE_METADATA,
          encodeFileMetadata({ name: 'doc.txt', size: 5000, chunkSize: 4096, compression: false, digest: digest(original) })
        )
      );
      const [first, second] = split(original, 4096);
      const corrupted = Buffer.from(second.data);
      corrupted[0] = 0x00;
      await fakeServer.send(
        createMessage(
          MessageType.FILE_CHUNK,
          encodeChunk({ index: 0, compressed: false, rawLength: first.data.length, data: first.data })
        )
      );
      await fakeServer.send(
        createMessage(
          MessageType.FILE_CHUNK,
          encodeChunk({ index: 1, compressed: false, rawLength: corrupted.length, data: corrupted })
        )
      );

      await expect(downloading).rejects.toMatchObject({ kind: 'CHECKSUM_MISMATCH', remote: false });
      expect((await expectError(fakeServer)).kind).toBe('CHECKSUM_MISMATCH');
      expect(await fs.readdir(clientRoot)).toEqual([]);
      expect(client.state).toBe('FAILED');
    });
  });

  describe('uploads', () => {
    it('stores an upload that downloads back identical', async () => {
      const contents = patterned(5000);
      const localPath = path.join(localRoot, 'photo.raw');
      await fs.writeFile(localPath, contents);
      const { client, handler } = await connect();

      const uploaded = await client.upload(localPath);

      expect(uploaded).toMatchObject({ name: 'photo.raw', size: 5000, chunks: 2, digest: digest(contents).toString('hex') });
      expect((await fs.readFile(path.join(serverRoot, 'photo.raw'))).equals(contents)).toBe(true);
      expect(await fs.readdir(serverRoot)).toEqual(['photo.raw']);
      expect(handler.state).toBe('READY');

      const downloaded = await client.download('photo.raw', { destination: clientRoot });
      expect(downloaded.digest).toBe(uploaded.digest);
      expect((await fs.readFile(path.join(clientRoot, 'photo.raw'))).equals(contents)).toBe(true);
    });

    it('sends incompressible chunks raw', async () => {
      const localPath = path.join(localRoot, 'noise.bin');
      const noise = randomBytes(3000);
      await fs.writeFile(localPath, noise);
      const { client } = await connect();

      const result = await client.upload(localPath, { remoteName: 'noise.bin', chunkSize: ChunkSize.SMALL });

      expect(result.chunks).toBe(3);
      expect(result.compressedChunks).toBe(0);
      expect((await fs.readFile(path.join(serverRoot, 'noise.bin'))).equals(noise)).toBe(true);
    });

    it('stores an empty upload', async () => {
      const localPath = path.join(localRoot, 'blank.txt');
      await fs.writeFile(localPath, '');
      const { client } = await connect();

      const result = await client.upload(localPath);

      expect(result.chunks).toBe(0);
      expect(result.digest).toBe(EMPTY_SHA256);
      expect((await fs.readFile(path.join(serverRoot, 'blank.txt'))).length).toBe(0);
    });

    it('waits for acknowledgements under an ack window', async () => {
      useServer({ ackWindow: 3 });
      const contents = patterned(7 * 1024 + 10);
      const localPath = path.join(localRoot, 'acked.bin');
      await fs.writeFile(localPath, contents);
      const { client } = await connect({ ...config, ackWindow: 3 });

      const result = await client.upload(localPath, { chunkSize: ChunkSize.SMALL });

      expect(result.chunks).toBe(8);
      expect((await fs.readFile(path.join(serverRoot, 'acked.bin'))).equals(contents)).toBe(true);
    });

    it('rejects an invalid remote name locally', async () => {
      const localPath = path.join(localRoot, 'ok.txt');
      await fs.writeFile(localPath, 'fine');
      const { client } = await connect();

      await expect(client.upload(localPath, { remoteName: 'a/b' })).rejects.toMatchObject({ kind: 'INVALID_FILENAME' });
      expect(client.state).toBe('READY');
    });

    it('handles concurrent uploads of different files on separate connections', async () => {
      const first = path.join(localRoot, 'first.txt');
      const second = path.join(localRoot, 'second.txt');
      await fs.writeFile(first, Buffer.alloc(9000, '1'));
      await fs.writeFile(second, Buffer.alloc(7000, '2'));
      const [a, b] = await Promise.all([connect(), connect()]);

      await Promise.all([a.client.upload(first), b.client.upload(second)]);

      expect(await fs.readFile(path.join(serverRoot, 'first.txt'), 'utf-8')).toBe('1'.repeat(9000));
      expect(await fs.readFile(path.join(serverRoot, 'second.txt'), 'utf-8')).toBe('2'.repeat(7000));
    });

    it('leaves one complete file when two connections upload the same name', async () => {
      const first = path.join(localRoot, 'from-a.txt');
      const second = path.join(localRoot, 'from-b.txt');
      await fs.writeFile(first, Buffer.alloc(6000, 'a'));
      await fs.writeFile(second, Buffer.alloc(6000, 'b'));
      const [a, b] = await Promise.all([connect(), connect()]);

      await Promise.all([
        a.client.upload(first, { remoteName: 'shared.txt' }),
        b.client.upload(second, { remoteName: 'shared.txt' }),
      ]);

      const stored = await fs.readFile(path.join(serverRoot, 'shared.txt'), 'utf-8');
      expect(['a'.repeat(6000), 'b'.repeat(6000)]).toContain(stored);
      expect(await fs.readdir(serverRoot)).toEqual(['shared.txt']);
    });
  });

  describe('listing', () => {
    it('lists regular files sorted by name without temp files', async () => {
      await fs.writeFile(path.join(serverRoot, 'zeta.txt'), 'zz');
      await fs.writeFile(path.join(serverRoot, 'alpha.txt'), 'a');
      await fs.writeFile(path.join(serverRoot, '.0f2c.part'), 'partial');
      await fs.mkdir(path.join(serverRoot, 'subdir'));
      const { client } = await connect();

      const entries = await client.list();

      expect(entries.map((entry) => [entry.name, entry.size])).toEqual([
        ['alpha.txt', 1],
        ['zeta.txt', 2],
      ]);
    });
  });

  describe('server protocol enforcement', () => {
    it('rejects an unsupported version and stays IDLE', async () => {
      const [peerSocket, serverSocket] = createSocketPair();
      const handler = server.handleConnection(serverSocket);
      const closed = once(handler, 'closed');
      const peer = rawChannel(peerSocket);
      peers.push(peer);

      await peer.send(createMessage(MessageType.HANDSHAKE, encodeHandshake({ version: 2, ackWindow: 0 }), 2));

      expect((await expectError(peer)).kind).toBe('VERSION_UNSUPPORTED');
      expect(await peer.receive()).toBeNull();
      await closed;
      expect(handler.state).toBe('IDLE');
      expect(handler.lastError?.kind).toBe('VERSION_UNSUPPORTED');
    });

    it('agrees on the smaller ack window', async () => {
      useServer({ ackWindow: 2 });
      const { agreedWindow } = await rawConnect(8);
      expect(agreedWindow).toBe(2);
    });

    it('answers a bad file name or chunk size with an ERROR and stays READY', async () => {
      await fs.writeFile(path.join(serverRoot, 'a.txt'), 'contents');
      const { peer, handler } = await rawConnect();

      await peer.send(
        createMessage(
          MessageType.FILE_REQUEST,
          encodeFileRequest({ name: '../secret', chunkSize: ChunkSize.SMALL, compression: false })
        )
      );
      expect((await expectError(peer)).kind).toBe('INVALID_FILENAME');

      const oddChunkSize = Buffer.concat([Buffer.from([0, 5]), Buffer.from('a.txt'), Buffer.from([0, 0, 0x13, 0x88, 0])]);
      await peer.send(createMessage(MessageType.FILE_REQUEST, oddChunkSize));
      expect((await expectError(peer)).kind).toBe('INVALID_CHUNK_SIZE');

      await peer.send(createMessage(MessageType.LIST_REQUEST));
      const listing = decodeFileList(await receiveType(peer, MessageType.LIST_RESPONSE));
      expect(listing.map((entry) => entry.name)).toEqual(['a.txt']);
      expect(handler.state).toBe('READY');
      expect(handler.lastError).toBeNull();
    });

    it('fails an upload whose chunks do not match the digest and keeps nothing', async () => {
      const { peer, handler, closed } = await rawConnect();
      const original = Buffer.alloc(2048, 'z');

      await peer.send(createMessage(MessageType.UPLOAD_START));
      await peer.send(
        createMessage(
          MessageType.FILE_METADATA,
          encodeFileMetadata({ name: 'bad.bin', size: 2048, chunkSize: 1024, compression: false, digest: digest(original) })
        )
      );
      for (const chunk of split(original, 1024)) {
        const data = Buffer.from(chunk.data);
        if (chunk.index === 1) {
          data[10] = 0x41;
        }
        await peer.send(
          createMessage(MessageType.FILE_CHUNK, encodeChunk({ index: chunk.index, compressed: false, rawLength: 1024, data }))
        );
      }

      expect((await expectError(peer)).kind).toBe('CHECKSUM_MISMATCH');
      await closed;
      expect(handler.state).toBe('FAILED');
      expect(await fs.readdir(serverRoot)).toEqual([]);
    });

    it('fails an upload that skips a chunk index', async () => {
      const { peer, closed } = await rawConnect();
      const original = Buffer.alloc(3072, 'k');

      await peer.send(createMessage(MessageType.UPLOAD_START));
      await peer.send(
        createMessage(
          MessageType.FILE_METADATA,
          encodeFileMetadata({ name: 'gap.bin', size: 3072, chunkSize: 1024, compression: false, digest: digest(original) })
        )
      );
      await peer.send(
        createMessage(
          MessageType.FILE_CHUNK,
          encodeChunk({ index: 1, compressed: false, rawLength: 1024, data: original.subarray(1024, 2048) })
        )
      );

      expect((await expectError(peer)).kind).toBe('PROTOCOL_VIOLATION');
      await closed;
      expect(await fs.readdir(serverRoot)).toEqual([]);
    });

    it('fails an upload that sends chunks before metadata', async () => {
      const { peer, closed } = await rawConnect();

      await peer.send(createMessage(MessageType.UPLOAD_START));
      await peer.send(
        createMessage(MessageType.FILE_CHUNK, encodeChunk({ index: 0, compressed: false, rawLength: 1, data: Buffer.from('x') }))
      );

      expect((await expectError(peer)).kind).toBe('PROTOCOL_VIOLATION');
      await closed;
    });

    it('refuses a chunk declaring more bytes than its place in the file holds', async () => {
      const { peer, handler, closed } = await rawConnect();

      await peer.send(createMessage(MessageType.UPLOAD_START));
      await peer.send(
        createMessage(
          MessageType.FILE_METADATA,
          encodeFileMetadata({
            name: 'huge.bin',
            size: 1024,
            chunkSize: 1024,
            compression: true,
            digest: digest(Buffer.alloc(1024)),
          })
        )
      );
      await peer.send(
        createMessage(
          MessageType.FILE_CHUNK,
          encodeChunk({ index: 0, compressed: true, rawLength: 200 * 1024 * 1024, data: Buffer.from('not deflate data') })
        )
      );

      const error = await expectError(peer);
      expect(error.kind).toBe('PROTOCOL_VIOLATION');
      expect(error.message).toBe('Chunk 0 carries 209715200 bytes, expected 1024');
      await closed;
      expect(handler.lastError?.kind).toBe('PROTOCOL_VIOLATION');
      expect(await fs.readdir(serverRoot)).toEqual([]);
    });

    it('reports a skipped index as a protocol violation even when the payload is not deflate data', async () => {
      const { peer, closed } = await rawConnect();

      await peer.send(createMessage(MessageType.UPLOAD_START));
      await peer.send(
        createMessage(
          MessageType.FILE_METADATA,
          encodeFileMetadata({
            name: 'gap.bin',
            size: 3072,
            chunkSize: 1024,
            compression: true,
            digest: digest(Buffer.alloc(3072)),
          })
        )
      );
      await peer.send(
        createMessage(
          MessageType.FILE_CHUNK,
          encodeChunk({ index: 2, compressed: true, rawLength: 1024, data: Buffer.from('garbage') })
        )
      );

      expect((await expectError(peer)).kind).toBe('PROTOCOL_VIOLATION');
      await closed;
      expect(await fs.readdir(serverRoot)).toEqual([]);
    });

    it('times out an upload whose client goes quiet and keeps nothing', async () => {
      useServer({ timeouts: { ...TEST_TIMEOUTS, readMs: 100 } });
      const { peer, handler, closed } = await rawConnect();
      const original = patterned(2048);

      await peer.send(createMessage(MessageType.UPLOAD_START));
      await peer.send(
        createMessage(
          MessageType.FILE_METADATA,
          encodeFileMetadata({ name: 'quiet.bin', size: 2048, chunkSize: 1024, compression: false, digest: digest(original) })
        )
      );
      await peer.send(
        createMessage(
          MessageType.FILE_CHUNK,
          encodeChunk({ index: 0, compressed: false, rawLength: 1024, data: original.subarray(0, 1024) })
        )
      );

      expect((await expectError(peer)).kind).toBe('TIMEOUT');
      await closed;
      expect(handler.state).toBe('FAILED');
      expect(handler.lastError?.kind).toBe('TIMEOUT');
      expect(await fs.readdir(serverRoot)).toEqual([]);
    });

    it('fails an upload the server cannot write and leaves no file behind', async () => {
      const openTemp = server.storage.openForWriteTemp.bind(server.storage);
      jest.spyOn(server.storage, 'openForWriteTemp').mockImplementation(async () => {
        const temp = await openTemp();
        jest.spyOn(temp, 'write').mockRejectedValue(new ProtocolError('WRITE_ERROR', 'No space left on device'));
        return temp;
      });
      const localPath = path.join(localRoot, 'full.bin');
      await fs.writeFile(localPath, patterned(5000));
      const { client, handler, closed } = await connect();

      await expect(client.upload(localPath, { chunkSize: ChunkSize.XLARGE })).rejects.toMatchObject({
        kind: 'WRITE_ERROR',
      });
      await closed;
      expect(handler.lastError?.kind).toBe('WRITE_ERROR');
      expect(await fs.readdir(serverRoot)).toEqual([]);
    });

    it('discards the partial upload when the client drops the connection', async () => {
      const { peer, handler, closed } = await rawConnect();
      const original = patterned(3072);

      await peer.send(createMessage(MessageType.UPLOAD_START));
      await peer.send(
        createMessage(
          MessageType.FILE_METADATA,
          encodeFileMetadata({ name: 'cut.bin', size: 3072, chunkSize: 1024, compression: false, digest: digest(original) })
        )
      );
      await peer.send(
        createMessage(
          MessageType.FILE_CHUNK,
          encodeChunk({ index: 0, compressed: false, rawLength: 1024, data: original.subarray(0, 1024) })
        )
      );
      await peer.close();

      await closed;
      expect(handler.state).toBe('FAILED');
      expect(handler.lastError?.kind).toBe('TRUNCATED');
      expect(await fs.readdir(serverRoot)).toEqual([]);
    });

    it('rejects a message that is not legal in READY', async () => {
      const { peer, handler, closed } = await rawConnect();

      await peer.send(createMessage(MessageType.CHUNK_ACK, encodeChunkAck(0)));

      expect((await expectError(peer)).kind).toBe('PROTOCOL_VIOLATION');
      await closed;
      expect(handler.lastError?.kind).toBe('PROTOCOL_VIOLATION');
    });

    it('rejects an acknowledgement for the wrong chunk index', async () => {
      useServer({ ackWindow: 2 });
      await fs.writeFile(path.join(serverRoot, 'w.bin'), patterned(3072));
      const { peer, closed } = await rawConnect(2);

      await peer.send(
        createMessage(MessageType.FILE_REQUEST, encodeFileRequest({ name: 'w.bin', chunkSize: ChunkSize.SMALL, compression: false }))
      );
      const metadata = decodeFileMetadata(await receiveType(peer, MessageType.FILE_METADATA));
      expect(metadata.size).toBe(3072);
      expect(decodeChunk(await receiveType(peer, MessageType.FILE_CHUNK)).index).toBe(0);
      expect(decodeChunk(await receiveType(peer, MessageType.FILE_CHUNK)).index).toBe(1);

      await peer.send(createMessage(MessageType.CHUNK_ACK, encodeChunkAck(0)));

      expect((await expectError(peer)).kind).toBe('PROTOCOL_VIOLATION');
      await closed;
    });

    it('logs a peer ERROR and closes without answering', async () => {
      const { peer, handler, closed } = await rawConnect();

      await peer.send(createMessage(MessageType.ERROR, encodeError({ kind: 'TIMEOUT', message: 'giving up' })));

      expect(await peer.receive()).toBeNull();
      await closed;
      expect(handler.lastError).toMatchObject({ kind: 'TIMEOUT', remote: true });
    });

    it('closes cleanly when the client disconnects', async () => {
      const { client, handler, closed } = await connect();
      await client.close();

      const [failure] = await closed;
      expect(failure).toBeNull();
      expect(handler.lastError).toBeNull();
    });
  });

  describe('client handshake', () => {
    async function fakeHandshake(reply: Buffer): Promise<FileShareClient> {
      const [clientSocket, serverSocket] = createSocketPair();
      const fakeServer = rawChannel(serverSocket);
      peers.push(fakeServer);
      const client = new FileShareClient(config);
      clients.push(client);

      const attaching = client.attach(clientSocket);
      await receiveType(fakeServer, MessageType.HANDSHAKE);
      await fakeServer.send(createMessage(MessageType.HANDSHAKE_ACK, reply));
      await attaching.catch((error: unknown) => {
        expect(error).toMatchObject({ kind: 'PROTOCOL_VIOLATION' });
      });
      return client;
    }

    it('goes back to IDLE when the server rejects the version', async () => {
      const [clientSocket, serverSocket] = createSocketPair();
      const fakeServer = rawChannel(serverSocket);
      peers.push(fakeServer);
      const client = new FileShareClient(config);
      clients.push(client);

      const attaching = client.attach(clientSocket);
      await receiveType(fakeServer, MessageType.HANDSHAKE);
      await fakeServer.send(
        createMessage(MessageType.ERROR, encodeError({ kind: 'VERSION_UNSUPPORTED', message: 'only version 7' }))
      );

      await expect(attaching).rejects.toMatchObject({ kind: 'VERSION_UNSUPPORTED', remote: true });
      expect(client.state).toBe('IDLE');
      expect(client.isConnected).toBe(false);
    });

    it('refuses an ack window larger than it proposed', async () => {
      const client = await fakeHandshake(encodeHandshake({ version: 1, ackWindow: 5 }));
      expect(client.state).toBe('FAILED');
      expect(client.isConnected).toBe(false);
    });

    it('fails and tells the server when the handshake is never answered', async () => {
      const [clientSocket, serverSocket] = createSocketPair();
      const fakeServer = rawChannel(serverSocket);
      peers.push(fakeServer);
      const client = new FileShareClient({ ...config, timeouts: { ...TEST_TIMEOUTS, handshakeMs: 100 } });
      clients.push(client);

      const attaching = client.attach(clientSocket);
      await receiveType(fakeServer, MessageType.HANDSHAKE);

      await expect(attaching).rejects.toMatchObject({ kind: 'TIMEOUT' });
      expect(client.state).toBe('FAILED');
      expect(client.isConnected).toBe(false);
      expect((await expectError(fakeServer)).kind).toBe('TIMEOUT');
    });

    it('is ready after a normal handshake', async () => {
      const client = await fakeHandshake(encodeHandshake({ version: 1, ackWindow: 0 }));
      expect(client.state).toBe('READY');
      expect(client.isConnected).toBe(true);
    });
  });
});
