export * from '../shared/constants/protocol';
export * from '../shared/types/protocol';
export * from '../shared/types/config';
export * from './protocol/errors';
export * from './protocol/WireCodec';
export * from './protocol/Chunker';
export * from './protocol/Integrity';
export * from './protocol/TransferStateMachine';
export { FileStorage, ReadHandle, WriteHandle, openReadHandle, computeDigest } from './storage/FileStorage';
export { MessageChannel } from './network/MessageChannel';
export { ConnectionHandler } from './network/ConnectionHandler';
export { FileShareServer } from './network/FileShareServer';
export {
  ClientConfig,
  DownloadOptions,
  FileShareClient,
  TransferFailure,
  UploadOptions,
} from './network/FileShareClient';
export { RetryPolicy, isTransient, withRetry } from './network/retryPolicy';
export { ClientFactory, TransferJob, TransferOutcome, TransferQueue } from './transfer/TransferQueue';
export { defaultTransferConfig, loadConfig, resolveConfigPath } from './utils/configLoader';
export { sanitizeTransferConfig } from './utils/validation';
export { validateFileName } from './utils/pathSecurity';
export { logger, setLogLevel } from './utils/logger';
