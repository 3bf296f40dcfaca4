import { BaseError } from './base-error.js';

export class StorageError extends BaseError {
  constructor(operation: string, cause: unknown) {
    super('STORAGE_FAILURE', 500, `Storage operation "${operation}" failed`, { cause });
  }
}

export class TransportError extends BaseError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT_FAILURE', 502, message, { cause });
  }
}

export class RemoteSinkError extends BaseError {
  constructor(message: string, cause?: unknown) {
    super('REMOTE_SINK_FAILURE', 502, message, { cause });
  }
}
