export type XPErrorCode =
  | 'BAD_USER_INPUT'
  | 'STORE_UNAVAILABLE'
  | 'CONFLICT'
  | 'CANCELLED'
  | 'CORRUPT_DOCUMENT'
  | 'BAD_QUERY'
  | 'NOT_FOUND';

export class XPError extends Error {
  constructor(
    message: string,
    public readonly code: XPErrorCode,
    public readonly retryable = false,
  ) {
    super(message);
    this.name = 'XPError';
  }
}

export class PreconditionError extends XPError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'BAD_USER_INPUT');
    this.name = 'PreconditionError';
  }
}

/** Store unreachable. Whatever call raised it committed nothing it can vouch for. */
export class TransientStoreError extends XPError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'STORE_UNAVAILABLE', true);
    this.name = 'TransientStoreError';
  }
}

export class ConflictError extends XPError {
  constructor(path: string, attempts: number) {
    super(`Concurrent writes on ${path} outlasted ${attempts} attempts`, 'CONFLICT', true);
    this.name = 'ConflictError';
  }
}

export class AwardCancelledError extends XPError {
  constructor(eventId: string) {
    super(`Award ${eventId} was cancelled before commit`, 'CANCELLED');
    this.name = 'AwardCancelledError';
  }
}

export class CorruptDocumentError extends XPError {
  constructor(path: string, detail: string) {
    super(`Document ${path} cannot be decoded: ${detail}`, 'CORRUPT_DOCUMENT');
    this.name = 'CorruptDocumentError';
  }
}

export class StoreQueryError extends XPError {
  constructor(message: string) {
    super(message, 'BAD_QUERY');
    this.name = 'StoreQueryError';
  }
}

export class DocumentNotFoundError extends XPError {
  constructor(path: string) {
    super(`Document ${path} does not exist`, 'NOT_FOUND');
    this.name = 'DocumentNotFoundError';
  }
}

export const isXPError = (error: unknown): error is XPError => error instanceof XPError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
