/**
 * NetDepot Error Codes
 */
export const ErrorCodes = {
  MALFORMED_FILENAME: 'MALFORMED_FILENAME',
  HASH_MISMATCH: 'HASH_MISMATCH',
  EMPTY_CONTENT: 'EMPTY_CONTENT',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  INVALID_UPLOAD: 'INVALID_UPLOAD',
  READ_TIMEOUT: 'READ_TIMEOUT',
  UPLOAD_ABORTED: 'UPLOAD_ABORTED',
  ARTIFACT_CONFLICT: 'ARTIFACT_CONFLICT',
  ALREADY_UPLOADED: 'ALREADY_UPLOADED',
  COMPRESSION_IO_ERROR: 'COMPRESSION_IO_ERROR',
  DISK_FULL: 'DISK_FULL',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  STORAGE_IO_ERROR: 'STORAGE_IO_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export type ErrorCategory = 'client' | 'conflict' | 'server';

const ERROR_CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  MALFORMED_FILENAME: 'client',
  HASH_MISMATCH: 'client',
  EMPTY_CONTENT: 'client',
  PAYLOAD_TOO_LARGE: 'client',
  INVALID_UPLOAD: 'client',
  READ_TIMEOUT: 'client',
  UPLOAD_ABORTED: 'client',
  ARTIFACT_CONFLICT: 'conflict',
  ALREADY_UPLOADED: 'conflict',
  COMPRESSION_IO_ERROR: 'server',
  DISK_FULL: 'server',
  PERMISSION_DENIED: 'server',
  STORAGE_IO_ERROR: 'server',
};

const HTTP_STATUS: Record<ErrorCode, number> = {
  MALFORMED_FILENAME: 400,
  HASH_MISMATCH: 400,
  EMPTY_CONTENT: 400,
  PAYLOAD_TOO_LARGE: 413,
  INVALID_UPLOAD: 400,
  READ_TIMEOUT: 408,
  UPLOAD_ABORTED: 400,
  ARTIFACT_CONFLICT: 409,
  ALREADY_UPLOADED: 409,
  COMPRESSION_IO_ERROR: 500,
  DISK_FULL: 500,
  PERMISSION_DENIED: 500,
  STORAGE_IO_ERROR: 500,
};

export interface ErrorBody {
  code: ErrorCode;
  error: string;
  hint?: string;
}

/**
 * Base class for NetDepot errors
 */
export class NetDepotError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'NetDepotError';
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORIES[this.code];
  }

  get httpStatus(): number {
    return HTTP_STATUS[this.code];
  }

  toErrorBody(): ErrorBody {
    return {
      code: this.code,
      error: this.message,
      ...(this.hint ? { hint: this.hint } : {}),
    };
  }
}

// ========== Client errors ==========

/**
 * Error: Filename missing or not following the naming convention
 */
export class MalformedFilenameError extends NetDepotError {
  constructor(
    public readonly filename: string,
    message: string,
    hint?: string,
  ) {
    super(ErrorCodes.MALFORMED_FILENAME, message, hint);
    this.name = 'MalformedFilenameError';
  }
}

/**
 * Error: Content digest differs from the digest token in the filename
 */
export class HashMismatchError extends NetDepotError {
  constructor(
    public readonly filename: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(
      ErrorCodes.HASH_MISMATCH,
      `Invalid hash for uploaded file ${filename}`,
      `Expected digest ${expected}, content hashes to ${actual}`,
    );
    this.name = 'HashMismatchError';
  }
}

export class EmptyContentError extends NetDepotError {
  constructor(public readonly filename: string) {
    super(ErrorCodes.EMPTY_CONTENT, `Uploaded file ${filename} is empty`);
    this.name = 'EmptyContentError';
  }
}

export class PayloadTooLargeError extends NetDepotError {
  constructor(public readonly limitBytes: number) {
    super(
      ErrorCodes.PAYLOAD_TOO_LARGE,
      `Upload exceeds the maximum size of ${limitBytes} bytes`,
    );
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Error: Request is not a usable multipart upload
 */
export class InvalidUploadError extends NetDepotError {
  constructor(reason: string, hint?: string) {
    super(ErrorCodes.INVALID_UPLOAD, reason, hint);
    this.name = 'InvalidUploadError';
  }
}

export class ReadTimeoutError extends NetDepotError {
  constructor(public readonly timeoutMs: number) {
    super(
      ErrorCodes.READ_TIMEOUT,
      `No upload data received for ${timeoutMs}ms`,
    );
    this.name = 'ReadTimeoutError';
  }
}

export class UploadAbortedError extends NetDepotError {
  constructor(reason: string = 'Client disconnected before the upload completed') {
    super(ErrorCodes.UPLOAD_ABORTED, reason);
    this.name = 'UploadAbortedError';
  }
}

// ========== Conflict errors ==========

/**
 * Error: An artifact exists under the final name but its content does not
 * match the digest in that name
 */
export class ArtifactConflictError extends NetDepotError {
  constructor(public readonly fileName: string, reason: string) {
    super(
      ErrorCodes.ARTIFACT_CONFLICT,
      `Stored artifact ${fileName} does not match its name: ${reason}`,
      'The stored file is corrupt and must be inspected by an operator',
    );
    this.name = 'ArtifactConflictError';
  }
}

export class AlreadyUploadedError extends NetDepotError {
  constructor(public readonly filename: string) {
    super(ErrorCodes.ALREADY_UPLOADED, `File ${filename} already uploaded`);
    this.name = 'AlreadyUploadedError';
  }
}

// ========== Server errors ==========

export class CompressionIOError extends NetDepotError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(ErrorCodes.COMPRESSION_IO_ERROR, `Compression failed: ${reason}`, undefined, options);
    this.name = 'CompressionIOError';
  }
}

export class DiskFullError extends NetDepotError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(ErrorCodes.DISK_FULL, `No space left on device while writing ${path}`, undefined, options);
    this.name = 'DiskFullError';
  }
}

export class PermissionDeniedError extends NetDepotError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(ErrorCodes.PERMISSION_DENIED, `Permission denied for ${path}`, undefined, options);
    this.name = 'PermissionDeniedError';
  }
}

export class StorageIOError extends NetDepotError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(ErrorCodes.STORAGE_IO_ERROR, `Storage failure: ${reason}`, undefined, options);
    this.name = 'StorageIOError';
  }
}

// ========== Mapping ==========

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error onto the storage error taxonomy.
 */
export function fromFsError(err: unknown, path: string): NetDepotError {
  if (err instanceof NetDepotError) {
    return err;
  }

  switch (errnoCode(err)) {
    case 'ENOSPC':
    case 'EDQUOT':
      return new DiskFullError(path, { cause: err });
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return new PermissionDeniedError(path, { cause: err });
    default:
      return new StorageIOError(
        `${err instanceof Error ? err.message : String(err)} (${path})`,
        { cause: err },
      );
  }
}

/**
 * Normalize any thrown value into a NetDepotError.
 */
export function toNetDepotError(err: unknown): NetDepotError {
  if (err instanceof NetDepotError) {
    return err;
  }
  return new StorageIOError(err instanceof Error ? err.message : String(err), { cause: err });
}

export function isNotFound(err: unknown): boolean {
  return errnoCode(err) === 'ENOENT';
}
